/**
 * Multiplayer server infrastructure for Mind rooms.
 *
 * Provides WebSocket-based real-time multiplayer with:
 *   - Room management (create, join, list, leave)
 *   - Per-room serialization of every mutating action
 *   - Session tokens and name matching for reconnection
 *   - Hidden information enforcement (per-client state partitioning)
 *   - Heartbeats and grace-period eviction of abandoned rooms
 */

// Server
export type { GameServerConfig, GameServer } from './ws-server.js';
export { createGameServer } from './ws-server.js';
export { loadConfig } from './config.js';

// Coordinator
export type { RoomCoordinatorOptions, JoinResult } from './room-coordinator.js';
export { RoomCoordinator } from './room-coordinator.js';

// Lifecycle
export type { EvictionPolicy, LifecycleOptions, LivenessSocket } from './lifecycle.js';
export { LifecycleManager, gracePeriodEviction, neverEvict } from './lifecycle.js';

// Room management
export type { RoomConfig } from './room.js';
export {
  createRoom,
  joinRoom,
  findDisconnectedSeat,
  reassignSeat,
  disconnectPlayer,
  reconnectPlayer,
  removePlayer,
  getPlayerIndex,
  getPlayerName,
  isPlayerConnected,
  isRoomFull,
  allPlayersDisconnected,
  getRoomSummary,
  setRoomStatus,
  cleanupRoom,
  generateRoomCode,
} from './room.js';

// Game controller
export type { ConnectionRegistry, ActionOutcome } from './game-controller.js';
export {
  startGame,
  handleGameAction,
  broadcastState,
  sendFullState,
  handleReconnection,
  handleDisconnection,
} from './game-controller.js';

// State partitioning
export { partitionState, buildPrivateState, buildPublicState } from './state-partition.js';

// Protocol
export { parseClientMessage, clientMessageSchema } from './messages.js';

// Types
export type {
  Room,
  RoomStatus,
  RoomSummary,
  GameAction,
  Connection,
  ClientMessage,
  ServerMessage,
  CreateRoomMessage,
  JoinRoomMessage,
  ResumeSessionMessage,
  LeaveRoomMessage,
  ListRoomsMessage,
  PlayCardMessage,
  UseStarMessage,
  AdvanceLevelMessage,
  SessionCreatedMessage,
  RoomCreatedMessage,
  JoinedMessage,
  PlayerJoinedMessage,
  PlayerLeftMessage,
  PlayerDisconnectedMessage,
  PlayerReconnectedMessage,
  RoomsMessage,
  StateUpdateMessage,
  ErrorMessage,
  PublicPlayerState,
  PrivatePlayerState,
  ClientGameState,
} from './types.js';
