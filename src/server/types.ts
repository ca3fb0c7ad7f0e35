/**
 * Multiplayer infrastructure types for Mind rooms.
 *
 * Defines rooms, the message protocol, per-viewer state and the
 * connection abstraction.
 */

import type { Card, GameEffect, GameState, GameStatus } from '../types.js';
import type { ErrorCode } from '../errors.js';

// -- Room --

export type RoomStatus = 'waiting' | 'playing' | 'finished' | 'closed';

export interface Room {
  id: string;
  name: string;
  /** Seats in the roster, fixed at creation (2-4). */
  capacity: number;
  status: RoomStatus;
  /** Player IDs in join order. Index = player slot in game state. */
  playerIds: string[];
  /** Connected player IDs (subset of playerIds). */
  connectedPlayerIds: Set<string>;
  /** Player ID → display name. */
  playerNames: Map<string, string>;
  /** Full authoritative game state. null until the roster fills. */
  gameState: GameState | null;
  /** RNG used to deal every level of this room's game. */
  rng: () => number;
  lastEffect: GameEffect | null;
  lastMessage: string;
  /** When the last connection detached. null while anyone is attached. */
  emptySince: number | null;
}

export interface RoomSummary {
  roomId: string;
  name: string;
  occupancy: number;
  capacity: number;
  status: RoomStatus;
}

// -- Game Actions --

export type GameAction =
  | { type: 'play-card'; card: Card }
  | { type: 'use-star' }
  | { type: 'advance-level' };

// -- Client → Server Messages --

export interface CreateRoomMessage {
  type: 'create-room';
  name: string;
  capacity: number;
  /** When set, the creator takes the first seat. */
  playerName?: string;
}

export interface JoinRoomMessage {
  type: 'join-room';
  roomId: string;
  playerName: string;
}

export interface ResumeSessionMessage {
  type: 'resume-session';
  sessionToken: string;
}

export interface LeaveRoomMessage {
  type: 'leave-room';
}

export interface ListRoomsMessage {
  type: 'list-rooms';
}

export interface PlayCardMessage {
  type: 'play-card';
  card: Card;
}

export interface UseStarMessage {
  type: 'use-star';
}

export interface AdvanceLevelMessage {
  type: 'advance-level';
}

export type ClientMessage =
  | CreateRoomMessage
  | JoinRoomMessage
  | ResumeSessionMessage
  | LeaveRoomMessage
  | ListRoomsMessage
  | PlayCardMessage
  | UseStarMessage
  | AdvanceLevelMessage;

// -- Server → Client Messages --

export interface SessionCreatedMessage {
  type: 'session-created';
  sessionToken: string;
  playerId: string;
}

export interface RoomCreatedMessage {
  type: 'room-created';
  roomId: string;
  name: string;
  capacity: number;
}

export interface JoinedMessage {
  type: 'joined';
  roomId: string;
  playerSlot: number;
  playerName: string;
  /** True when an existing seat was reattached. */
  reattached: boolean;
}

export interface PlayerJoinedMessage {
  type: 'player-joined';
  playerSlot: number;
  playerName: string;
  occupancy: number;
  capacity: number;
}

export interface PlayerLeftMessage {
  type: 'player-left';
  playerSlot: number;
  playerName: string;
  occupancy: number;
  capacity: number;
}

export interface PlayerDisconnectedMessage {
  type: 'player-disconnected';
  playerSlot: number;
}

export interface PlayerReconnectedMessage {
  type: 'player-reconnected';
  playerSlot: number;
}

export interface RoomsMessage {
  type: 'rooms';
  rooms: RoomSummary[];
}

export interface StateUpdateMessage {
  type: 'state-update';
  state: ClientGameState;
  message: string;
}

export interface ErrorMessage {
  type: 'error';
  code: ErrorCode;
  message: string;
}

export type ServerMessage =
  | SessionCreatedMessage
  | RoomCreatedMessage
  | JoinedMessage
  | PlayerJoinedMessage
  | PlayerLeftMessage
  | PlayerDisconnectedMessage
  | PlayerReconnectedMessage
  | RoomsMessage
  | StateUpdateMessage
  | ErrorMessage;

// -- State Partitioning --

export interface PublicPlayerState {
  slot: number;
  name: string;
  handCount: number;
  connected: boolean;
}

export interface PrivatePlayerState {
  slot: number;
  name: string;
  hand: Card[];
  connected: boolean;
}

export interface ClientGameState {
  roomId: string;
  level: number;
  status: GameStatus;
  lives: number;
  maxLives: number;
  stars: number;
  maxStars: number;
  pile: Card[];
  discarded: Card[];
  cardsInPlay: number;
  self: PrivatePlayerState;
  opponents: PublicPlayerState[];
  lastEffect: GameEffect | null;
}

// -- Connection Abstraction --

export interface Connection {
  playerId: string;
  roomId: string | null;
  send(message: ServerMessage): void;
}
