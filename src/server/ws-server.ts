/**
 * WebSocket server for multiplayer Mind games.
 *
 * Thin adapter layer: decodes frames, maps connections to seats and hands
 * work to the room coordinator. Uses the `ws` library for WebSocket support.
 *
 * Frames from one connection are handled strictly in arrival order. Once a
 * socket closes, frames it sent that have not started are dropped; work
 * already queued on a room still completes and broadcasts.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { Connection, ServerMessage, ClientMessage, Room } from './types.js';
import type { ConnectionRegistry } from './game-controller.js';
import { RoomCoordinator } from './room-coordinator.js';
import { LifecycleManager, gracePeriodEviction } from './lifecycle.js';
import type { EvictionPolicy } from './lifecycle.js';
import { parseClientMessage } from './messages.js';
import { isGameError, NotFoundError, ValidationError } from '../errors.js';
import { log } from '../logger.js';

// -- Server State --

interface Session {
  playerId: string;
  roomId: string | null;
}

interface ServerState {
  connections: Map<string, WsConnection>;
  /** Session tokens → session data for reconnection across page refreshes. */
  sessions: Map<string, Session>;
  /** Player ID → session token (reverse lookup). */
  playerSessions: Map<string, string>;
}

interface WsConnection extends Connection {
  ws: WebSocket;
  /** Tail of this connection's frame queue. */
  inbox: Promise<void>;
  closed: boolean;
}

export interface GameServerConfig {
  port: number;
  host?: string;
  /** Delete rooms nobody has been attached to for this long (ms). 0 = keep forever. Default 300000. */
  roomGracePeriodMs?: number;
  /** Ping interval for liveness checks (ms). 0 = no heartbeat. Default 30000. */
  heartbeatIntervalMs?: number;
  /** Base RNG seed for dealing. Defaults to the clock. */
  seed?: number;
  /** Overrides the grace-period policy built from `roomGracePeriodMs`. */
  evictionPolicy?: EvictionPolicy;
}

export interface GameServer {
  /** The underlying WebSocket server. */
  wss: WebSocketServer;
  coordinator: RoomCoordinator;
  lifecycle: LifecycleManager;
  /** Resolves with the bound port once the server is listening. */
  listening: Promise<number>;
  /** Shut down the server, dropping every room. */
  close(): Promise<void>;
  /** Get server state for testing/monitoring. */
  getState(): Readonly<ServerState>;
}

/**
 * Create and start a Mind multiplayer WebSocket server.
 */
export function createGameServer(config: GameServerConfig): GameServer {
  const state: ServerState = {
    connections: new Map(),
    sessions: new Map(),
    playerSessions: new Map(),
  };

  const registry: ConnectionRegistry = {
    broadcast(room: Room, message: ServerMessage) {
      for (const playerId of room.playerIds) {
        if (room.connectedPlayerIds.has(playerId)) {
          const conn = state.connections.get(playerId);
          if (conn) sendJson(conn.ws, message);
        }
      }
    },

    sendTo(playerId: string, message: ServerMessage) {
      const conn = state.connections.get(playerId);
      if (conn) sendJson(conn.ws, message);
    },
  };

  const coordinator = new RoomCoordinator(registry, {
    seed: config.seed,
    onRoomClosed(room) {
      for (const playerId of room.playerIds) dropSession(state, playerId);
    },
  });
  const lifecycle = new LifecycleManager(coordinator, {
    policy: config.evictionPolicy ?? gracePeriodEviction(config.roomGracePeriodMs ?? 300_000),
    heartbeatIntervalMs: config.heartbeatIntervalMs ?? 30_000,
  });

  const wss = new WebSocketServer({ port: config.port, host: config.host });

  const listening = new Promise<number>((resolve, reject) => {
    wss.once('listening', () => {
      const address = wss.address();
      resolve(address !== null && typeof address === 'object' ? address.port : config.port);
    });
    wss.once('error', reject);
  });
  listening
    .then(port => log.server.info({ port }, 'listening'))
    .catch((err: unknown) => log.server.error({ err }, 'failed to listen'));

  wss.on('connection', (ws: WebSocket) => {
    const playerId = generatePlayerId();
    const sessionToken = generateSessionToken();

    const conn: WsConnection = {
      playerId,
      roomId: null,
      ws,
      inbox: Promise.resolve(),
      closed: false,
      send(message: ServerMessage) {
        sendJson(ws, message);
      },
    };

    state.connections.set(playerId, conn);
    state.sessions.set(sessionToken, { playerId, roomId: null });
    state.playerSessions.set(playerId, sessionToken);
    lifecycle.track(ws);

    // Send session token to client
    conn.send({
      type: 'session-created',
      sessionToken,
      playerId,
    });

    ws.on('message', (data: RawData) => {
      const raw = data.toString();
      enqueue(conn, () => handleFrame(state, conn, raw, coordinator, lifecycle));
    });

    ws.on('close', () => {
      if (conn.closed) return;
      conn.closed = true;
      lifecycle.untrack(ws);
      enqueue(conn, () => handleClose(state, conn, coordinator, lifecycle));
    });

    ws.on('error', (err: Error) => {
      log.server.warn({ err, playerId: conn.playerId }, 'socket error');
    });
  });

  lifecycle.start();

  return {
    wss,
    coordinator,
    lifecycle,
    listening,
    close() {
      lifecycle.stop();
      coordinator.closeAll();
      for (const client of wss.clients) {
        client.terminate();
      }
      return new Promise<void>((resolve, reject) => {
        wss.close(err => (err ? reject(err) : resolve()));
      });
    },
    getState() {
      return state;
    },
  };
}

function enqueue(conn: WsConnection, task: () => Promise<void>): void {
  conn.inbox = conn.inbox.then(task).catch((err: unknown) => {
    log.server.error({ err, playerId: conn.playerId }, 'connection task failed');
  });
}

// -- Message Handling --

async function handleFrame(
  state: ServerState,
  conn: WsConnection,
  raw: string,
  coordinator: RoomCoordinator,
  lifecycle: LifecycleManager,
): Promise<void> {
  if (conn.closed) return;
  try {
    const message = parseClientMessage(raw);
    await handleMessage(state, conn, message, coordinator, lifecycle);
  } catch (err: unknown) {
    if (isGameError(err)) {
      conn.send({ type: 'error', code: err.code, message: err.message });
      return;
    }
    log.server.error({ err, playerId: conn.playerId }, 'unhandled error');
    conn.send({ type: 'error', code: 'internal_error', message: 'Internal server error' });
  }
}

async function handleMessage(
  state: ServerState,
  conn: WsConnection,
  message: ClientMessage,
  coordinator: RoomCoordinator,
  lifecycle: LifecycleManager,
): Promise<void> {
  switch (message.type) {
    case 'create-room': {
      if (message.playerName !== undefined && conn.roomId) {
        throw new ValidationError('Already in a room', 'already_in_room');
      }
      const roomId = coordinator.createRoom(message.name, message.capacity);
      conn.send({ type: 'room-created', roomId, name: message.name, capacity: message.capacity });
      if (message.playerName !== undefined) {
        await joinAndBind(state, conn, roomId, message.playerName, coordinator, lifecycle);
      } else {
        // Nobody is attached yet; the room is evicted unless someone joins.
        lifecycle.scheduleEviction(roomId);
      }
      break;
    }

    case 'join-room':
      if (conn.roomId) {
        // Rejoining the room this connection already sits in is a resync.
        if (conn.roomId === message.roomId) {
          await coordinator.reattach(conn.roomId, conn.playerId);
          return;
        }
        throw new ValidationError('Already in a room', 'already_in_room');
      }
      await joinAndBind(state, conn, message.roomId, message.playerName, coordinator, lifecycle);
      break;

    case 'resume-session':
      await handleResumeSession(state, conn, message.sessionToken, coordinator, lifecycle);
      break;

    case 'leave-room': {
      const roomId = requireRoomId(conn);
      await coordinator.leaveRoom(roomId, conn.playerId);
      conn.roomId = null;
      setSessionRoom(state, conn.playerId, null);
      break;
    }

    case 'list-rooms':
      conn.send({ type: 'rooms', rooms: coordinator.listRooms() });
      break;

    case 'play-card':
    case 'use-star':
    case 'advance-level':
      await coordinator.submitAction(requireRoomId(conn), conn.playerId, message);
      break;
  }
}

async function joinAndBind(
  state: ServerState,
  conn: WsConnection,
  roomId: string,
  playerName: string,
  coordinator: RoomCoordinator,
  lifecycle: LifecycleManager,
): Promise<void> {
  const { replacedPlayerId } = await coordinator.joinRoom(roomId, conn.playerId, playerName);
  if (replacedPlayerId) dropSession(state, replacedPlayerId);
  conn.roomId = roomId;
  setSessionRoom(state, conn.playerId, roomId);
  lifecycle.cancelEviction(roomId);
}

async function handleResumeSession(
  state: ServerState,
  conn: WsConnection,
  sessionToken: string,
  coordinator: RoomCoordinator,
  lifecycle: LifecycleManager,
): Promise<void> {
  const session = state.sessions.get(sessionToken);
  if (!session) {
    throw new NotFoundError('invalid_session', 'Invalid session token');
  }

  const oldPlayerId = session.playerId;

  // Duplicate resume on the same connection: already remapped.
  if (conn.playerId === oldPlayerId) {
    conn.send({ type: 'session-created', sessionToken, playerId: oldPlayerId });
    return;
  }

  if (conn.roomId) {
    throw new ValidationError('Already in a room', 'already_in_room');
  }

  // A still-open socket holding this session loses it to the newcomer.
  const oldConn = state.connections.get(oldPlayerId);
  if (oldConn && oldConn !== conn) {
    oldConn.closed = true;
    lifecycle.untrack(oldConn.ws);
    state.connections.delete(oldPlayerId);
    oldConn.ws.close(4000, 'Session resumed elsewhere');
  }

  // Remap the connection to use the old player ID
  state.connections.delete(conn.playerId);
  const newToken = state.playerSessions.get(conn.playerId);
  if (newToken) {
    state.sessions.delete(newToken);
    state.playerSessions.delete(conn.playerId);
  }

  conn.playerId = oldPlayerId;
  state.connections.set(oldPlayerId, conn);
  state.playerSessions.set(oldPlayerId, sessionToken);

  conn.send({ type: 'session-created', sessionToken, playerId: oldPlayerId });

  if (!session.roomId) return;

  const room = coordinator.getRoom(session.roomId);
  if (!room || !room.playerIds.includes(oldPlayerId)) {
    // Room gone or seat handed over
    session.roomId = null;
    return;
  }

  conn.roomId = room.id;
  lifecycle.cancelEviction(room.id);
  await coordinator.reattach(room.id, oldPlayerId);
}

// -- Disconnection --

async function handleClose(
  state: ServerState,
  conn: WsConnection,
  coordinator: RoomCoordinator,
  lifecycle: LifecycleManager,
): Promise<void> {
  // A resumed session already points at a newer connection; leave its seat alone.
  const currentConn = state.connections.get(conn.playerId);
  if (currentConn && currentConn !== conn) {
    return;
  }
  state.connections.delete(conn.playerId);

  if (!conn.roomId) {
    // Nothing to resume without a seat.
    dropSession(state, conn.playerId);
    return;
  }
  const roomId = conn.roomId;
  const empty = await coordinator.detach(roomId, conn.playerId);
  if (empty) {
    lifecycle.scheduleEviction(roomId);
  }
  // Session stays so the player can resume.
}

// -- Helpers --

function requireRoomId(conn: WsConnection): string {
  if (!conn.roomId) {
    throw new ValidationError('Not in a room', 'not_in_room');
  }
  return conn.roomId;
}

function setSessionRoom(state: ServerState, playerId: string, roomId: string | null): void {
  const token = state.playerSessions.get(playerId);
  if (!token) return;
  const session = state.sessions.get(token);
  if (session) session.roomId = roomId;
}

function dropSession(state: ServerState, playerId: string): void {
  const token = state.playerSessions.get(playerId);
  if (token) state.sessions.delete(token);
  state.playerSessions.delete(playerId);
}

function sendJson(ws: WebSocket, data: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

let playerCounter = 0;
function generatePlayerId(): string {
  return `player-${++playerCounter}-${Math.random().toString(36).slice(2, 6)}`;
}

function generateSessionToken(): string {
  const chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
  let token = '';
  for (let i = 0; i < 32; i++) {
    token += chars[Math.floor(Math.random() * chars.length)];
  }
  return token;
}
