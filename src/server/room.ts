/**
 * Room management for multiplayer Mind games.
 *
 * Handles room lifecycle: creation, joining, seat tracking, reconnection,
 * listing and cleanup. These functions mutate the room they are given;
 * callers hold the room's lock.
 */

import type { Room, RoomStatus, RoomSummary } from './types.js';
import { MAX_PLAYERS, MIN_PLAYERS } from '../types.js';
import { NotFoundError, ValidationError } from '../errors.js';

export interface RoomConfig {
  name: string;
  capacity: number;
  rng: () => number;
}

/**
 * Generate a short room code (6 uppercase alphanumeric chars).
 */
export function generateRoomCode(): string {
  const chars = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789'; // No I/O/0/1 to avoid confusion
  let code = '';
  for (let i = 0; i < 6; i++) {
    code += chars[Math.floor(Math.random() * chars.length)];
  }
  return code;
}

/**
 * Create an empty room. Seats fill as players join.
 */
export function createRoom(id: string, config: RoomConfig): Room {
  const name = config.name.trim();
  if (name.length === 0) {
    throw new ValidationError('Room name is required', 'invalid_message');
  }
  if (!Number.isInteger(config.capacity) || config.capacity < MIN_PLAYERS || config.capacity > MAX_PLAYERS) {
    throw new ValidationError(
      `Number of players must be ${MIN_PLAYERS}-${MAX_PLAYERS}`,
      'invalid_message',
    );
  }

  const now = Date.now();
  return {
    id,
    name,
    capacity: config.capacity,
    status: 'waiting',
    playerIds: [],
    connectedPlayerIds: new Set(),
    playerNames: new Map(),
    gameState: null,
    rng: config.rng,
    lastEffect: null,
    lastMessage: '',
    emptySince: now,
  };
}

/**
 * Seat a player. Returns the new player slot.
 */
export function joinRoom(room: Room, playerId: string, displayName: string): number {
  if (room.playerIds.includes(playerId)) {
    throw new ValidationError('Already in this room', 'already_in_room');
  }
  if (isRoomFull(room)) {
    throw new ValidationError('Room is full', 'room_full');
  }
  if (room.status !== 'waiting') {
    throw new ValidationError('Room is not accepting new players', 'room_full');
  }

  room.playerIds.push(playerId);
  room.connectedPlayerIds.add(playerId);
  room.playerNames.set(playerId, displayName);
  room.emptySince = null;

  return room.playerIds.length - 1;
}

/**
 * Find a reserved, currently disconnected seat held under `displayName`.
 * Returns the seat's player ID, or null.
 */
export function findDisconnectedSeat(room: Room, displayName: string): string | null {
  for (const playerId of room.playerIds) {
    if (!room.connectedPlayerIds.has(playerId) && room.playerNames.get(playerId) === displayName) {
      return playerId;
    }
  }
  return null;
}

/**
 * Hand a reserved seat to a new player ID, keeping its slot and name.
 */
export function reassignSeat(room: Room, fromPlayerId: string, toPlayerId: string): number {
  const slot = getPlayerIndex(room, fromPlayerId);
  if (slot === -1) throw new NotFoundError('player_not_found', 'Not in this room');
  if (room.playerIds.includes(toPlayerId)) {
    throw new ValidationError('Already in this room', 'already_in_room');
  }

  const name = getPlayerName(room, fromPlayerId);
  room.playerIds[slot] = toPlayerId;
  room.playerNames.delete(fromPlayerId);
  room.playerNames.set(toPlayerId, name);
  if (room.connectedPlayerIds.delete(fromPlayerId)) {
    room.connectedPlayerIds.add(toPlayerId);
  }
  return slot;
}

/**
 * Mark a player as disconnected (but keep their seat and hand).
 */
export function disconnectPlayer(room: Room, playerId: string): boolean {
  if (!room.playerIds.includes(playerId)) return false;
  room.connectedPlayerIds.delete(playerId);
  if (room.connectedPlayerIds.size === 0 && room.emptySince === null) {
    room.emptySince = Date.now();
  }
  return true;
}

/**
 * Reconnect a player who holds a seat in the room.
 */
export function reconnectPlayer(room: Room, playerId: string): boolean {
  if (!room.playerIds.includes(playerId)) return false;
  room.connectedPlayerIds.add(playerId);
  room.emptySince = null;
  return true;
}

/**
 * Remove a player from the lobby (before the game starts).
 * Returns the slot they vacated.
 */
export function removePlayer(room: Room, playerId: string): number {
  const slot = getPlayerIndex(room, playerId);
  if (slot === -1) throw new NotFoundError('player_not_found', 'Not in this room');
  if (room.status !== 'waiting') {
    throw new ValidationError('Cannot leave during game', 'invalid_move');
  }

  room.playerIds = room.playerIds.filter(id => id !== playerId);
  room.connectedPlayerIds.delete(playerId);
  room.playerNames.delete(playerId);
  if (room.connectedPlayerIds.size === 0) room.emptySince = Date.now();

  return slot;
}

/**
 * Get the player slot for a given player ID (-1 when not seated).
 */
export function getPlayerIndex(room: Room, playerId: string): number {
  return room.playerIds.indexOf(playerId);
}

export function getPlayerName(room: Room, playerId: string): string {
  return room.playerNames.get(playerId) ?? `Player ${getPlayerIndex(room, playerId) + 1}`;
}

export function isPlayerConnected(room: Room, playerId: string): boolean {
  return room.connectedPlayerIds.has(playerId);
}

export function isRoomFull(room: Room): boolean {
  return room.playerIds.length >= room.capacity;
}

export function allPlayersDisconnected(room: Room): boolean {
  return room.connectedPlayerIds.size === 0;
}

/**
 * Build the listing entry for a room. Reads only; takes no lock.
 */
export function getRoomSummary(room: Room): RoomSummary {
  return {
    roomId: room.id,
    name: room.name,
    occupancy: room.playerIds.length,
    capacity: room.capacity,
    status: room.status,
  };
}

export function setRoomStatus(room: Room, status: RoomStatus): void {
  room.status = status;
}

/**
 * Clean up a room: mark it closed and detach everyone.
 */
export function cleanupRoom(room: Room): void {
  room.status = 'closed';
  room.connectedPlayerIds.clear();
}
