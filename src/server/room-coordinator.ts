/**
 * Room coordinator: owns every room and serializes work on each one.
 *
 * All mutating operations on a room run through a per-room FIFO queue, so
 * at most one executes at a time and each sees the state its predecessor
 * left behind. Simultaneous actions are ordered by arrival. Queues are keyed
 * by room ID; rooms never wait on each other. Listing and lookups read the
 * map directly without queueing.
 */

import type { GameAction, Room, RoomSummary } from './types.js';
import type { ActionOutcome, ConnectionRegistry } from './game-controller.js';
import { handleDisconnection, handleGameAction, handleReconnection, startGame } from './game-controller.js';
import {
  allPlayersDisconnected,
  cleanupRoom,
  createRoom,
  disconnectPlayer,
  findDisconnectedSeat,
  generateRoomCode,
  getPlayerName,
  getRoomSummary,
  isRoomFull,
  joinRoom,
  reassignSeat,
  reconnectPlayer,
  removePlayer,
} from './room.js';
import { createRng } from '../deck.js';
import { NotFoundError } from '../errors.js';
import { log } from '../logger.js';
import type { Logger } from '../logger.js';

export interface RoomCoordinatorOptions {
  /** Base seed for room RNGs; room N deals from `seed + N`. Defaults to the clock. */
  seed?: number;
  logger?: Logger;
  /** Called with each room as it is closed, seats still listed. */
  onRoomClosed?: (room: Room) => void;
}

export interface JoinResult {
  roomId: string;
  playerSlot: number;
  playerName: string;
  /** True when the name matched a disconnected seat and that seat was handed over. */
  reattached: boolean;
  /** The player ID that held the seat before a name match handed it over. */
  replacedPlayerId: string | null;
}

export class RoomCoordinator {
  private readonly rooms = new Map<string, Room>();
  private readonly roomQueues = new Map<string, Promise<void>>();
  private readonly logger: Logger;
  private roomCounter = 0;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly options: RoomCoordinatorOptions = {},
  ) {
    this.logger = options.logger ?? log.room;
  }

  /**
   * Create an empty room and return its ID.
   */
  createRoom(name: string, capacity: number): string {
    let id = generateRoomCode();
    while (this.rooms.has(id)) id = generateRoomCode();

    const seed = (this.options.seed ?? Date.now()) + this.roomCounter++;
    const room = createRoom(id, { name, capacity, rng: createRng(seed) });
    this.rooms.set(id, room);

    this.logger.info({ roomId: id, name: room.name, capacity }, 'room created');
    return id;
  }

  /**
   * Seat a player. A name matching a disconnected seat takes that seat over
   * and gets a full-state resend. Filling the last seat starts the game.
   */
  joinRoom(roomId: string, playerId: string, playerName: string): Promise<JoinResult> {
    return this.withRoomLock(roomId, () => {
      const room = this.requireRoom(roomId);

      const reserved = findDisconnectedSeat(room, playerName);
      if (reserved) {
        const playerSlot = reassignSeat(room, reserved, playerId);
        reconnectPlayer(room, playerId);
        this.registry.sendTo(playerId, { type: 'joined', roomId, playerSlot, playerName, reattached: true });
        handleReconnection(room, playerId, this.registry);
        this.logger.info({ roomId, playerSlot }, 'seat reattached by name');
        return { roomId, playerSlot, playerName, reattached: true, replacedPlayerId: reserved };
      }

      const playerSlot = joinRoom(room, playerId, playerName);
      this.registry.sendTo(playerId, { type: 'joined', roomId, playerSlot, playerName, reattached: false });
      this.registry.broadcast(room, {
        type: 'player-joined',
        playerSlot,
        playerName,
        occupancy: room.playerIds.length,
        capacity: room.capacity,
      });
      this.logger.info({ roomId, playerSlot }, 'player joined');

      if (isRoomFull(room)) {
        startGame(room, this.registry);
      }
      return { roomId, playerSlot, playerName, reattached: false, replacedPlayerId: null };
    });
  }

  /**
   * Run a game action. The outcome reflects every action admitted before it.
   */
  submitAction(roomId: string, playerId: string, action: GameAction): Promise<ActionOutcome> {
    return this.withRoomLock(roomId, () => {
      const room = this.requireRoom(roomId);
      return handleGameAction(room, playerId, action, this.registry);
    });
  }

  /**
   * Give up a seat before the game starts. An emptied lobby is closed.
   */
  leaveRoom(roomId: string, playerId: string): Promise<number> {
    return this.withRoomLock(roomId, () => {
      const room = this.requireRoom(roomId);
      const playerName = getPlayerName(room, playerId);
      const playerSlot = removePlayer(room, playerId);

      if (room.playerIds.length === 0) {
        this.closeRoom(roomId);
      } else {
        this.registry.broadcast(room, {
          type: 'player-left',
          playerSlot,
          playerName,
          occupancy: room.playerIds.length,
          capacity: room.capacity,
        });
      }
      return playerSlot;
    });
  }

  /**
   * Mark a seat disconnected. Returns true when nobody is attached any more.
   */
  detach(roomId: string, playerId: string): Promise<boolean> {
    return this.withRoomLock(roomId, () => {
      const room = this.rooms.get(roomId);
      if (!room || !disconnectPlayer(room, playerId)) return false;

      handleDisconnection(room, playerId, this.registry);
      this.logger.info({ roomId, playerId }, 'player disconnected');
      return allPlayersDisconnected(room);
    });
  }

  /**
   * Reattach a reserved seat and resend that player the full state.
   */
  reattach(roomId: string, playerId: string): Promise<number> {
    return this.withRoomLock(roomId, () => {
      const room = this.requireRoom(roomId);
      if (!reconnectPlayer(room, playerId)) {
        throw new NotFoundError('player_not_found', 'Not a player in this room');
      }
      handleReconnection(room, playerId, this.registry);
      this.logger.info({ roomId, playerId }, 'player reconnected');
      return room.playerIds.indexOf(playerId);
    });
  }

  /**
   * Close a room if `predicate` still holds once its queue reaches us.
   */
  closeRoomIf(roomId: string, predicate: (room: Room) => boolean): Promise<boolean> {
    return this.withRoomLock(roomId, () => {
      const room = this.rooms.get(roomId);
      if (!room || !predicate(room)) return false;
      this.closeRoom(roomId);
      return true;
    });
  }

  /**
   * Drop a room immediately. Work already queued for it finds no room.
   */
  closeRoom(roomId: string): boolean {
    const room = this.rooms.get(roomId);
    if (!room) return false;
    cleanupRoom(room);
    this.rooms.delete(roomId);
    this.options.onRoomClosed?.(room);
    this.logger.info({ roomId }, 'room closed');
    return true;
  }

  closeAll(): void {
    for (const roomId of [...this.rooms.keys()]) {
      this.closeRoom(roomId);
    }
  }

  listRooms(): RoomSummary[] {
    return [...this.rooms.values()].map(getRoomSummary);
  }

  getRoom(roomId: string): Room | undefined {
    return this.rooms.get(roomId);
  }

  get size(): number {
    return this.rooms.size;
  }

  private requireRoom(roomId: string): Room {
    const room = this.rooms.get(roomId);
    if (!room) throw new NotFoundError('room_not_found', `Room '${roomId}' not found`);
    return room;
  }

  private async withRoomLock<T>(roomId: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.roomQueues.get(roomId) ?? Promise.resolve();
    let release: (() => void) | undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const queued = previous.then(() => current);
    this.roomQueues.set(roomId, queued);

    await previous;
    try {
      return await task();
    } finally {
      release?.();
      if (this.roomQueues.get(roomId) === queued) {
        this.roomQueues.delete(roomId);
      }
    }
  }
}
