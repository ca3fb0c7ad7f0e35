/**
 * Game controller: orchestrates multiplayer game flow for one room.
 *
 * Wraps the pure engine with multiplayer concerns:
 *   - Starting the game once the roster is full
 *   - Resolving the acting player's seat and running the engine
 *   - Broadcasting a redacted state to every connected seat
 *   - Reporting rejected actions to the actor only
 *   - Full-state resend on reconnection
 *
 * The controller is the authoritative game server. Clients send intents,
 * the engine validates them, and the controller broadcasts the result.
 * Callers hold the room's lock.
 */

import type { EngineResult, GameEffect, GameState } from '../types.js';
import { advanceLevel, createGame, isGameOver, playCard, setupLevel, useThrowingStar } from '../engine.js';
import { GameError, NotFoundError, ValidationError, isGameError } from '../errors.js';
import { log } from '../logger.js';
import type { GameAction, Room, ServerMessage } from './types.js';
import { partitionState } from './state-partition.js';
import { getPlayerIndex, isPlayerConnected, setRoomStatus } from './room.js';

// -- Connection Registry --

export interface ConnectionRegistry {
  /** Broadcast a message to all connected players in a room. */
  broadcast(room: Room, message: ServerMessage): void;
  /** Send a message to a specific player. */
  sendTo(playerId: string, message: ServerMessage): void;
}

export type ActionOutcome =
  | { accepted: true; effect: GameEffect; message: string; state: GameState }
  | { accepted: false; error: GameError };

// -- Game Lifecycle --

/**
 * Start a game in a full room: deal level 1 and send every seat its view.
 */
export function startGame(room: Room, registry: ConnectionRegistry): void {
  const state = setupLevel(createGame({ playerCount: room.playerIds.length }), room.rng);

  room.gameState = state;
  room.lastEffect = { type: 'level-started', level: state.level };
  room.lastMessage = `Level ${state.level} started.`;
  setRoomStatus(room, 'playing');

  log.room.info({ roomId: room.id, players: room.playerIds.length }, 'game started');
  broadcastState(room, registry);
}

/**
 * Run one player action against the room's game. Accepted actions are
 * broadcast to every connected seat; rejected ones go back to the actor.
 */
export function handleGameAction(
  room: Room,
  playerId: string,
  action: GameAction,
  registry: ConnectionRegistry,
): ActionOutcome {
  let result: EngineResult;
  try {
    result = applyGameAction(room, playerId, action);
  } catch (err: unknown) {
    const error = isGameError(err)
      ? err
      : new GameError('internal_error', err instanceof Error ? err.message : 'Unknown error');
    if (!isGameError(err)) {
      log.room.error({ err, roomId: room.id, action: action.type }, 'action failed');
    }
    registry.sendTo(playerId, { type: 'error', code: error.code, message: error.message });
    return { accepted: false, error };
  }

  room.gameState = result.state;
  room.lastEffect = result.effect;
  room.lastMessage = result.message;
  if (isGameOver(result.state)) {
    setRoomStatus(room, 'finished');
    log.room.info({ roomId: room.id, status: result.state.status, level: result.state.level }, 'game over');
  } else if (result.effect.type === 'mistake') {
    log.room.debug({ roomId: room.id, card: result.effect.card, livesLeft: result.effect.livesLeft }, 'mistake');
  }

  broadcastState(room, registry);
  return { accepted: true, effect: result.effect, message: result.message, state: result.state };
}

function applyGameAction(room: Room, playerId: string, action: GameAction): EngineResult {
  if (!room.gameState) {
    throw new ValidationError('Game not started', 'game_not_started');
  }

  const playerIndex = getPlayerIndex(room, playerId);
  if (playerIndex === -1) {
    throw new NotFoundError('player_not_found', 'Not a player in this game');
  }

  switch (action.type) {
    case 'play-card':
      return playCard(room.gameState, playerIndex, action.card);
    case 'use-star':
      return useThrowingStar(room.gameState);
    case 'advance-level':
      return advanceLevel(room.gameState, room.rng);
  }
}

// -- Broadcasting --

/**
 * Send each connected seat its own redacted view of the game.
 */
export function broadcastState(room: Room, registry: ConnectionRegistry): void {
  for (const playerId of room.playerIds) {
    if (isPlayerConnected(room, playerId)) {
      sendFullState(room, playerId, registry);
    }
  }
}

/**
 * Send one player the full current state. No-op before the game starts.
 */
export function sendFullState(room: Room, playerId: string, registry: ConnectionRegistry): void {
  if (!room.gameState) return;
  const playerIndex = getPlayerIndex(room, playerId);
  if (playerIndex === -1) return;

  registry.sendTo(playerId, {
    type: 'state-update',
    state: partitionState(room, room.gameState, playerIndex),
    message: room.lastMessage,
  });
}

// -- Connection Changes --

/**
 * Handle a player reattaching: resend them the full state, then tell the
 * room.
 */
export function handleReconnection(room: Room, playerId: string, registry: ConnectionRegistry): void {
  const playerSlot = getPlayerIndex(room, playerId);
  if (playerSlot === -1) return;

  sendFullState(room, playerId, registry);
  registry.broadcast(room, { type: 'player-reconnected', playerSlot });
}

/**
 * Handle a player dropping. Their seat and hand stay reserved.
 */
export function handleDisconnection(room: Room, playerId: string, registry: ConnectionRegistry): void {
  const playerSlot = getPlayerIndex(room, playerId);
  if (playerSlot === -1) return;

  registry.broadcast(room, { type: 'player-disconnected', playerSlot });
}
