/**
 * State partitioning: splits the authoritative GameState into per-client views.
 *
 * Each client receives:
 *   - Its own hand, card by card
 *   - Hand sizes only for every other seat
 *   - Shared state (pile, discards, lives, stars, level, status)
 */

import type { GameState } from '../types.js';
import { cardsInPlay } from '../engine.js';
import type { ClientGameState, PrivatePlayerState, PublicPlayerState, Room } from './types.js';

/**
 * Build the client-visible game state for the player in `playerIndex`.
 */
export function partitionState(room: Room, state: GameState, playerIndex: number): ClientGameState {
  if (playerIndex < 0 || playerIndex >= state.playerCount) {
    throw new Error(`Invalid playerIndex: ${playerIndex}`);
  }

  const opponents: PublicPlayerState[] = [];
  for (let i = 0; i < state.playerCount; i++) {
    if (i !== playerIndex) opponents.push(buildPublicState(room, state, i));
  }

  return {
    roomId: room.id,
    level: state.level,
    status: state.status,
    lives: state.lives,
    maxLives: state.maxLives,
    stars: state.stars,
    maxStars: state.maxStars,
    pile: [...state.pile],
    discarded: [...state.discarded],
    cardsInPlay: cardsInPlay(state),
    self: buildPrivateState(room, state, playerIndex),
    opponents,
    lastEffect: room.lastEffect,
  };
}

export function buildPrivateState(room: Room, state: GameState, slot: number): PrivatePlayerState {
  const playerId = room.playerIds[slot];
  return {
    slot,
    name: seatName(room, slot),
    hand: [...state.hands[slot]].sort((a, b) => a - b),
    connected: playerId !== undefined && room.connectedPlayerIds.has(playerId),
  };
}

export function buildPublicState(room: Room, state: GameState, slot: number): PublicPlayerState {
  const playerId = room.playerIds[slot];
  return {
    slot,
    name: seatName(room, slot),
    handCount: state.hands[slot].length,
    connected: playerId !== undefined && room.connectedPlayerIds.has(playerId),
  };
}

function seatName(room: Room, slot: number): string {
  const playerId = room.playerIds[slot];
  return (playerId !== undefined ? room.playerNames.get(playerId) : undefined) ?? `Player ${slot + 1}`;
}
