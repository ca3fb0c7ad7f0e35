import { describe, it, expect } from 'vitest';
import { partitionState, buildPrivateState, buildPublicState } from '../state-partition.js';
import { createRoom, joinRoom, disconnectPlayer } from '../room.js';
import { createGame } from '../../engine.js';
import { createRng } from '../../deck.js';
import type { GameState } from '../../types.js';
import type { Room } from '../types.js';

function createTestRoom(): { room: Room; state: GameState } {
  const room = createRoom('ROOM22', { name: 'Den', capacity: 3, rng: createRng(1) });
  joinRoom(room, 'p1', 'Ana');
  joinRoom(room, 'p2', 'Ben');
  joinRoom(room, 'p3', 'Cy');

  const state: GameState = {
    ...createGame({ playerCount: 3, level: 2 }),
    status: 'in-progress',
    hands: [[40, 12], [77, 55], [3, 90]],
    pile: [2],
    discarded: [1],
  };
  room.gameState = state;
  room.lastEffect = { type: 'level-started', level: 2 };
  return { room, state };
}

describe('partitionState', () => {
  it('shows a player only their own cards', () => {
    const { room, state } = createTestRoom();
    const view = partitionState(room, state, 1);

    expect(view.self).toEqual({ slot: 1, name: 'Ben', hand: [55, 77], connected: true });
    expect(view.opponents).toEqual([
      { slot: 0, name: 'Ana', handCount: 2, connected: true },
      { slot: 2, name: 'Cy', handCount: 2, connected: true },
    ]);
    for (const opponent of view.opponents) {
      expect(opponent).not.toHaveProperty('hand');
    }
  });

  it('copies the shared state', () => {
    const { room, state } = createTestRoom();
    const view = partitionState(room, state, 0);

    expect(view).toMatchObject({
      roomId: 'ROOM22',
      level: 2,
      status: 'in-progress',
      lives: 3,
      maxLives: 3,
      stars: 1,
      maxStars: 1,
      pile: [2],
      discarded: [1],
      cardsInPlay: 6,
      lastEffect: { type: 'level-started', level: 2 },
    });
    expect(view.pile).not.toBe(state.pile);
  });

  it('flags disconnected seats', () => {
    const { room, state } = createTestRoom();
    disconnectPlayer(room, 'p3');

    const view = partitionState(room, state, 0);
    expect(view.opponents[1].connected).toBe(false);
  });

  it('rejects an out-of-range seat', () => {
    const { room, state } = createTestRoom();
    expect(() => partitionState(room, state, 3)).toThrow('Invalid playerIndex: 3');
  });
});

describe('buildPrivateState', () => {
  it('returns a sorted copy of the hand', () => {
    const { room, state } = createTestRoom();
    const own = buildPrivateState(room, state, 0);

    expect(own.hand).toEqual([12, 40]);
    expect(state.hands[0]).toEqual([40, 12]);
  });
});

describe('buildPublicState', () => {
  it('exposes the hand size and nothing else', () => {
    const { room, state } = createTestRoom();
    const view = buildPublicState(room, state, 2);

    expect(view).toEqual({ slot: 2, name: 'Cy', handCount: 2, connected: true });
    expect(Object.keys(view)).not.toContain('hand');
  });
});
