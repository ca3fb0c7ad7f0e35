/**
 * Deck management: seeded shuffle and per-level dealing.
 *
 * All operations are pure functions. Shuffle uses a seeded PRNG for
 * deterministic replay.
 */

import type { Card } from './types.js';
import { CARD_MIN, CARD_MAX } from './types.js';

/**
 * Seeded pseudo-random number generator (mulberry32).
 * Returns a function that produces the next random number in [0, 1).
 */
export function createRng(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle using provided RNG.
 * Returns a new shuffled array (does not mutate input).
 */
export function shuffle<T>(items: T[], rng: () => number): T[] {
  const arr = [...items];
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}

/** The full 1..100 deck in ascending order. */
export function buildDeck(): Card[] {
  return Array.from({ length: CARD_MAX - CARD_MIN + 1 }, (_, i) => CARD_MIN + i);
}

/**
 * Draw `count` distinct cards without replacement. Every combination of
 * `count` cards is equally likely.
 */
export function drawCards(count: number, rng: () => number): Card[] {
  const deck = buildDeck();
  if (count < 0 || count > deck.length) {
    throw new Error(`Cannot draw ${count} cards from a deck of ${deck.length}`);
  }
  return shuffle(deck, rng).slice(0, count);
}

/**
 * Deal `cardsPerPlayer` cards to each of `playerCount` hands.
 * Hands are sorted ascending and never share a card.
 */
export function dealHands(
  playerCount: number,
  cardsPerPlayer: number,
  rng: () => number,
): Card[][] {
  const pool = drawCards(playerCount * cardsPerPlayer, rng);
  const hands: Card[][] = [];
  for (let p = 0; p < playerCount; p++) {
    const hand = pool.slice(p * cardsPerPlayer, (p + 1) * cardsPerPlayer);
    hands.push(hand.sort((a, b) => a - b));
  }
  return hands;
}
