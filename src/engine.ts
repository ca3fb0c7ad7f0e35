/**
 * Core game engine for The Mind.
 *
 * Players hold `level` cards each and must play every card of the level
 * as one ascending sequence, without any turn order. A card that is not
 * the lowest card held by anyone is a mistake: the cards it skipped are
 * voided and the team loses a life.
 *
 * State machine:
 *   setup → in-progress (deal)
 *   in-progress → level-clear (last hand empties) | lost (lives reach 0)
 *   level-clear → in-progress (next level dealt) | won (level 12 cleared)
 *
 * All transitions are pure: each function returns a new state and never
 * mutates its input.
 */

import type {
  Card,
  DiscardedCard,
  EngineResult,
  GameState,
} from './types.js';
import { MAX_LEVEL, MAX_PLAYERS, MIN_PLAYERS, PLAYER_CONFIG } from './types.js';
import { dealHands } from './deck.js';
import { TerminalStateError, ValidationError } from './errors.js';

// -- Initialization --

export interface GameConfig {
  playerCount: number;
  /** Starting level. Defaults to 1. */
  level?: number;
}

/**
 * Create a game in the `setup` state. Lives follow the player count; every
 * game starts with one throwing star.
 */
export function createGame(config: GameConfig): GameState {
  const setup: { lives: number; stars: number } | undefined = Number.isInteger(config.playerCount)
    ? PLAYER_CONFIG[config.playerCount]
    : undefined;
  if (!setup) {
    throw new ValidationError(
      `Invalid number of players. Must be ${MIN_PLAYERS}-${MAX_PLAYERS}, got ${config.playerCount}`,
      'invalid_message',
    );
  }

  const level = config.level ?? 1;
  if (!Number.isInteger(level) || level < 1 || level > MAX_LEVEL) {
    throw new ValidationError(`Level must be between 1 and ${MAX_LEVEL}`, 'invalid_message');
  }

  return {
    playerCount: config.playerCount,
    level,
    status: 'setup',
    lives: setup.lives,
    maxLives: setup.lives,
    stars: setup.stars,
    maxStars: setup.stars,
    hands: Array.from({ length: config.playerCount }, () => []),
    pile: [],
    discarded: [],
  };
}

/**
 * Deal the current level: `level` cards to every player from a fresh
 * shuffle of 1..100. Clears the pile and the discards. Counters are
 * untouched; the caller sets the level first.
 */
export function setupLevel(state: GameState, rng: () => number): GameState {
  assertNotOver(state);
  return {
    ...state,
    status: 'in-progress',
    hands: dealHands(state.playerCount, state.level, rng),
    pile: [],
    discarded: [],
  };
}

// -- Queries --

/** The lowest card held by any player, or null when every hand is empty. */
export function lowestHeldCard(state: GameState): Card | null {
  let lowest: Card | null = null;
  for (const hand of state.hands) {
    for (const card of hand) {
      if (lowest === null || card < lowest) lowest = card;
    }
  }
  return lowest;
}

/** Highest card on the pile, or 0 before the first play of a level. */
export function pileTop(state: GameState): Card {
  return state.pile.length > 0 ? state.pile[state.pile.length - 1] : 0;
}

export function cardsInPlay(state: GameState): number {
  return state.hands.reduce((sum, hand) => sum + hand.length, 0);
}

export function isGameOver(state: GameState): boolean {
  return state.status === 'won' || state.status === 'lost';
}

// -- Actions --

/**
 * Play `card` from a player's hand.
 *
 * In order (the card is the lowest held anywhere): the card moves to the
 * pile. Out of order: every held card strictly between the pile top and
 * the played card is voided, the card still reaches the pile, and the
 * team loses a life. Both kinds clear the level when the last hand empties.
 */
export function playCard(state: GameState, playerIndex: number, card: Card): EngineResult {
  assertNotOver(state);
  assertInProgress(state, 'play a card');

  const hand = state.hands[playerIndex];
  if (!hand) {
    throw new ValidationError(`Invalid player index: ${playerIndex}`);
  }
  if (!hand.includes(card)) {
    throw new ValidationError(`Player ${playerIndex} does not have card ${card}`);
  }

  if (card === lowestHeldCard(state)) {
    const hands = removeCards(state.hands, [{ playerIndex, card }]);
    const levelClear = allHandsEmpty(hands);
    const next: GameState = {
      ...state,
      hands,
      pile: insertSorted(state.pile, [card]),
      status: levelClear ? 'level-clear' : 'in-progress',
    };

    return {
      state: next,
      effect: { type: 'card-played', playerIndex, card, levelClear },
      message: levelClear
        ? `Card ${card} played. Level ${state.level} complete!`
        : `Card ${card} played.`,
    };
  }

  const floor = pileTop(state);
  const skipped: DiscardedCard[] = [];
  state.hands.forEach((held, index) => {
    for (const c of held) {
      if (c > floor && c < card) skipped.push({ playerIndex: index, card: c });
    }
  });
  skipped.sort((a, b) => a.card - b.card);

  const hands = removeCards(state.hands, [...skipped, { playerIndex, card }]);
  const lives = state.lives - 1;
  const gameLost = lives <= 0;
  const levelClear = !gameLost && allHandsEmpty(hands);

  const next: GameState = {
    ...state,
    hands,
    lives: Math.max(0, lives),
    pile: insertSorted(state.pile, [card]),
    discarded: [...state.discarded, ...skipped.map(d => d.card)],
    status: gameLost ? 'lost' : levelClear ? 'level-clear' : 'in-progress',
  };

  let message = `Card ${card} played out of order! Lost a life.`;
  if (skipped.length > 0) {
    message += ` Discarded ${skipped.map(d => d.card).join(', ')}.`;
  }
  if (gameLost) message += ' Game over.';
  else if (levelClear) message += ` Level ${state.level} complete!`;

  return {
    state: next,
    effect: {
      type: 'mistake',
      playerIndex,
      card,
      discarded: skipped,
      livesLeft: next.lives,
      levelClear,
      gameLost,
    },
    message,
  };
}

/**
 * Spend a throwing star: every player with cards discards their lowest
 * one onto the pile. Skips ordering validation and never costs a life.
 */
export function useThrowingStar(state: GameState): EngineResult {
  assertNotOver(state);
  assertInProgress(state, 'use a throwing star');
  if (state.stars <= 0) {
    throw new ValidationError('No throwing stars left');
  }

  const removed: DiscardedCard[] = [];
  state.hands.forEach((hand, playerIndex) => {
    if (hand.length > 0) removed.push({ playerIndex, card: Math.min(...hand) });
  });
  removed.sort((a, b) => a.card - b.card || a.playerIndex - b.playerIndex);

  const hands = removeCards(state.hands, removed);
  const levelClear = allHandsEmpty(hands);
  const next: GameState = {
    ...state,
    hands,
    stars: state.stars - 1,
    pile: insertSorted(state.pile, removed.map(d => d.card)),
    status: levelClear ? 'level-clear' : 'in-progress',
  };

  let message = `Throwing star used. Discarded ${removed.map(d => d.card).join(', ')}.`;
  if (levelClear) message += ` Level ${state.level} complete!`;

  return {
    state: next,
    effect: { type: 'star-used', discarded: removed, starsLeft: next.stars, levelClear },
    message,
  };
}

/**
 * Move past a cleared level. Clearing level 12 wins the game; otherwise the
 * next level is dealt. Lives and stars carry over.
 * A won game keeps `level` at 12, the last level played.
 */
export function advanceLevel(state: GameState, rng: () => number): EngineResult {
  assertNotOver(state);
  if (state.status !== 'level-clear') {
    throw new ValidationError(`Level ${state.level} is not complete`);
  }

  if (state.level >= MAX_LEVEL) {
    return {
      state: { ...state, status: 'won' },
      effect: { type: 'game-won', level: state.level },
      message: `All ${MAX_LEVEL} levels complete! You win!`,
    };
  }

  const level = state.level + 1;
  return {
    state: setupLevel({ ...state, level }, rng),
    effect: { type: 'level-started', level },
    message: `Level ${level} started.`,
  };
}

// -- Helpers --

function assertNotOver(state: GameState): void {
  if (isGameOver(state)) {
    throw new TerminalStateError(state.status === 'won' ? 'Game already won' : 'Game already lost');
  }
}

function assertInProgress(state: GameState, action: string): void {
  if (state.status !== 'in-progress') {
    throw new ValidationError(`Cannot ${action} while the game is ${state.status}`);
  }
}

function allHandsEmpty(hands: Card[][]): boolean {
  return hands.every(hand => hand.length === 0);
}

function removeCards(hands: Card[][], cards: DiscardedCard[]): Card[][] {
  return hands.map((hand, index) =>
    hand.filter(c => !cards.some(d => d.playerIndex === index && d.card === c)),
  );
}

/** Merge cards into an ascending pile. */
function insertSorted(pile: Card[], cards: Card[]): Card[] {
  return [...pile, ...cards].sort((a, b) => a - b);
}
