/**
 * Core type definitions for the Mind game engine.
 */

// -- Cards --

/** A card is its face value, 1..100. */
export type Card = number;

export const CARD_MIN = 1;
export const CARD_MAX = 100;

// -- Levels --

export const MAX_LEVEL = 12;

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 4;

/** Lives and throwing stars a game starts with, by player count. */
export const PLAYER_CONFIG: Record<number, { lives: number; stars: number }> = {
  2: { lives: 2, stars: 1 },
  3: { lives: 3, stars: 1 },
  4: { lives: 4, stars: 1 },
};

// -- Game State --

export type GameStatus = 'setup' | 'in-progress' | 'level-clear' | 'won' | 'lost';

export interface GameState {
  playerCount: number;
  level: number;
  status: GameStatus;
  lives: number;
  maxLives: number;
  stars: number;
  maxStars: number;
  /** One ascending hand per player index. */
  hands: Card[][];
  /** Cards committed this level, strictly increasing. */
  pile: Card[];
  /** Cards voided face-up by mistakes this level. */
  discarded: Card[];
}

// -- Effects --

export interface DiscardedCard {
  playerIndex: number;
  card: Card;
}

export interface CardPlayedEffect {
  type: 'card-played';
  playerIndex: number;
  card: Card;
  levelClear: boolean;
}

export interface MistakeEffect {
  type: 'mistake';
  playerIndex: number;
  card: Card;
  /** Held cards skipped over by the play, in ascending order. */
  discarded: DiscardedCard[];
  livesLeft: number;
  levelClear: boolean;
  gameLost: boolean;
}

export interface StarUsedEffect {
  type: 'star-used';
  /** Each player's lowest card, in the order they reached the pile. */
  discarded: DiscardedCard[];
  starsLeft: number;
  levelClear: boolean;
}

export interface LevelStartedEffect {
  type: 'level-started';
  level: number;
}

export interface GameWonEffect {
  type: 'game-won';
  level: number;
}

export type GameEffect =
  | CardPlayedEffect
  | MistakeEffect
  | StarUsedEffect
  | LevelStartedEffect
  | GameWonEffect;

export interface EngineResult {
  state: GameState;
  effect: GameEffect;
  /** Human-readable summary of the effect. */
  message: string;
}
