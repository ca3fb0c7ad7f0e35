/**
 * The Mind: core game engine and multiplayer server.
 *
 * Public API surface for the game state machine and the room server.
 */

// Types
export type {
  Card,
  GameStatus,
  GameState,
  DiscardedCard,
  CardPlayedEffect,
  MistakeEffect,
  StarUsedEffect,
  LevelStartedEffect,
  GameWonEffect,
  GameEffect,
  EngineResult,
} from './types.js';

export {
  CARD_MIN,
  CARD_MAX,
  MAX_LEVEL,
  MIN_PLAYERS,
  MAX_PLAYERS,
  PLAYER_CONFIG,
} from './types.js';

// Errors
export type { ErrorCode } from './errors.js';
export { GameError, ValidationError, TerminalStateError, NotFoundError, isGameError } from './errors.js';

// Deck
export { createRng, shuffle, buildDeck, drawCards, dealHands } from './deck.js';

// Engine
export type { GameConfig } from './engine.js';
export {
  createGame,
  setupLevel,
  lowestHeldCard,
  pileTop,
  cardsInPlay,
  isGameOver,
  playCard,
  useThrowingStar,
  advanceLevel,
} from './engine.js';

// Multiplayer server
export * from './server/index.js';
