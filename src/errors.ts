/**
 * Error taxonomy shared by the engine and the server.
 *
 * Every error a client can cause carries a stable wire code. The server
 * reports these to the originating connection only.
 */

export type ErrorCode =
  | 'invalid_message'
  | 'invalid_move'
  | 'room_full'
  | 'already_in_room'
  | 'not_in_room'
  | 'game_not_started'
  | 'game_over'
  | 'room_not_found'
  | 'player_not_found'
  | 'invalid_session'
  | 'internal_error';

export class GameError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input or a rule violation. Never mutates state. */
export class ValidationError extends GameError {
  constructor(message: string, code: ErrorCode = 'invalid_move') {
    super(code, message);
  }
}

/** Action submitted after the game was won or lost. */
export class TerminalStateError extends GameError {
  constructor(message = 'Game is over') {
    super('game_over', message);
  }
}

/** Unknown room, player or session. */
export class NotFoundError extends GameError {
  constructor(code: 'room_not_found' | 'player_not_found' | 'invalid_session', message: string) {
    super(code, message);
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
