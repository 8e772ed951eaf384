// src/engine/errors.ts

export type EngineErrorCode =
  | "ILLEGAL_ROLL_REQUEST"
  | "ILLEGAL_MOVE"
  | "GAME_OVER"
  | "INVALID_INPUT";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class IllegalRollRequestError extends EngineError {
  constructor(message: string) {
    super("ILLEGAL_ROLL_REQUEST", message);
  }
}

export class IllegalMoveError extends EngineError {
  constructor(message: string) {
    super("ILLEGAL_MOVE", message);
  }
}

export class GameOverError extends EngineError {
  constructor(message = "Game is over; no further rolls or moves are accepted.") {
    super("GAME_OVER", message);
  }
}

export class InvalidConfigError extends EngineError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
