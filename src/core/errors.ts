/**
 * Game domain errors.
 *
 * Every rules-engine refusal is one of these. They are recoverable: the
 * engine validates before it writes, so the state a caller passed in is
 * exactly as it was when the error reaches them.
 *
 * ```typescript
 * try {
 *   engine.applyMove(state, move);
 * } catch (err) {
 *   if (err instanceof IllegalMoveError) {
 *     logger.warn(err.toJSON(), 'move refused');
 *   }
 * }
 * ```
 */

export enum GameErrorCode {
  ILLEGAL_MOVE = 'ILLEGAL_MOVE',
  NOTHING_TO_UNDO = 'NOTHING_TO_UNDO',
  NO_LEGAL_MOVES = 'NO_LEGAL_MOVES',
  INVALID_RECORD = 'INVALID_RECORD',
  INVALID_CONFIG = 'INVALID_CONFIG',
  BOARD_OUT_OF_RANGE = 'BOARD_OUT_OF_RANGE',
}

/** Why a move was refused. */
export type IllegalMoveReason =
  | 'GAME_OVER'
  | 'WRONG_PLAYER'
  | 'BAD_STRUCTURE'
  | 'NO_INVENTORY'
  | 'OUT_OF_BOUNDS'
  | 'BAD_PLACEMENT';

export interface GameErrorJSON {
  error: true;
  type: string;
  code: GameErrorCode;
  message: string;
  context: Record<string, unknown>;
}

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class IllegalMoveError extends GameError {
  readonly reason: IllegalMoveReason;

  constructor(reason: IllegalMoveReason, message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.ILLEGAL_MOVE, message, { ...context, reason });
    this.name = 'IllegalMoveError';
    this.reason = reason;
  }
}

export class NothingToUndoError extends GameError {
  constructor() {
    super(GameErrorCode.NOTHING_TO_UNDO, 'No moves to undo');
    this.name = 'NothingToUndoError';
  }
}

/**
 * The side to move has no legal move and nobody has won. The engine makes
 * no stalemate ruling; the caller decides what that means.
 */
export class NoLegalMovesError extends GameError {
  constructor(context: Record<string, unknown> = {}) {
    super(GameErrorCode.NO_LEGAL_MOVES, 'No legal moves available', context);
    this.name = 'NoLegalMovesError';
  }
}

export class InvalidRecordError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.INVALID_RECORD, message, context);
    this.name = 'InvalidRecordError';
  }
}

export class InvalidConfigError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.INVALID_CONFIG, message, context);
    this.name = 'InvalidConfigError';
  }
}

export class BoardRangeError extends GameError {
  constructor(row: number, col: number, size: number) {
    super(GameErrorCode.BOARD_OUT_OF_RANGE, `Invalid position: (${row}, ${col})`, { row, col, size });
    this.name = 'BoardRangeError';
  }
}
