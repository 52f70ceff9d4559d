/**
 * Public API: rules engine, records, and move search.
 */
export { Board } from './core/board';
export { RulesEngine, hasBlock } from './core/rules';
export type { LegalMoveOptions, MoveValidation, NewGameOptions } from './core/rules';
export {
  blockLength,
  createMove,
  formatMove,
  isBridgeMove,
  moveDirection,
  moveKey,
  moveMode,
  movesEqual,
  validatePath,
} from './core/move';
export type { PathCheck } from './core/move';
export { exportRecord, importRecord, parseMove, snapshotState } from './core/record';
export {
  BoardRangeError,
  GameError,
  GameErrorCode,
  IllegalMoveError,
  InvalidConfigError,
  InvalidRecordError,
  NoLegalMovesError,
  NothingToUndoError,
} from './core/errors';
export type { GameErrorJSON, IllegalMoveReason } from './core/errors';
export * from './core/types';
export * from './search';
