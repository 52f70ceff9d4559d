/**
 * Layerlink rules engine.
 *
 * Owns turn order, legal-move generation, move application, undo and win
 * detection. State objects are plain data mutated only through this class;
 * search code works on clones obtained from `clone` or `passTurn`.
 *
 * Placement rule:
 *   - primary mode: the start cell's primary layer is empty; every cell
 *     must have both layers empty and receives a primary stone.
 *   - bridge mode: the start cell's primary layer holds the mover's stone;
 *     every cell must have an empty secondary layer and a primary layer that
 *     is empty or the mover's own, and receives a secondary stone. The last
 *     cell must be an own primary stone (the anchor).
 */
import { Board } from './board';
import { IllegalMoveError, IllegalMoveReason, InvalidConfigError, NothingToUndoError } from './errors';
import { formatMove, validatePath } from './move';
import {
  ALL_DIRECTIONS,
  Cell,
  DEFAULT_BLOCKS,
  DEFAULT_BOARD_SIZE,
  DIRECTION_STEPS,
  GameState,
  GameSummary,
  InitialConfig,
  Layer,
  MAX_BLOCK_LENGTH,
  MIN_BLOCK_LENGTH,
  MAX_BOARD_SIZE,
  MIN_BOARD_SIZE,
  Move,
  PathCell,
  Player,
  PlayerBlocks,
  opponentOf,
} from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger('rules');

export interface NewGameOptions {
  /** Starting long-block inventory per player. Defaults to one of each. */
  blocks?: Partial<Record<Player, PlayerBlocks>>;
}

export interface LegalMoveOptions {
  /** Drop paths that repeat an earlier one in reverse. Default true. */
  dedupe?: boolean;
}

export type MoveValidation =
  | { valid: true }
  | { valid: false; reason: IllegalMoveReason; message: string };

export function hasBlock(blocks: Readonly<PlayerBlocks>, length: number): boolean {
  if (length === 3) return true;
  if (length === 4) return blocks.len4 > 0;
  if (length === 5) return blocks.len5 > 0;
  return false;
}

/** Whether a path in the given mode may continue onto this cell. */
function canExtendOnto(cell: Cell, mode: Layer, player: Player): boolean {
  if (cell.secondary !== null) return false;
  if (mode === 'primary') return cell.primary === null;
  return cell.primary === null || cell.primary === player;
}

/** Mode a move starting on this cell runs in, or null if none may start here. */
function startMode(cell: Cell, player: Player): Layer | null {
  if (cell.secondary !== null) return null;
  if (cell.primary === null) return 'primary';
  if (cell.primary === player) return 'secondary';
  return null;
}

function validateBlocks(blocks: PlayerBlocks, player: Player): PlayerBlocks {
  for (const [key, value] of Object.entries(blocks)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidConfigError(`Block count ${key} for player ${player} must be a non-negative integer`, { player, key, value });
    }
  }
  return { len4: blocks.len4, len5: blocks.len5 };
}

export class RulesEngine {
  /**
   * Start a game on an empty size × size board with A to move.
   */
  newGame(size: number = DEFAULT_BOARD_SIZE, options: NewGameOptions = {}): GameState {
    if (!Number.isInteger(size) || size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
      throw new InvalidConfigError(
        `Board size must be an integer from ${MIN_BOARD_SIZE} to ${MAX_BOARD_SIZE}`,
        { size },
      );
    }

    const initial: InitialConfig = Object.freeze({
      size,
      blocks: Object.freeze({
        A: Object.freeze(validateBlocks(options.blocks?.A ?? DEFAULT_BLOCKS, 'A')),
        B: Object.freeze(validateBlocks(options.blocks?.B ?? DEFAULT_BLOCKS, 'B')),
      }),
    });

    return this.fromInitial(initial);
  }

  /** Fresh state for a recorded starting configuration. */
  fromInitial(initial: InitialConfig): GameState {
    return {
      initial,
      board: new Board(initial.size),
      currentPlayer: 'A',
      blocks: {
        A: { ...initial.blocks.A },
        B: { ...initial.blocks.B },
      },
      history: [],
      winner: null,
    };
  }

  /**
   * Every legal move for the side to move.
   *
   * Scans all cells in all four directions. A path and its reverse are
   * the same move; unless `dedupe` is false only the first one found is
   * kept.
   */
  legalMoves(state: GameState, options: LegalMoveOptions = {}): Move[] {
    if (state.winner !== null) return [];

    const { board, currentPlayer: player } = state;
    const inventory = state.blocks[player];
    const seen = options.dedupe === false ? null : new Set<string>();
    const timestamp = Date.now();
    const moves: Move[] = [];

    for (let row = 0; row < board.size; row++) {
      for (let col = 0; col < board.size; col++) {
        const mode = startMode(board.get(row, col), player);
        if (mode === null) continue;

        for (const direction of ALL_DIRECTIONS) {
          const [dr, dc] = DIRECTION_STEPS[direction];
          const path: PathCell[] = [{ row, col, layer: mode }];
          let r = row;
          let c = col;

          while (path.length < MAX_BLOCK_LENGTH) {
            r += dr;
            c += dc;
            if (!board.isInside(r, c)) break;

            const next = board.get(r, c);
            if (!canExtendOnto(next, mode, player)) break;
            path.push({ row: r, col: c, layer: mode });

            if (path.length < MIN_BLOCK_LENGTH) continue;
            // Bridges must land on an existing anchor.
            if (mode === 'secondary' && next.primary !== player) continue;
            if (!hasBlock(inventory, path.length)) continue;

            if (seen) {
              const key = pathKey(row, col, r, c, mode);
              if (seen.has(key)) continue;
              seen.add(key);
            }
            moves.push({ player, path: path.slice(), timestamp });
          }
        }
      }
    }

    return moves;
  }

  /**
   * Check a move against the current state without touching it.
   * Covers moves from any source, not only the generator.
   */
  validateMove(state: GameState, move: Move): MoveValidation {
    if (state.winner !== null) {
      return { valid: false, reason: 'GAME_OVER', message: `Game is already won by ${state.winner}` };
    }
    if (move.player !== state.currentPlayer) {
      return { valid: false, reason: 'WRONG_PLAYER', message: `Not player ${move.player}'s turn` };
    }

    const shape = validatePath(move.path);
    if (!shape.ok) {
      return { valid: false, reason: 'BAD_STRUCTURE', message: shape.message };
    }

    const length = move.path.length;
    if (!hasBlock(state.blocks[move.player], length)) {
      return { valid: false, reason: 'NO_INVENTORY', message: `No length-${length} blocks left for player ${move.player}` };
    }

    const { board } = state;
    for (const { row, col } of move.path) {
      if (!board.isInside(row, col)) {
        return { valid: false, reason: 'OUT_OF_BOUNDS', message: `Position out of bounds: (${row}, ${col})` };
      }
    }

    const [start, ...rest] = move.path;
    const mode = startMode(board.get(start.row, start.col), move.player);
    if (mode !== start.layer) {
      return {
        valid: false,
        reason: 'BAD_PLACEMENT',
        message: `Cannot start a ${start.layer} move at (${start.row}, ${start.col})`,
      };
    }

    for (const { row, col } of rest) {
      if (!canExtendOnto(board.get(row, col), mode, move.player)) {
        return { valid: false, reason: 'BAD_PLACEMENT', message: `Cannot place on ${mode} layer at (${row}, ${col})` };
      }
    }

    if (mode === 'secondary') {
      const end = move.path[length - 1];
      if (board.getLayer(end.row, end.col, 'primary') !== move.player) {
        return { valid: false, reason: 'BAD_PLACEMENT', message: 'Bridge must end on an existing own stone' };
      }
    }

    return { valid: true };
  }

  /**
   * Apply a move. Throws IllegalMoveError, leaving the state unchanged,
   * if the move is not legal. A winning move does not pass the turn.
   */
  applyMove(state: GameState, move: Move): void {
    const check = this.validateMove(state, move);
    if (!check.valid) {
      throw new IllegalMoveError(check.reason, check.message, { player: move.player, length: move.path.length });
    }

    for (const { row, col, layer } of move.path) {
      state.board.set(row, col, layer, move.player);
    }

    const inventory = state.blocks[move.player];
    if (move.path.length === 4) inventory.len4--;
    if (move.path.length === 5) inventory.len5--;

    state.history.push(move);

    if (state.board.hasConnection(move.player)) {
      state.winner = move.player;
    } else {
      state.currentPlayer = opponentOf(move.player);
    }

    logger.trace({ move: formatMove(move), winner: state.winner }, 'move applied');
  }

  /**
   * Take back the most recent move. Repeated calls walk further back.
   */
  undo(state: GameState): Move {
    const last = state.history.pop();
    if (!last) {
      throw new NothingToUndoError();
    }

    for (const { row, col, layer } of last.path) {
      state.board.set(row, col, layer, null);
    }

    const inventory = state.blocks[last.player];
    if (last.path.length === 4) inventory.len4++;
    if (last.path.length === 5) inventory.len5++;

    state.currentPlayer = last.player;
    state.winner = null;

    logger.trace({ move: formatMove(last) }, 'move undone');
    return last;
  }

  /** Deep, independently owned copy. */
  clone(state: GameState): GameState {
    return {
      initial: state.initial,
      board: state.board.clone(),
      currentPlayer: state.currentPlayer,
      blocks: {
        A: { ...state.blocks.A },
        B: { ...state.blocks.B },
      },
      history: [...state.history],
      winner: state.winner,
    };
  }

  /**
   * Clone with a different side to move. Lets search code ask "what could
   * this player do if it were their turn" without touching the original.
   */
  passTurn(state: GameState, player: Player): GameState {
    const copy = this.clone(state);
    copy.currentPlayer = player;
    return copy;
  }

  isTerminal(state: GameState): boolean {
    return state.winner !== null;
  }

  summary(state: GameState): GameSummary {
    return {
      boardSize: state.board.size,
      currentPlayer: state.currentPlayer,
      moveCount: state.history.length,
      blocks: {
        A: { ...state.blocks.A },
        B: { ...state.blocks.B },
      },
      winner: state.winner,
      isGameOver: state.winner !== null,
      legalMoveCount: this.legalMoves(state).length,
    };
  }
}

/** Endpoint-ordered key; a straight path is fixed by its ends and layer. */
function pathKey(r1: number, c1: number, r2: number, c2: number, mode: Layer): string {
  const forward = r1 < r2 || (r1 === r2 && c1 <= c2);
  return forward ? `${r1},${c1},${r2},${c2},${mode}` : `${r2},${c2},${r1},${c1},${mode}`;
}
