/**
 * Move model: construction, structural checks and identity.
 *
 * Structural checks cover only the shape of the path (length, straight
 * line, unit steps, single layer). Whether the cells may be written is
 * the rules engine's job.
 */
import {
  Layer,
  MAX_BLOCK_LENGTH,
  MIN_BLOCK_LENGTH,
  Move,
  PathCell,
  Player,
} from './types';

export type PathCheck = { ok: true } | { ok: false; message: string };

export function createMove(
  player: Player,
  path: readonly PathCell[],
  timestamp: number = Date.now(),
): Move {
  return {
    player,
    path: path.map(({ row, col, layer }) => ({ row, col, layer })),
    timestamp,
  };
}

export function blockLength(move: Move): number {
  return move.path.length;
}

/** Bridge moves write to the secondary layer, starting on an own anchor. */
export function isBridgeMove(move: Move): boolean {
  return move.path.length > 0 && move.path[0].layer === 'secondary';
}

export function moveMode(move: Move): Layer {
  return isBridgeMove(move) ? 'secondary' : 'primary';
}

export function moveDirection(move: Move): 'horizontal' | 'vertical' | 'invalid' {
  if (move.path.length < 2) return 'invalid';
  const [first, second] = move.path;
  if (first.row === second.row) return 'horizontal';
  if (first.col === second.col) return 'vertical';
  return 'invalid';
}

/**
 * Check path shape: 3 to 5 cells in one row or column, each one step
 * from the previous, no repeats, and every cell on the same layer.
 */
export function validatePath(path: readonly PathCell[]): PathCheck {
  if (path.length < MIN_BLOCK_LENGTH || path.length > MAX_BLOCK_LENGTH) {
    return { ok: false, message: `Path length must be between ${MIN_BLOCK_LENGTH} and ${MAX_BLOCK_LENGTH}, got ${path.length}` };
  }

  const first = path[0];
  const sameRow = path.every(cell => cell.row === first.row);
  const sameCol = path.every(cell => cell.col === first.col);
  if (!sameRow && !sameCol) {
    return { ok: false, message: 'Path is not a straight line' };
  }

  for (let i = 1; i < path.length; i++) {
    const prev = path[i - 1];
    const cell = path[i];
    const step = Math.abs(cell.row - prev.row) + Math.abs(cell.col - prev.col);
    if (step !== 1) {
      return { ok: false, message: `Path is not contiguous at index ${i}` };
    }
  }

  // Unit steps along one axis can still double back (e.g. 0,1,0).
  const seen = new Set(path.map(cell => `${cell.row},${cell.col}`));
  if (seen.size !== path.length) {
    return { ok: false, message: 'Path repeats a cell' };
  }

  if (!path.every(cell => cell.layer === first.layer)) {
    return { ok: false, message: 'Path mixes primary and secondary layers' };
  }

  return { ok: true };
}

/**
 * Canonical identity of a move. Ignores the timestamp and the direction
 * the path was written in, so a path and its reverse share a key.
 */
export function moveKey(move: Move): string {
  const cells = move.path
    .map(cell => `${cell.row}:${cell.col}:${cell.layer === 'primary' ? 'p' : 's'}`)
    .sort();
  return `${move.player}|${cells.join(',')}`;
}

export function movesEqual(a: Move, b: Move): boolean {
  return moveKey(a) === moveKey(b);
}

export function formatMove(move: Move): string {
  const start = move.path[0];
  const end = move.path[move.path.length - 1];
  const mode = isBridgeMove(move) ? 'bridge' : 'place';
  return `${move.player} ${mode} ${move.path.length} (${start.row},${start.col})->(${end.row},${end.col})`;
}
