/**
 * Builders shared by unit and integration tests.
 */
import { createMove } from '../src/core/move';
import { RulesEngine } from '../src/core/rules';
import { GameState, Layer, Move, PathCell, Player } from '../src/core/types';

export function cells(layer: Layer, ...coords: [number, number][]): PathCell[] {
  return coords.map(([row, col]) => ({ row, col, layer }));
}

export function vertical(player: Player, col: number, fromRow: number, length: number, layer: Layer = 'primary'): Move {
  const path = Array.from({ length }, (_, i) => ({ row: fromRow + i, col, layer }));
  return createMove(player, path, 0);
}

export function horizontal(player: Player, row: number, fromCol: number, length: number, layer: Layer = 'primary'): Move {
  const path = Array.from({ length }, (_, i) => ({ row, col: fromCol + i, layer }));
  return createMove(player, path, 0);
}

/** New game with primary stones placed directly, bypassing turn order. */
export function withStones(
  engine: RulesEngine,
  size: number,
  stones: Partial<Record<Player, [number, number][]>>,
  toMove: Player = 'A',
): GameState {
  const state = engine.newGame(size);
  for (const player of ['A', 'B'] as const) {
    for (const [row, col] of stones[player] ?? []) {
      state.board.set(row, col, 'primary', player);
    }
  }
  state.currentPlayer = toMove;
  return state;
}

export function covers(move: Move, row: number, col: number): boolean {
  return move.path.some(cell => cell.row === row && cell.col === col);
}
