/**
 * Core type definitions for the Layerlink game model.
 * Board cells, moves, game state, and search results are represented here.
 */
import type { Board } from './board';

// ─── Player ──────────────────────────────────────────────────────────
/** A connects the top edge to the bottom edge, B connects left to right. */
export type Player = 'A' | 'B';

export function opponentOf(player: Player): Player {
  return player === 'A' ? 'B' : 'A';
}

// ─── Board cells ─────────────────────────────────────────────────────
export type Layer = 'primary' | 'secondary';

export type CellValue = Player | null;

export interface Cell {
  readonly primary: CellValue;
  readonly secondary: CellValue;
}

export type Edge = 'top' | 'bottom' | 'left' | 'right';

export interface StoneCount {
  readonly primary: number;
  readonly secondary: number;
  readonly total: number;
}

// ─── Moves ───────────────────────────────────────────────────────────
export interface PathCell {
  readonly row: number;
  readonly col: number;
  readonly layer: Layer;
}

export interface Move {
  readonly player: Player;
  readonly path: readonly PathCell[];
  /** Creation time in ms since epoch. Ordering metadata only. */
  readonly timestamp: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTION_STEPS: Readonly<Record<Direction, readonly [number, number]>> = {
  up: [-1, 0],
  down: [1, 0],
  left: [0, -1],
  right: [0, 1],
};

export const ALL_DIRECTIONS: readonly Direction[] = ['right', 'down', 'left', 'up'] as const;

export const MIN_BLOCK_LENGTH = 3;
export const MAX_BLOCK_LENGTH = 5;

// ─── Inventory ───────────────────────────────────────────────────────
/** Remaining long blocks. Length-3 blocks are unlimited and untracked. */
export interface PlayerBlocks {
  len4: number;
  len5: number;
}

export const DEFAULT_BLOCKS: Readonly<PlayerBlocks> = { len4: 1, len5: 1 };

export const DEFAULT_BOARD_SIZE = 18;
export const MIN_BOARD_SIZE = 3;
export const MAX_BOARD_SIZE = 64;

// ─── Game state ──────────────────────────────────────────────────────
export interface InitialConfig {
  readonly size: number;
  readonly blocks: Readonly<Record<Player, Readonly<PlayerBlocks>>>;
}

/**
 * Mutable game state. Only the rules engine writes to it.
 */
export interface GameState {
  readonly initial: InitialConfig;
  board: Board;
  currentPlayer: Player;
  blocks: Record<Player, PlayerBlocks>;
  history: Move[];
  winner: Player | null;
}

export interface GameSummary {
  readonly boardSize: number;
  readonly currentPlayer: Player;
  readonly moveCount: number;
  readonly blocks: Readonly<Record<Player, Readonly<PlayerBlocks>>>;
  readonly winner: Player | null;
  readonly isGameOver: boolean;
  readonly legalMoveCount: number;
}

// ─── Wire shapes ─────────────────────────────────────────────────────
export interface StateSnapshot {
  readonly size: number;
  readonly board: Cell[][];
  readonly currentPlayer: Player;
  readonly inventory: Record<Player, PlayerBlocks>;
  readonly winner: Player | null;
  readonly moveCount: number;
}

export interface GameRecord {
  readonly version: 1;
  readonly initial: InitialConfig;
  readonly moves: readonly Move[];
  readonly winner: Player | null;
}

// ─── Search ──────────────────────────────────────────────────────────
export interface CandidateStats {
  readonly move: Move;
  readonly visits: number;
  readonly winRate: number;
}

/** Which root shortcut, if any, decided the search. */
export type ShortCircuit = 'win' | 'block' | null;

export interface SearchResult {
  readonly move: Move;
  readonly simulations: number;
  readonly nodesCreated: number;
  readonly elapsedSeconds: number;
  readonly topCandidates: readonly CandidateStats[];
  readonly shortCircuit: ShortCircuit;
}
