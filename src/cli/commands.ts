/**
 * Command bodies behind the CLI, kept apart from commander so they can be
 * driven directly from tests.
 */
import { readFile, writeFile } from 'fs/promises';
import { formatMove } from '../core/move';
import { exportRecord, importRecord } from '../core/record';
import { RulesEngine } from '../core/rules';
import { GameState, Move, Player } from '../core/types';
import { SearchConfig } from '../search/config';
import { MoveSearch } from '../search/moveSearch';
import { createLogger } from '../utils/logger';

const logger = createLogger('cli');

export type SelfPlayEnd = 'win' | 'stalemate' | 'move-limit';

export interface SelfPlayOptions {
  size: number;
  players: Record<Player, MoveSearch>;
  search?: Partial<SearchConfig>;
  /** Stop after this many moves without a winner. */
  maxMoves?: number;
  onMove?: (move: Move, state: GameState) => void;
}

export interface SelfPlayResult {
  state: GameState;
  endReason: SelfPlayEnd;
}

/**
 * Play one game between two searchers. With a seed in `search`, move n
 * searches with seed + n, so a whole game replays exactly.
 */
export function runSelfPlay(engine: RulesEngine, options: SelfPlayOptions): SelfPlayResult {
  const state = engine.newGame(options.size);
  const maxMoves = options.maxMoves ?? options.size * options.size * 2;
  const base = options.search ?? {};

  while (state.winner === null) {
    if (state.history.length >= maxMoves) {
      return { state, endReason: 'move-limit' };
    }
    if (engine.legalMoves(state).length === 0) {
      logger.info({ player: state.currentPlayer }, 'side to move has no legal moves');
      return { state, endReason: 'stalemate' };
    }

    const ply = state.history.length;
    const config = base.seed === undefined ? base : { ...base, seed: base.seed + ply };
    const result = options.players[state.currentPlayer].search(state, config);
    engine.applyMove(state, result.move);

    logger.debug({ ply, move: formatMove(result.move), simulations: result.simulations }, 'self-play move');
    options.onMove?.(result.move, state);
  }

  return { state, endReason: 'win' };
}

export interface BenchStats {
  size: number;
  iterations: number;
  moveCount: number;
  elapsedMs: number;
  msPerCall: number;
  callsPerSecond: number;
}

/** Time `legalMoves` on an empty board after one warm-up call. */
export function benchmarkLegalMoves(engine: RulesEngine, size: number, iterations: number): BenchStats {
  const state = engine.newGame(size);
  let moveCount = engine.legalMoves(state).length;

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    moveCount = engine.legalMoves(state).length;
  }
  const elapsedMs = performance.now() - start;

  return {
    size,
    iterations,
    moveCount,
    elapsedMs,
    msPerCall: iterations > 0 ? elapsedMs / iterations : 0,
    callsPerSecond: elapsedMs > 0 ? (iterations * 1000) / elapsedMs : Infinity,
  };
}

export async function loadRecord(path: string, engine: RulesEngine): Promise<GameState> {
  const text = await readFile(path, 'utf8');
  const data: unknown = JSON.parse(text);
  return importRecord(data, engine);
}

export async function saveRecord(path: string, state: GameState): Promise<void> {
  await writeFile(path, JSON.stringify(exportRecord(state), null, 2) + '\n', 'utf8');
  logger.info({ path, moves: state.history.length }, 'game record written');
}
