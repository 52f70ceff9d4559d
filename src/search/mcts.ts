/**
 * Tactical Monte Carlo Tree Search for Layerlink.
 *
 * Uses UCB1 (Upper Confidence Bound) for selection:
 *
 *   UCB1 = W/N + C * sqrt(ln(N_parent) / N)
 *
 * where W is the child's win count from the point of view of the player
 * who moved into it, N its visit count and C the exploration weight
 * (default sqrt(2)).
 *
 * Before growing the tree the root is checked for shortcuts:
 *   1. an immediate win anywhere among the legal moves is returned at once;
 *   2. if the opponent could win next turn, moves that defuse every such
 *      threat are expanded first and become the fallback answer.
 *
 * Rollouts are random, or in tactical mode take an immediate win when a
 * sampled subset of moves contains one. Rollouts do not look for blocks;
 * that check is too expensive per ply and only runs once, at the root.
 *
 * The final move is the most-visited root child (robust child).
 */
import { NoLegalMovesError } from '../core/errors';
import { formatMove } from '../core/move';
import { RulesEngine } from '../core/rules';
import { CandidateStats, GameState, Move, Player, SearchResult, opponentOf } from '../core/types';
import { SearchConfig, mergeSearchConfig, resolveSearchConfig } from './config';
import { MoveSearch, ProgressCallback } from './moveSearch';
import { findBlockingMoves, findImmediateWin, findThreats, rankCandidates } from './tactics';
import { SearchNode } from './tree';
import { SeededRandom } from '../utils/random';
import { createLogger } from '../utils/logger';

const logger = createLogger('mcts');

const PROGRESS_INTERVAL = 100;

export class TacticalMCTS implements MoveSearch {
  private readonly engine: RulesEngine;
  private readonly defaults: Partial<SearchConfig>;

  constructor(engine: RulesEngine = new RulesEngine(), defaults: Partial<SearchConfig> = {}) {
    this.engine = engine;
    this.defaults = defaults;
  }

  /**
   * Pick a move for the side to move in `state`. The state is cloned;
   * the caller's game is never touched.
   */
  search(state: GameState, overrides: Partial<SearchConfig> = {}, onProgress?: ProgressCallback): SearchResult {
    const config = resolveSearchConfig(mergeSearchConfig(this.defaults, overrides));
    const startTime = Date.now();
    const rng = new SeededRandom(config.seed ?? startTime);
    const engine = this.engine;

    const rootState = engine.clone(state);
    const legal = engine.legalMoves(rootState);
    if (legal.length === 0) {
      throw new NoLegalMovesError({ player: rootState.currentPlayer, winner: rootState.winner });
    }

    const ordered = rankCandidates(rootState, legal);

    // ── Shortcut 1: immediate win ───────────────────────────────────
    const win = findImmediateWin(engine, engine.clone(rootState), ordered, config.winScanLimit);
    if (win) {
      logger.debug({ move: formatMove(win) }, 'immediate win at root');
      return {
        move: win,
        simulations: 0,
        nodesCreated: 0,
        elapsedSeconds: (Date.now() - startTime) / 1000,
        topCandidates: [{ move: win, visits: 1, winRate: 1 }],
        shortCircuit: 'win',
      };
    }

    // ── Shortcut 2: immediate threat ────────────────────────────────
    const threats = findThreats(engine, rootState, config.threatScanLimit);
    const blocks = findBlockingMoves(engine, rootState, ordered, threats);
    if (threats.length > 0) {
      logger.debug(
        { threats: threats.map(formatMove), blocks: blocks.length },
        blocks.length > 0 ? 'threat detected, blocking moves preferred' : 'threat detected, no block found',
      );
    }

    const blockSet = new Set(blocks);
    const untried = [...blocks, ...ordered.filter(move => !blockSet.has(move))];
    const root = new SearchNode(
      rootState,
      null,
      null,
      opponentOf(rootState.currentPlayer),
      untried,
      blocks.length,
    );

    // ── Tree growth ─────────────────────────────────────────────────
    const deadline = startTime + config.timeLimitSeconds * 1000;
    let simulations = 0;
    let nodesCreated = 1;

    while (true) {
      if (config.maxSimulations !== undefined && simulations >= config.maxSimulations) break;
      if (Date.now() >= deadline) break;
      if (config.signal?.aborted) break;

      // Selection
      let node = root;
      while (!node.isTerminal && node.isFullyExpanded && node.children.length > 0) {
        node = node.selectChild(config.explorationWeight);
      }

      // Expansion
      if (!node.isTerminal && !node.isFullyExpanded) {
        node = node.expand(engine, rng);
        nodesCreated++;
      }

      // Simulation
      const winner = this.rollout(node.state, config, rng);

      // Backpropagation
      node.backpropagate(winner);

      simulations++;
      if (onProgress && simulations % PROGRESS_INTERVAL === 0) {
        onProgress(simulations);
      }
    }

    // ── Result ──────────────────────────────────────────────────────
    const ranked = [...root.children].sort((a, b) => b.visits - a.visits);
    const topCandidates: CandidateStats[] = ranked
      .slice(0, config.candidateCount)
      .flatMap(child => (child.move ? [{ move: child.move, visits: child.visits, winRate: child.winRate }] : []));

    const move = topCandidates.length > 0 ? topCandidates[0].move : (blocks[0] ?? ordered[0]);
    const elapsedSeconds = (Date.now() - startTime) / 1000;

    logger.debug(
      { move: formatMove(move), simulations, nodesCreated, elapsedSeconds },
      'search finished',
    );

    return {
      move,
      simulations,
      nodesCreated,
      elapsedSeconds,
      topCandidates,
      shortCircuit: blockSet.has(move) ? 'block' : null,
    };
  }

  /**
   * Play a clone of `from` to the end. Returns the winner, or null for a
   * draw (move cap reached or the side to move is stuck).
   */
  private rollout(from: GameState, config: SearchConfig, rng: SeededRandom): Player | null {
    if (from.winner !== null) return from.winner;

    const engine = this.engine;
    const state = engine.clone(from);

    for (let ply = 0; ply < config.maxRolloutMoves; ply++) {
      const moves = engine.legalMoves(state);
      if (moves.length === 0) return null;

      let move: Move | null = null;
      if (config.tacticalRollout && config.rolloutWinScanLimit > 0) {
        const sampled = rng.sample(moves, config.rolloutWinScanLimit);
        move = findImmediateWin(engine, state, sampled, sampled.length);
      }

      engine.applyMove(state, move ?? rng.choice(moves));
      if (state.winner !== null) return state.winner;
    }

    return null;
  }
}
