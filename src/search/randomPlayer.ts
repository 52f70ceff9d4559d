/**
 * Random opponent. Useful as a sparring partner for the MCTS engine and
 * as the simplest stand-in behind the MoveSearch interface.
 */
import { NoLegalMovesError } from '../core/errors';
import { RulesEngine } from '../core/rules';
import { GameState, SearchResult } from '../core/types';
import { SearchConfig, resolveSearchConfig } from './config';
import { MoveSearch } from './moveSearch';
import { SeededRandom } from '../utils/random';

export interface RandomPlayerOptions {
  /** Use the 5-block while it lasts, then the 4-block, then anything. */
  preferLongBlocks?: boolean;
}

export class RandomPlayer implements MoveSearch {
  private readonly engine: RulesEngine;
  private readonly preferLongBlocks: boolean;

  constructor(engine: RulesEngine = new RulesEngine(), options: RandomPlayerOptions = {}) {
    this.engine = engine;
    this.preferLongBlocks = options.preferLongBlocks ?? false;
  }

  search(state: GameState, overrides: Partial<SearchConfig> = {}): SearchResult {
    const config = resolveSearchConfig(overrides);
    const startTime = Date.now();
    const rng = new SeededRandom(config.seed ?? startTime);

    const legal = this.engine.legalMoves(state);
    if (legal.length === 0) {
      throw new NoLegalMovesError({ player: state.currentPlayer, winner: state.winner });
    }

    let pool = legal;
    if (this.preferLongBlocks) {
      for (const length of [5, 4]) {
        const longer = legal.filter(move => move.path.length === length);
        if (longer.length > 0) {
          pool = longer;
          break;
        }
      }
    }

    return {
      move: rng.choice(pool),
      simulations: 0,
      nodesCreated: 0,
      elapsedSeconds: (Date.now() - startTime) / 1000,
      topCandidates: [],
      shortCircuit: null,
    };
  }
}
