import { GameState, SearchResult } from '../core/types';
import { SearchConfig } from './config';

export type ProgressCallback = (simulations: number) => void;

/**
 * Anything that can pick a move for the side to move. The MCTS engine is
 * one implementation; a random player or a learned policy are others.
 */
export interface MoveSearch {
  search(state: GameState, config?: Partial<SearchConfig>, onProgress?: ProgressCallback): SearchResult;
}
