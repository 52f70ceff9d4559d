export { TacticalMCTS } from './mcts';
export { RandomPlayer } from './randomPlayer';
export type { RandomPlayerOptions } from './randomPlayer';
export type { MoveSearch, ProgressCallback } from './moveSearch';
export { DEFAULT_SEARCH_CONFIG, mergeSearchConfig, resolveSearchConfig } from './config';
export type { SearchConfig } from './config';
export { SearchNode } from './tree';
export {
  completesConnection,
  edgeReach,
  findBlockingMoves,
  findImmediateWin,
  findThreats,
  rankCandidates,
  tacticalScore,
  winsImmediately,
} from './tactics';
export type { EdgeReach } from './tactics';
