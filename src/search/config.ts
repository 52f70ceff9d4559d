/**
 * Search configuration: defaults and validation.
 *
 * The scan caps trade accuracy for speed. They were picked by experiment,
 * not derived, so they are ordinary options rather than constants.
 */
import { z } from 'zod';
import { InvalidConfigError } from '../core/errors';

export interface SearchConfig {
  /** Wall-clock budget. 0 runs no simulations. */
  timeLimitSeconds: number;
  /** Optional cap on simulations, checked alongside the deadline. */
  maxSimulations?: number;
  /** UCB1 exploration constant C. */
  explorationWeight: number;
  /** Play immediate wins during rollouts instead of uniform random moves. */
  tacticalRollout: boolean;
  /**
   * Root moves confirmed by a trial move when looking for an immediate win.
   * Moves that cannot complete a connection are skipped and not counted.
   */
  winScanLimit: number;
  /** Most opponent threats collected at the root. Every reply is screened. */
  threatScanLimit: number;
  /** Moves tested for an immediate win at each tactical rollout ply. */
  rolloutWinScanLimit: number;
  /** Rollouts longer than this are scored as a draw. */
  maxRolloutMoves: number;
  /** Number of root children reported in topCandidates. */
  candidateCount: number;
  seed?: number;
  signal?: AbortSignal;
}

const SearchConfigSchema = z.object({
  timeLimitSeconds: z.number().min(0).finite().default(10),
  maxSimulations: z.number().int().min(0).optional(),
  explorationWeight: z.number().min(0).finite().default(Math.SQRT2),
  tacticalRollout: z.boolean().default(true),
  winScanLimit: z.number().int().min(0).default(30),
  threatScanLimit: z.number().int().min(0).default(10),
  rolloutWinScanLimit: z.number().int().min(0).default(10),
  maxRolloutMoves: z.number().int().min(1).default(100),
  candidateCount: z.number().int().min(1).default(5),
  seed: z.number().int().optional(),
});

const SEARCH_CONFIG_KEYS = [
  'timeLimitSeconds',
  'maxSimulations',
  'explorationWeight',
  'tacticalRollout',
  'winScanLimit',
  'threatScanLimit',
  'rolloutWinScanLimit',
  'maxRolloutMoves',
  'candidateCount',
  'seed',
  'signal',
] as const satisfies readonly (keyof SearchConfig)[];

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze(SearchConfigSchema.parse({}));

/**
 * Fill unset options (missing or undefined) from the defaults and validate.
 */
export function resolveSearchConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
  const { signal, ...checked } = overrides;
  const parsed = SearchConfigSchema.safeParse(checked);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid search config: ${detail}`);
  }
  return { ...parsed.data, signal };
}

function copyDefined<K extends keyof SearchConfig>(
  target: Partial<SearchConfig>,
  source: Partial<SearchConfig>,
  key: K,
): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/**
 * Layer option sets left to right. A key set to undefined in a later
 * layer leaves the earlier value in place.
 */
export function mergeSearchConfig(...layers: Partial<SearchConfig>[]): Partial<SearchConfig> {
  const merged: Partial<SearchConfig> = {};
  for (const layer of layers) {
    for (const key of SEARCH_CONFIG_KEYS) copyDefined(merged, layer, key);
  }
  return merged;
}
