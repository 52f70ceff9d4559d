#!/usr/bin/env node
/**
 * Layerlink CLI entry point.
 *
 * Usage:
 *   layerlink selfplay --size <n> --time <s> [--simulations <n>] [--seed <n>] [--random-b] [--out <file>]
 *   layerlink suggest --record <file> [--time <s>] [--simulations <n>] [--seed <n>]
 *   layerlink legal --record <file>
 *   layerlink bench --size <n> --iterations <k>
 *
 * Global options:
 *   --verbose          Enable trace logging
 */
import { Command, InvalidArgumentError } from 'commander';
import { GameError } from '../core/errors';
import { formatMove } from '../core/move';
import { RulesEngine } from '../core/rules';
import { DEFAULT_BOARD_SIZE, Player } from '../core/types';
import { DEFAULT_SEARCH_CONFIG, SearchConfig } from '../search/config';
import { TacticalMCTS } from '../search/mcts';
import { MoveSearch } from '../search/moveSearch';
import { RandomPlayer } from '../search/randomPlayer';
import { createLogger, enableVerbose } from '../utils/logger';
import { benchmarkLegalMoves, loadRecord, runSelfPlay, saveRecord } from './commands';
import {
  formatBench,
  formatBoard,
  formatLegalMoves,
  formatSearchResult,
  formatSelfPlay,
} from './output';

const logger = createLogger('cli');
const program = new Command();

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative number.');
  }
  return parsed;
}

interface SearchFlags {
  time?: number;
  simulations?: number;
  seed?: number;
}

function searchOverrides(flags: SearchFlags): Partial<SearchConfig> {
  return {
    timeLimitSeconds: flags.time,
    maxSimulations: flags.simulations,
    seed: flags.seed,
  };
}

/** Progress line for one search; cleared once the search returns. */
function progressReporter(): { onProgress: (simulations: number) => void; clear: () => void } {
  let shown = false;
  return {
    onProgress: simulations => {
      shown = true;
      process.stderr.write(`\rSearching... ${simulations.toLocaleString()} simulations`);
    },
    clear: () => {
      if (shown) process.stderr.write('\r' + ' '.repeat(60) + '\r');
      shown = false;
    },
  };
}

function reportError(error: unknown): void {
  if (error instanceof GameError) {
    logger.error(error.toJSON(), error.message);
  } else if (error instanceof Error) {
    logger.error({ err: error }, error.message);
  } else {
    logger.error({ error: String(error) }, 'unexpected failure');
  }
  process.exitCode = 1;
}

program
  .name('layerlink')
  .description('Two-layer connection game engine with a tactical MCTS player')
  .version('1.0.0')
  .option('--verbose', 'Enable trace logging')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts().verbose) {
      enableVerbose();
    }
  });

program
  .command('selfplay')
  .description('Play a full game between two engines and print the final board')
  .option('--size <n>', 'Board size', parseInteger, DEFAULT_BOARD_SIZE)
  .option('--time <seconds>', 'Search time per move', parseSeconds, DEFAULT_SEARCH_CONFIG.timeLimitSeconds)
  .option('--simulations <n>', 'Simulation cap per move', parseInteger)
  .option('--seed <n>', 'Random seed for a reproducible game', parseInteger)
  .option('--random-b', 'Player B picks uniformly random moves')
  .option('--out <file>', 'Write the game record as JSON')
  .action(async (options: SearchFlags & { size: number; randomB?: boolean; out?: string }) => {
    try {
      const engine = new RulesEngine();
      const mcts = new TacticalMCTS(engine);
      const players: Record<Player, MoveSearch> = {
        A: mcts,
        B: options.randomB ? new RandomPlayer(engine) : mcts,
      };

      logger.info(
        { size: options.size, time: options.time, simulations: options.simulations, seed: options.seed },
        'starting self-play',
      );

      const result = runSelfPlay(engine, {
        size: options.size,
        players,
        search: searchOverrides(options),
        onMove: (move, state) => {
          console.log(`${state.history.length}. ${formatMove(move)}`);
        },
      });

      console.log('');
      console.log(formatSelfPlay(result));

      if (options.out) {
        await saveRecord(options.out, result.state);
      }
    } catch (error: unknown) {
      reportError(error);
    }
  });

program
  .command('suggest')
  .description('Load a game record and recommend a move for the side to move')
  .requiredOption('--record <file>', 'Game record (JSON)')
  .option('--time <seconds>', 'Search time', parseSeconds, DEFAULT_SEARCH_CONFIG.timeLimitSeconds)
  .option('--simulations <n>', 'Simulation cap', parseInteger)
  .option('--seed <n>', 'Random seed for deterministic search', parseInteger)
  .action(async (options: SearchFlags & { record: string }) => {
    try {
      const engine = new RulesEngine();
      const state = await loadRecord(options.record, engine);
      console.log(formatBoard(state));
      console.log('');

      const progress = progressReporter();
      const result = new TacticalMCTS(engine).search(state, searchOverrides(options), progress.onProgress);
      progress.clear();

      console.log(formatSearchResult(result));
    } catch (error: unknown) {
      reportError(error);
    }
  });

program
  .command('legal')
  .description('List the legal moves for the side to move in a game record')
  .requiredOption('--record <file>', 'Game record (JSON)')
  .action(async (options: { record: string }) => {
    try {
      const engine = new RulesEngine();
      const state = await loadRecord(options.record, engine);
      console.log(formatLegalMoves(state, engine.legalMoves(state)));
    } catch (error: unknown) {
      reportError(error);
    }
  });

program
  .command('bench')
  .description('Time legal-move generation on an empty board')
  .option('--size <n>', 'Board size', parseInteger, 9)
  .option('--iterations <k>', 'Number of timed calls', parseInteger, 100)
  .action((options: { size: number; iterations: number }) => {
    try {
      const stats = benchmarkLegalMoves(new RulesEngine(), options.size, options.iterations);
      console.log(formatBench(stats));
    } catch (error: unknown) {
      reportError(error);
    }
  });

program.parseAsync(process.argv).catch(reportError);
