/**
 * Game records and wire shapes.
 *
 * A record holds the starting configuration and the ordered move list,
 * never the derived board: importing replays every move through the rules
 * engine, so an imported game is as trustworthy as one played live.
 */
import { z } from 'zod';
import { GameError, InvalidRecordError } from './errors';
import { RulesEngine } from './rules';
import { GameRecord, GameState, MAX_BOARD_SIZE, MIN_BOARD_SIZE, Move, StateSnapshot } from './types';

const PlayerSchema = z.enum(['A', 'B']);

const BlocksSchema = z.object({
  len4: z.number().int().min(0),
  len5: z.number().int().min(0),
});

export const PathCellSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
  layer: z.enum(['primary', 'secondary']),
});

export const MoveSchema = z.object({
  player: PlayerSchema,
  path: z.array(PathCellSchema).min(3).max(5),
  timestamp: z.number().optional(),
});

export type MoveInput = z.infer<typeof MoveSchema>;

export const GameRecordSchema = z.object({
  version: z.literal(1),
  initial: z.object({
    size: z.number().int().min(MIN_BOARD_SIZE).max(MAX_BOARD_SIZE),
    blocks: z.object({ A: BlocksSchema, B: BlocksSchema }),
  }),
  moves: z.array(MoveSchema),
  winner: PlayerSchema.nullable(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function toMove(input: MoveInput): Move {
  return {
    player: input.player,
    path: input.path.map(({ row, col, layer }) => ({ row, col, layer })),
    timestamp: input.timestamp ?? 0,
  };
}

/**
 * Validate a move arriving from outside (transport layer, CLI file).
 * Only checks the shape; legality is decided by `RulesEngine.applyMove`.
 */
export function parseMove(data: unknown): Move {
  const parsed = MoveSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidRecordError(`Invalid move: ${describeIssues(parsed.error)}`);
  }
  return toMove(parsed.data);
}

export function exportRecord(state: GameState): GameRecord {
  return {
    version: 1,
    initial: {
      size: state.initial.size,
      blocks: {
        A: { ...state.initial.blocks.A },
        B: { ...state.initial.blocks.B },
      },
    },
    moves: state.history.map(move => ({
      player: move.player,
      path: move.path.map(({ row, col, layer }) => ({ row, col, layer })),
      timestamp: move.timestamp,
    })),
    winner: state.winner,
  };
}

/**
 * Parse a record and replay it from its starting configuration.
 */
export function importRecord(data: unknown, engine: RulesEngine = new RulesEngine()): GameState {
  const parsed = GameRecordSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidRecordError(`Invalid game record: ${describeIssues(parsed.error)}`);
  }

  const record = parsed.data;
  const state = engine.newGame(record.initial.size, { blocks: record.initial.blocks });

  record.moves.forEach((input, index) => {
    try {
      engine.applyMove(state, toMove(input));
    } catch (err) {
      if (err instanceof GameError) {
        throw new InvalidRecordError(`Move ${index} cannot be replayed: ${err.message}`, {
          index,
          cause: err.toJSON(),
        });
      }
      throw err;
    }
  });

  if (state.winner !== record.winner) {
    throw new InvalidRecordError(
      `Recorded winner ${record.winner ?? 'none'} does not match replayed winner ${state.winner ?? 'none'}`,
      { recorded: record.winner, replayed: state.winner },
    );
  }

  return state;
}

/** Wire-shape view of a state for the transport layer. */
export function snapshotState(state: GameState): StateSnapshot {
  return {
    size: state.board.size,
    board: state.board.toJSON(),
    currentPlayer: state.currentPlayer,
    inventory: {
      A: { ...state.blocks.A },
      B: { ...state.blocks.B },
    },
    winner: state.winner,
    moveCount: state.history.length,
  };
}
