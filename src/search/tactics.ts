/**
 * One-ply tactical checks used by the search: immediate wins, immediate
 * threats, and moves that defuse those threats.
 *
 * A straight path is contiguous, so a legal move wins exactly when it
 * touches both the mover's start-edge group and their goal-edge group.
 * The edge-reach masks below make that a cheap filter, so the scans can
 * look at every legal move instead of a ranked prefix.
 *
 * Checks that confirm a move go through apply/undo on a scratch state, so
 * callers must pass a state the search owns (a clone), never the
 * caller's game.
 */
import { Board } from '../core/board';
import { RulesEngine } from '../core/rules';
import { GameState, Move, Player, opponentOf } from '../core/types';

const STEPS: readonly (readonly [number, number])[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

/** Touching a start- or goal-edge group is worth this much in the ranking. */
const LINK_BONUS = 3;

// ─── Edge reach ──────────────────────────────────────────────────────

/** Flat masks (row * size + col) of the player's cells linked to each edge. */
export interface EdgeReach {
  readonly start: Uint8Array;
  readonly goal: Uint8Array;
}

function isOnEdge(size: number, player: Player, row: number, col: number, goal: boolean): boolean {
  const line = goal ? size - 1 : 0;
  return player === 'A' ? row === line : col === line;
}

function floodFromEdge(board: Board, player: Player, goal: boolean): Uint8Array {
  const n = board.size;
  const mask = new Uint8Array(n * n);
  const stack: number[] = [];
  const line = goal ? n - 1 : 0;

  for (let i = 0; i < n; i++) {
    const row = player === 'A' ? line : i;
    const col = player === 'A' ? i : line;
    if (board.belongsTo(row, col, player)) {
      mask[row * n + col] = 1;
      stack.push(row * n + col);
    }
  }

  for (let idx = stack.pop(); idx !== undefined; idx = stack.pop()) {
    const row = Math.floor(idx / n);
    const col = idx % n;
    for (const [dr, dc] of STEPS) {
      const nr = row + dr;
      const nc = col + dc;
      if (!board.isInside(nr, nc)) continue;
      const next = nr * n + nc;
      if (mask[next] || !board.belongsTo(nr, nc, player)) continue;
      mask[next] = 1;
      stack.push(next);
    }
  }

  return mask;
}

export function edgeReach(board: Board, player: Player): EdgeReach {
  return {
    start: floodFromEdge(board, player, false),
    goal: floodFromEdge(board, player, true),
  };
}

/** Whether some path cell lies on the edge, inside the mask, or next to it. */
function touchesGroup(board: Board, move: Move, mask: Uint8Array, goal: boolean): boolean {
  const n = board.size;
  for (const { row, col } of move.path) {
    if (!board.isInside(row, col)) continue;
    if (isOnEdge(n, move.player, row, col, goal) || mask[row * n + col]) return true;
    for (const [dr, dc] of STEPS) {
      const nr = row + dr;
      const nc = col + dc;
      if (board.isInside(nr, nc) && mask[nr * n + nc]) return true;
    }
  }
  return false;
}

/**
 * Whether the move links the mover's start edge to their goal edge.
 * For a legal move this is the same as winning on the spot.
 */
export function completesConnection(
  board: Board,
  move: Move,
  reach: EdgeReach = edgeReach(board, move.player),
): boolean {
  return touchesGroup(board, move, reach.start, false) && touchesGroup(board, move, reach.goal, true);
}

function reachCache(board: Board): (player: Player) => EdgeReach {
  const cache = new Map<Player, EdgeReach>();
  return player => {
    let reach = cache.get(player);
    if (!reach) {
      reach = edgeReach(board, player);
      cache.set(player, reach);
    }
    return reach;
  };
}

// ─── Ordering ────────────────────────────────────────────────────────

/**
 * Tactical priority of a move. Only cells the mover does not already own
 * count, so a bridge laid over the mover's own stones scores nothing.
 * On top of that: contact with own stones, new cells on the mover's
 * edges, and links to groups that already reach an edge.
 */
export function tacticalScore(
  state: GameState,
  move: Move,
  reach: EdgeReach = edgeReach(state.board, move.player),
): number {
  const { board } = state;
  const n = board.size;
  const inPath = new Set(move.path.map(cell => `${cell.row},${cell.col}`));
  let fresh = 0;
  let touching = 0;
  let edge = 0;

  for (const { row, col } of move.path) {
    if (!board.isInside(row, col)) continue;
    if (!board.belongsTo(row, col, move.player)) {
      fresh++;
      if (isOnEdge(n, move.player, row, col, false) || isOnEdge(n, move.player, row, col, true)) edge++;
    }
    for (const [dr, dc] of STEPS) {
      const nr = row + dr;
      const nc = col + dc;
      if (!board.isInside(nr, nc) || inPath.has(`${nr},${nc}`)) continue;
      if (board.belongsTo(nr, nc, move.player)) touching++;
    }
  }

  if (fresh === 0) return 0;

  const startLink = touchesGroup(board, move, reach.start, false) ? LINK_BONUS : 0;
  const goalLink = touchesGroup(board, move, reach.goal, true) ? LINK_BONUS : 0;
  return fresh + touching * 2 + edge + startLink + goalLink;
}

/** Moves sorted by tactical score, highest first. Ties keep input order. */
export function rankCandidates(state: GameState, moves: readonly Move[]): Move[] {
  const reachFor = reachCache(state.board);
  return moves
    .map((move, index) => ({ move, index, score: tacticalScore(state, move, reachFor(move.player)) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(entry => entry.move);
}

// ─── Wins, threats and blocks ────────────────────────────────────────

/** Whether applying the move makes its player the winner. */
export function winsImmediately(engine: RulesEngine, scratch: GameState, move: Move): boolean {
  if (!engine.validateMove(scratch, move).valid) return false;
  engine.applyMove(scratch, move);
  const won = scratch.winner === move.player;
  engine.undo(scratch);
  return won;
}

/**
 * First candidate, in the given order, that wins on the spot. Candidates
 * that cannot complete a connection are skipped without a trial move;
 * at most `limit` of the rest are confirmed.
 */
export function findImmediateWin(
  engine: RulesEngine,
  scratch: GameState,
  candidates: readonly Move[],
  limit: number,
): Move | null {
  if (limit <= 0) return null;
  const reachFor = reachCache(scratch.board);
  let tried = 0;

  for (const move of candidates) {
    if (!completesConnection(scratch.board, move, reachFor(move.player))) continue;
    if (winsImmediately(engine, scratch, move)) return move;
    if (++tried >= limit) break;
  }
  return null;
}

/**
 * Opponent moves that would win if the opponent were to move now.
 * Every opponent reply is screened; at most `limit` threats are returned,
 * best-ranked first.
 */
export function findThreats(engine: RulesEngine, state: GameState, limit: number): Move[] {
  if (limit <= 0 || state.winner !== null) return [];
  const view = engine.passTurn(state, opponentOf(state.currentPlayer));
  const reach = edgeReach(view.board, view.currentPlayer);
  const linking = engine.legalMoves(view).filter(move => completesConnection(view.board, move, reach));

  const threats: Move[] = [];
  for (const move of rankCandidates(view, linking)) {
    if (threats.length >= limit) break;
    if (winsImmediately(engine, view, move)) threats.push(move);
  }
  return threats;
}

/**
 * Mover's moves after which none of the given threats still wins,
 * either because the threat became illegal or no longer connects.
 *
 * Stones are never removed, so a move that covers no threat cell leaves
 * every threat as it was; only moves sharing a cell with a threat are
 * tried. Candidate order is kept.
 */
export function findBlockingMoves(
  engine: RulesEngine,
  state: GameState,
  candidates: readonly Move[],
  threats: readonly Move[],
): Move[] {
  if (threats.length === 0) return [];
  const threatCells = new Set(threats.flatMap(threat => threat.path.map(cell => `${cell.row},${cell.col}`)));
  const scratch = engine.clone(state);
  const blocks: Move[] = [];

  for (const move of candidates) {
    if (!move.path.some(cell => threatCells.has(`${cell.row},${cell.col}`))) continue;
    engine.applyMove(scratch, move);
    const stillThreatened = threats.some(threat => winsImmediately(engine, scratch, threat));
    engine.undo(scratch);
    if (!stillThreatened) blocks.push(move);
  }

  return blocks;
}
