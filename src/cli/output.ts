/**
 * Plain-text output for the CLI. Everything here returns a string;
 * printing is left to the caller.
 */
import { formatMove } from '../core/move';
import { GameState, Move, SearchResult } from '../core/types';
import { BenchStats, SelfPlayResult } from './commands';

export function formatInventory(state: GameState): string {
  const { A, B } = state.blocks;
  return `Blocks: A len4=${A.len4} len5=${A.len5} | B len4=${B.len4} len5=${B.len5}`;
}

export function formatStatus(state: GameState): string {
  const turn = state.winner !== null ? `Winner: ${state.winner}` : `${state.currentPlayer} to move`;
  return `Move ${state.history.length} | ${turn}`;
}

export function formatBoard(state: GameState): string {
  return [formatStatus(state), formatInventory(state), state.board.render()].join('\n');
}

export function formatSearchResult(result: SearchResult): string {
  const lines: string[] = [];
  lines.push(`Recommended move: ${formatMove(result.move)}`);
  if (result.shortCircuit === 'win') {
    lines.push('(immediate win)');
  } else if (result.shortCircuit === 'block') {
    lines.push('(opponent threatens to win; blocking moves searched first)');
  }

  if (result.topCandidates.length > 0) {
    lines.push('');
    lines.push('Top candidates:');
    result.topCandidates.forEach((candidate, i) => {
      const rate = (candidate.winRate * 100).toFixed(1);
      lines.push(`  ${i + 1}. ${formatMove(candidate.move)}  visits=${candidate.visits} win=${rate}%`);
    });
  }

  lines.push('');
  lines.push('Notes:');
  lines.push(`- Simulations: ${result.simulations.toLocaleString()}`);
  lines.push(`- Nodes created: ${result.nodesCreated.toLocaleString()}`);
  lines.push(`- Search time: ${result.elapsedSeconds.toFixed(1)}s`);
  return lines.join('\n');
}

export function formatLegalMoves(state: GameState, moves: readonly Move[]): string {
  const lines = [`${moves.length} legal moves for ${state.currentPlayer}:`];
  for (const move of moves) {
    lines.push(`  ${formatMove(move)}`);
  }
  return lines.join('\n');
}

export function formatSelfPlay(result: SelfPlayResult): string {
  const outcome = result.state.winner !== null
    ? `${result.state.winner} wins after ${result.state.history.length} moves`
    : `No result after ${result.state.history.length} moves (${result.endReason})`;
  return [formatBoard(result.state), '', outcome].join('\n');
}

export function formatBench(stats: BenchStats): string {
  return [
    `Legal-move generation on ${stats.size}x${stats.size}`,
    `  Legal moves:   ${stats.moveCount}`,
    `  Iterations:    ${stats.iterations}`,
    `  Elapsed:       ${(stats.elapsedMs / 1000).toFixed(3)}s`,
    `  Per call:      ${stats.msPerCall.toFixed(3)}ms`,
    `  Calls/second:  ${stats.callsPerSecond.toFixed(1)}`,
  ].join('\n');
}
