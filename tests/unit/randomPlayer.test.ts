import { describe, it, expect } from 'vitest';
import { NoLegalMovesError } from '../../src/core/errors';
import { moveKey } from '../../src/core/move';
import { RulesEngine } from '../../src/core/rules';
import { RandomPlayer } from '../../src/search/randomPlayer';
import { vertical } from '../fixtures';

const engine = new RulesEngine();

describe('RandomPlayer', () => {
  it('returns a legal move without searching', () => {
    const state = engine.newGame(6);
    const result = new RandomPlayer(engine).search(state, { seed: 11 });

    expect(engine.validateMove(state, result.move)).toEqual({ valid: true });
    expect(result.simulations).toBe(0);
    expect(result.nodesCreated).toBe(0);
    expect(result.topCandidates).toEqual([]);
    expect(result.shortCircuit).toBeNull();
  });

  it('repeats itself for the same seed', () => {
    const state = engine.newGame(6);
    const player = new RandomPlayer(engine);
    const first = player.search(state, { seed: 3 });
    const second = player.search(state, { seed: 3 });
    expect(moveKey(second.move)).toBe(moveKey(first.move));
  });

  it('uses the longest block it still has', () => {
    const state = engine.newGame(6);
    const player = new RandomPlayer(engine, { preferLongBlocks: true });
    expect(player.search(state, { seed: 1 }).move.path).toHaveLength(5);

    state.blocks.A.len5 = 0;
    expect(player.search(state, { seed: 1 }).move.path).toHaveLength(4);

    state.blocks.A.len4 = 0;
    expect(player.search(state, { seed: 1 }).move.path).toHaveLength(3);
  });

  it('throws when there is nothing to play', () => {
    const state = engine.newGame(5);
    engine.applyMove(state, vertical('A', 0, 0, 5));
    expect(() => new RandomPlayer(engine).search(state)).toThrow(NoLegalMovesError);
  });
});
