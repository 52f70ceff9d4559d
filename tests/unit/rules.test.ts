/**
 * Unit tests for the rules engine: generation, validation, application,
 * undo and win detection.
 */
import { describe, it, expect } from 'vitest';
import { RulesEngine } from '../../src/core/rules';
import {
  IllegalMoveError,
  InvalidConfigError,
  NothingToUndoError,
} from '../../src/core/errors';
import { createMove, isBridgeMove, moveKey } from '../../src/core/move';
import { Move } from '../../src/core/types';
import { cells, horizontal, vertical, withStones } from '../fixtures';

const engine = new RulesEngine();

describe('RulesEngine', () => {
  describe('newGame', () => {
    it('creates an 18x18 game with A to move by default', () => {
      const state = engine.newGame();
      expect(state.board.size).toBe(18);
      expect(state.currentPlayer).toBe('A');
      expect(state.blocks).toEqual({ A: { len4: 1, len5: 1 }, B: { len4: 1, len5: 1 } });
      expect(state.history).toEqual([]);
      expect(state.winner).toBeNull();
    });

    it('accepts starting inventories', () => {
      const state = engine.newGame(5, { blocks: { B: { len4: 2, len5: 0 } } });
      expect(state.blocks.A).toEqual({ len4: 1, len5: 1 });
      expect(state.blocks.B).toEqual({ len4: 2, len5: 0 });
      expect(state.initial.blocks.B).toEqual({ len4: 2, len5: 0 });
    });

    it('rejects bad sizes and inventories', () => {
      expect(() => engine.newGame(2)).toThrow(InvalidConfigError);
      expect(() => engine.newGame(65)).toThrow(InvalidConfigError);
      expect(() => engine.newGame(4.5)).toThrow('Board size must be an integer from 3 to 64');
      expect(() => engine.newGame(5, { blocks: { A: { len4: -1, len5: 1 } } })).toThrow(InvalidConfigError);
    });
  });

  describe('legalMoves', () => {
    it('generates each row and column once on a 3x3 board', () => {
      const state = engine.newGame(3);
      const moves = engine.legalMoves(state);
      expect(moves).toHaveLength(6);
      expect(moves.every(move => move.path.length === 3 && !isBridgeMove(move))).toBe(true);
    });

    it('keeps reversed paths when dedupe is off', () => {
      const state = engine.newGame(3);
      expect(engine.legalMoves(state, { dedupe: false })).toHaveLength(12);
    });

    it('drops lengths whose inventory is spent', () => {
      const state = engine.newGame(5);
      // Per line: three 3s, two 4s, one 5; ten lines.
      expect(engine.legalMoves(state)).toHaveLength(60);

      state.blocks.A.len4 = 0;
      expect(engine.legalMoves(state)).toHaveLength(40);

      state.blocks.A.len5 = 0;
      expect(engine.legalMoves(state).every(move => move.path.length === 3)).toBe(true);
      expect(engine.legalMoves(state)).toHaveLength(30);
    });

    it('returns nothing once the game is won', () => {
      const state = engine.newGame(5);
      engine.applyMove(state, vertical('A', 0, 0, 5));
      expect(state.winner).toBe('A');
      expect(engine.legalMoves(state)).toEqual([]);
    });

    it('never places primary stones on occupied cells', () => {
      const state = withStones(engine, 5, { A: [[0, 0], [2, 2]], B: [[1, 3], [4, 4]] }, 'B');
      state.board.set(3, 1, 'secondary', 'A');

      for (const move of engine.legalMoves(state)) {
        if (isBridgeMove(move)) continue;
        for (const { row, col } of move.path) {
          expect(state.board.get(row, col)).toEqual({ primary: null, secondary: null });
        }
      }
    });

    it('never bridges over opponent stones and always lands on an anchor', () => {
      const state = withStones(engine, 5, { A: [[0, 1], [4, 1], [2, 0], [2, 4]], B: [[2, 2]] });
      const bridges = engine.legalMoves(state).filter(isBridgeMove);

      expect(bridges.map(moveKey)).toEqual(['A|0:1:s,1:1:s,2:1:s,3:1:s,4:1:s']);
      for (const move of bridges) {
        for (const { row, col } of move.path) {
          expect(state.board.get(row, col).primary).not.toBe('B');
          expect(state.board.get(row, col).secondary).toBeNull();
        }
      }
    });

    it('offers a bridge once the opponent stone is gone', () => {
      const state = withStones(engine, 5, { A: [[2, 0], [2, 4]], B: [[2, 2]] });
      expect(engine.legalMoves(state).filter(isBridgeMove)).toEqual([]);

      state.board.set(2, 2, 'primary', null);
      const bridges = engine.legalMoves(state).filter(isBridgeMove);
      expect(bridges.map(moveKey)).toEqual(['A|2:0:s,2:1:s,2:2:s,2:3:s,2:4:s']);
      expect(engine.legalMoves(state, { dedupe: false }).filter(isBridgeMove)).toHaveLength(2);
    });

    it('bridges across own primary stones', () => {
      const state = withStones(engine, 5, { A: [[0, 3], [1, 3], [2, 3]] });
      const bridges = engine.legalMoves(state).filter(isBridgeMove).map(moveKey);
      expect(bridges).toContain('A|0:3:s,1:3:s,2:3:s');
    });
  });

  describe('validateMove', () => {
    it('accepts a generated move', () => {
      const state = engine.newGame(5);
      const [first] = engine.legalMoves(state);
      expect(engine.validateMove(state, first)).toEqual({ valid: true });
    });

    it('reports each refusal reason', () => {
      const state = engine.newGame(5);
      const reason = (move: Move): string | null => {
        const check = engine.validateMove(state, move);
        return check.valid ? null : check.reason;
      };

      expect(reason(horizontal('B', 0, 0, 3))).toBe('WRONG_PLAYER');
      expect(reason(createMove('A', cells('primary', [0, 0], [1, 1], [2, 2]), 0))).toBe('BAD_STRUCTURE');
      expect(reason(horizontal('A', 0, 3, 3))).toBe('OUT_OF_BOUNDS');
      expect(reason(horizontal('A', 0, 0, 3, 'secondary'))).toBe('BAD_PLACEMENT');

      state.blocks.A.len4 = 0;
      expect(reason(horizontal('A', 0, 0, 4))).toBe('NO_INVENTORY');
    });

    it('refuses moves after the game is over', () => {
      const state = engine.newGame(5);
      engine.applyMove(state, vertical('A', 0, 0, 5));
      expect(engine.validateMove(state, vertical('A', 1, 0, 3))).toEqual({
        valid: false,
        reason: 'GAME_OVER',
        message: 'Game is already won by A',
      });
    });

    it('requires a bridge to end on an own stone', () => {
      const state = withStones(engine, 5, { A: [[0, 2]] });
      expect(engine.validateMove(state, vertical('A', 2, 0, 3, 'secondary'))).toEqual({
        valid: false,
        reason: 'BAD_PLACEMENT',
        message: 'Bridge must end on an existing own stone',
      });
    });

    it('refuses a primary move onto an occupied cell', () => {
      const state = withStones(engine, 5, { B: [[0, 1]] });
      expect(engine.validateMove(state, horizontal('A', 0, 0, 3))).toEqual({
        valid: false,
        reason: 'BAD_PLACEMENT',
        message: 'Cannot place on primary layer at (0, 1)',
      });
    });
  });

  describe('applyMove', () => {
    it('writes stones, uses inventory and passes the turn', () => {
      const state = engine.newGame(6);
      engine.applyMove(state, horizontal('A', 0, 0, 4));

      expect(state.board.get(0, 3)).toEqual({ primary: 'A', secondary: null });
      expect(state.blocks.A).toEqual({ len4: 0, len5: 1 });
      expect(state.currentPlayer).toBe('B');
      expect(state.history).toHaveLength(1);
      expect(state.winner).toBeNull();
    });

    it('never spends inventory on length-3 moves', () => {
      const state = engine.newGame(6);
      engine.applyMove(state, horizontal('A', 0, 0, 3));
      engine.applyMove(state, horizontal('B', 5, 0, 3));
      expect(state.blocks).toEqual({ A: { len4: 1, len5: 1 }, B: { len4: 1, len5: 1 } });
    });

    it('spends exactly the length-5 counter', () => {
      const state = engine.newGame(6);
      engine.applyMove(state, horizontal('A', 0, 0, 5));
      expect(state.blocks.A).toEqual({ len4: 1, len5: 0 });
    });

    it('wins with a full-height column without passing the turn', () => {
      const state = engine.newGame(5);
      engine.applyMove(state, vertical('A', 0, 0, 5));
      expect(state.winner).toBe('A');
      expect(state.currentPlayer).toBe('A');
      expect(engine.isTerminal(state)).toBe(true);
    });

    it('wins with a 5-cell bridge between two anchors', () => {
      const state = withStones(engine, 5, { A: [[0, 2], [4, 2]] });
      const bridge = vertical('A', 2, 0, 5, 'secondary');

      expect(engine.validateMove(state, bridge)).toEqual({ valid: true });
      engine.applyMove(state, bridge);
      expect(state.winner).toBe('A');
      expect(state.board.get(2, 2)).toEqual({ primary: null, secondary: 'A' });
      expect(state.board.get(0, 2)).toEqual({ primary: 'A', secondary: 'A' });
    });

    it('throws and leaves the state untouched on an illegal move', () => {
      const state = engine.newGame(5);
      engine.applyMove(state, horizontal('A', 0, 0, 4));
      const before = engine.clone(state);

      let caught: unknown;
      try {
        engine.applyMove(state, horizontal('B', 0, 2, 3));
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(IllegalMoveError);
      expect(caught instanceof IllegalMoveError && caught.reason).toBe('BAD_PLACEMENT');
      expect(state.board.equals(before.board)).toBe(true);
      expect(state.blocks).toEqual(before.blocks);
      expect(state.history).toHaveLength(1);
      expect(state.currentPlayer).toBe('B');
    });

    it('refuses a second length-4 move', () => {
      const state = engine.newGame(6);
      engine.applyMove(state, horizontal('A', 0, 0, 4));
      engine.applyMove(state, horizontal('B', 5, 0, 3));
      expect(() => engine.applyMove(state, horizontal('A', 2, 0, 4))).toThrow('No length-4 blocks left for player A');
    });
  });

  describe('undo', () => {
    it('restores board, inventory, player and winner', () => {
      const state = engine.newGame(5);
      engine.applyMove(state, horizontal('A', 1, 0, 4));
      const before = engine.clone(state);

      engine.applyMove(state, vertical('B', 4, 0, 5));
      const undone = engine.undo(state);

      expect(moveKey(undone)).toBe(moveKey(vertical('B', 4, 0, 5)));
      expect(state.board.equals(before.board)).toBe(true);
      expect(state.blocks).toEqual(before.blocks);
      expect(state.currentPlayer).toBe('B');
      expect(state.winner).toBeNull();
      expect(state.history).toHaveLength(1);
    });

    it('clears the winner after undoing a winning move', () => {
      const state = engine.newGame(5);
      engine.applyMove(state, vertical('A', 0, 0, 5));
      engine.undo(state);

      expect(state.winner).toBeNull();
      expect(state.currentPlayer).toBe('A');
      expect(state.blocks.A).toEqual({ len4: 1, len5: 1 });
      expect(state.board.countStones('A').total).toBe(0);
    });

    it('walks back through several moves', () => {
      const state = engine.newGame(5);
      engine.applyMove(state, horizontal('A', 0, 0, 3));
      engine.applyMove(state, horizontal('B', 4, 0, 3));
      engine.undo(state);
      engine.undo(state);

      expect(state.board.equals(engine.newGame(5).board)).toBe(true);
      expect(state.currentPlayer).toBe('A');
    });

    it('throws on an empty history', () => {
      expect(() => engine.undo(engine.newGame(5))).toThrow(NothingToUndoError);
    });
  });

  describe('clone and passTurn', () => {
    it('clones independently', () => {
      const state = engine.newGame(5);
      const copy = engine.clone(state);
      engine.applyMove(copy, horizontal('A', 0, 0, 4));

      expect(state.board.countStones('A').total).toBe(0);
      expect(state.blocks.A.len4).toBe(1);
      expect(state.history).toEqual([]);
      expect(copy.initial).toBe(state.initial);
    });

    it('hands the move to another player on a copy', () => {
      const state = engine.newGame(5);
      const view = engine.passTurn(state, 'B');
      expect(view.currentPlayer).toBe('B');
      expect(state.currentPlayer).toBe('A');
      expect(engine.legalMoves(view).every(move => move.player === 'B')).toBe(true);
    });
  });

  it('summarises a state', () => {
    const state = engine.newGame(3);
    expect(engine.summary(state)).toEqual({
      boardSize: 3,
      currentPlayer: 'A',
      moveCount: 0,
      blocks: { A: { len4: 1, len5: 1 }, B: { len4: 1, len5: 1 } },
      winner: null,
      isGameOver: false,
      legalMoveCount: 6,
    });
  });
});
