import { describe, it, expect } from 'vitest';
import { SeededRandom } from '../../src/utils/random';

describe('SeededRandom', () => {
  it('produces deterministic sequences', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    for (let i = 0; i < 20; i++) {
      expect(a.random()).toBe(b.random());
    }
  });

  it('produces different sequences for different seeds', () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    const first = Array.from({ length: 5 }, () => a.random());
    const second = Array.from({ length: 5 }, () => b.random());
    expect(first).not.toEqual(second);
  });

  it('stays within [0, 1) and integer bounds', () => {
    const rng = new SeededRandom(0);
    for (let i = 0; i < 1000; i++) {
      const value = rng.random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
      const n = rng.randomInt(7);
      expect(Number.isInteger(n) && n >= 0 && n < 7).toBe(true);
    }
  });

  it('samples distinct elements', () => {
    const rng = new SeededRandom(9);
    const items = [1, 2, 3, 4, 5, 6, 7, 8];
    const picked = rng.sample(items, 5);
    expect(picked).toHaveLength(5);
    expect(new Set(picked).size).toBe(5);
    expect(picked.every(item => items.includes(item))).toBe(true);
    expect(rng.sample(items, 20)).toHaveLength(8);
    expect(items).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('shuffles into a permutation', () => {
    const shuffled = new SeededRandom(3).shuffle(['a', 'b', 'c', 'd']);
    expect([...shuffled].sort()).toEqual(['a', 'b', 'c', 'd']);
  });
});
