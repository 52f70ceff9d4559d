/**
 * Seeded pseudo-random number generator so searches can be replayed.
 * xoshiro128** seeded through SplitMix32.
 */
export class SeededRandom {
  private s: Uint32Array;

  constructor(seed: number) {
    this.s = new Uint32Array(4);
    let x = seed >>> 0;
    for (let i = 0; i < 4; i++) {
      x = (x + 0x9e3779b9) >>> 0;
      let t = x ^ (x >>> 16);
      t = Math.imul(t, 0x21f0aaad);
      t = t ^ (t >>> 15);
      t = Math.imul(t, 0x735a2d97);
      t = t ^ (t >>> 15);
      this.s[i] = t >>> 0;
    }
    if (this.s.every(word => word === 0)) {
      this.s[0] = 1;
    }
  }

  /** Float in [0, 1). */
  random(): number {
    const result = Math.imul(this.rotl(Math.imul(this.s[1], 5), 7), 9);
    const t = this.s[1] << 9;

    this.s[2] ^= this.s[0];
    this.s[3] ^= this.s[1];
    this.s[1] ^= this.s[2];
    this.s[0] ^= this.s[3];
    this.s[2] ^= t;
    this.s[3] = this.rotl(this.s[3], 11);

    return (result >>> 0) / 0x100000000;
  }

  /** Integer in [0, max). */
  randomInt(max: number): number {
    return Math.floor(this.random() * max);
  }

  choice<T>(arr: readonly T[]): T {
    return arr[this.randomInt(arr.length)];
  }

  /**
   * Up to `count` distinct elements in random order. Partial
   * Fisher-Yates, so the cost is O(count) after the copy.
   */
  sample<T>(arr: readonly T[], count: number): T[] {
    const pool = [...arr];
    const n = Math.min(count, pool.length);
    for (let i = 0; i < n; i++) {
      const j = i + this.randomInt(pool.length - i);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, n);
  }

  shuffle<T>(arr: readonly T[]): T[] {
    return this.sample(arr, arr.length);
  }

  private rotl(x: number, k: number): number {
    return ((x << k) | (x >>> (32 - k))) >>> 0;
  }
}
