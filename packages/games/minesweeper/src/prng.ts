/**
 * Deterministic seeded PRNG (xorshift32). The 32-bit state is derived by
 * hashing the rngSeed string, so equal seeds replay equal boards.
 */
export class SeededRng {
  private state: number;

  constructor(seed: string) {
    let hash = 0;
    for (let i = 0; i < seed.length; i++) {
      hash = ((hash << 5) - hash + seed.charCodeAt(i)) | 0;
    }
    // xorshift cannot leave state 0
    this.state = hash === 0 ? 1 : hash >>> 0;
  }

  /** Next pseudo-random 32-bit unsigned integer */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Float in [0, 1) */
  nextFloat(): number {
    return this.next() / 4294967296;
  }

  /** Integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }

  /**
   * `k` distinct integers drawn uniformly from [0, n), in draw order
   * (partial Fisher-Yates).
   */
  sample(n: number, k: number): number[] {
    if (k < 0 || k > n) {
      throw new Error(`Cannot sample ${k} of ${n}`);
    }
    const pool = Array.from({ length: n }, (_, i) => i);
    for (let i = 0; i < k; i++) {
      const j = i + this.nextInt(n - i);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, k);
  }
}
