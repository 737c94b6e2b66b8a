/**
 * PRNG Service - Seeded Random Source for Word Selection
 *
 * SplitMix64 expands a 64-bit seed into two state words; Xoroshiro128+
 * generates from them. Every random decision in a batch (sequence sampling,
 * word choice, verb candidate order) draws from one instance, so a batch is
 * reproducible from its seed.
 *
 * References:
 * - SplitMix64: https://prng.di.unimi.it/splitmix64.c
 * - Xoroshiro128+: https://prng.di.unimi.it/xoroshiro128plus.c
 *
 * @example
 * ```typescript
 * const prng = new PRNG(12345n);
 * prng.choice(['corre', 'dorme']); // same word every run with this seed
 * prng.shuffle(['a', 'b', 'c']);   // new array, input untouched
 * ```
 */

const UINT64_MAX = 0xffffffffffffffffn;
const UINT32_RANGE = 0x100000000;
const SPLITMIX64_GAMMA = 0x9e3779b97f4a7c15n;
const SPLITMIX64_CONST_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX64_CONST_2 = 0x94d049bb133111ebn;
const XOROSHIRO_ROTL_A = 24n;
const XOROSHIRO_ROTL_B = 37n;
const XOROSHIRO_SHIFT = 16n;

/**
 * The randomness the generation engine needs. PRNG is the production
 * implementation; tests may substitute a scripted source.
 */
export interface RandomSource {
  /** Uniformly chosen element. Throws on an empty array. */
  choice<T>(items: readonly T[]): T;
  /** Unbiased permutation as a new array. */
  shuffle<T>(items: readonly T[]): T[];
}

export class PRNG implements RandomSource {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - 64-bit seed; values outside [0, 2^64) are masked
   * @throws {Error} If seed is not a BigInt
   */
  constructor(seed: bigint) {
    if (typeof seed !== 'bigint') {
      throw new Error('seed must be a BigInt');
    }

    let x = seed & UINT64_MAX;
    x = (x + SPLITMIX64_GAMMA) & UINT64_MAX;
    this.state0 = this.splitMix64(x);
    x = (x + SPLITMIX64_GAMMA) & UINT64_MAX;
    this.state1 = this.splitMix64(x);

    // An all-zero state would only ever produce zeros
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = 1n;
    }
  }

  private splitMix64(value: bigint): bigint {
    let z = value;
    z = ((z ^ (z >> 30n)) * SPLITMIX64_CONST_1) & UINT64_MAX;
    z = ((z ^ (z >> 27n)) * SPLITMIX64_CONST_2) & UINT64_MAX;
    return z ^ (z >> 31n);
  }

  private rotl(x: bigint, k: bigint): bigint {
    return ((x << k) | (x >> (64n - k))) & UINT64_MAX;
  }

  private next(): bigint {
    const s0 = this.state0;
    let s1 = this.state1;
    const result = (s0 + s1) & UINT64_MAX;

    s1 ^= s0;
    this.state0 =
      (this.rotl(s0, XOROSHIRO_ROTL_A) ^ s1 ^ (s1 << XOROSHIRO_SHIFT)) &
      UINT64_MAX;
    this.state1 = this.rotl(s1, XOROSHIRO_ROTL_B);

    return result;
  }

  /**
   * 32-bit unsigned integer taken from the high half of the 64-bit output
   * (the low bits of Xoroshiro128+ are weaker).
   */
  nextUint(): number {
    return Number(this.next() >> 32n) >>> 0;
  }

  /** Float in [0, 1). */
  nextFloat(): number {
    return this.nextUint() / UINT32_RANGE;
  }

  /** Integer in [0, bound). */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new Error(`bound must be a positive integer (got ${bound})`);
    }
    return Math.floor(this.nextFloat() * bound);
  }

  /**
   * Fisher-Yates shuffle into a new array.
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }

  /**
   * @throws {Error} If items is empty
   */
  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot choose from empty array');
    }
    return items[this.nextInt(items.length)];
  }
}
