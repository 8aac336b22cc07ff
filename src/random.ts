/**
 * Random sources for the sampling estimator.
 *
 * The sampler never touches Math.random directly; it draws through a
 * RandomSource so tests can pass a seeded generator and replay a walk.
 */

export interface RandomSource {
  /** Uniform number in [0, 1). */
  next(): number;
  /** Uniform pick from a non-empty list. */
  choice<T>(items: readonly T[]): T;
  /** Pick items[i] with probability weights[i] / sum(weights). */
  weightedChoice<T>(items: readonly T[], weights: readonly number[]): T;
}

/**
 * Implements choice and weightedChoice on top of a single uniform
 * generator. Subclasses supply next().
 */
export abstract class UniformSource implements RandomSource {
  abstract next(): number;

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[Math.floor(this.next() * items.length)];
  }

  weightedChoice<T>(items: readonly T[], weights: readonly number[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    if (items.length !== weights.length) {
      throw new RangeError(`Got ${items.length} items but ${weights.length} weights`);
    }

    let total = 0;
    for (const w of weights) {
      if (!(w >= 0)) throw new RangeError(`Weights must be non-negative, got ${w}`);
      total += w;
    }
    if (total <= 0) {
      throw new RangeError('At least one weight must be positive');
    }

    const r = this.next() * total;
    let cumulative = 0;
    let lastPositive = 0;
    for (let i = 0; i < items.length; i++) {
      if (weights[i] === 0) continue;
      cumulative += weights[i];
      lastPositive = i;
      if (r < cumulative) return items[i];
    }

    // Rounding can leave r a hair above the running sum
    return items[lastPositive];
  }
}

/** Process-wide generator; the default when no source is passed. */
export class MathRandomSource extends UniformSource {
  next(): number {
    return Math.random();
  }
}

/**
 * xorshift32 PRNG for reproducible walks.
 * Not cryptographic.
 */
export class Xorshift32 extends UniformSource {
  private state: number;

  constructor(seed: number) {
    super();
    this.state = seed | 0 || 1; // zero state would stay zero forever
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >> 17;
    x ^= x << 5;
    this.state = x;
    return (x >>> 0) / 0x100000000;
  }
}

export const defaultRandom: RandomSource = new MathRandomSource();
