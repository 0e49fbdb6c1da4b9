/**
 * RandomSource - Explicitly owned pseudo-random generator
 *
 * Wraps a seedrandom PRNG. With a seed the stream is deterministic;
 * without one seedrandom draws its seed from system entropy, so repeated
 * runs differ (the Monte Carlo default).
 */

import seedrandom from "seedrandom";

export class RandomSource {
  private readonly prng: seedrandom.PRNG;
  private spare: number | null = null;

  /**
   * @param seed - Fixed seed for reproducible streams; entropy when omitted
   */
  constructor(readonly seed?: number | string) {
    this.prng = seed === undefined ? seedrandom() : seedrandom(String(seed));
  }

  /**
   * Uniform draw in [0, 1).
   */
  uniform(): number {
    return this.prng();
  }

  /**
   * Standard normal draw (mean 0, variance 1), Box-Muller transform.
   * Each pair of uniforms yields two normals; the second is cached.
   */
  gaussian(): number {
    if (this.spare !== null) {
      const value = this.spare;
      this.spare = null;
      return value;
    }

    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - this.prng();
    const u2 = this.prng();
    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this.spare = r * Math.sin(theta);
    return r * Math.cos(theta);
  }
}

/**
 * Create a random source, seeded when a seed is given.
 */
export function createRandomSource(seed?: number | string): RandomSource {
  return new RandomSource(seed);
}
