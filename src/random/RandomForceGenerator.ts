import { InvalidParameterError, requireNonNegative } from "@/errors/SimulationError";
import type { RandomSource } from "./RandomSource";

/**
 * RandomForceGenerator - Gaussian stochastic increments for one axis
 *
 * Produces independent zero-mean normal draws with a caller-given
 * variance. The variance comes from the fluctuation-dissipation relation
 * of the integrator that consumes the draws. A variance of zero gives
 * exact zeros: every draw is scaled by sqrt(variance).
 */
export class RandomForceGenerator {
  constructor(private readonly source: RandomSource) {}

  /**
   * Draw `count` samples with the given variance.
   */
  sample(count: number, variance: number): number[] {
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidParameterError(`count must be an integer >= 1, got ${count}`);
    }
    requireNonNegative("variance", variance);

    const scale = Math.sqrt(variance);
    const samples = new Array<number>(count);
    for (let i = 0; i < count; i++) {
      samples[i] = scale * this.source.gaussian();
    }
    return samples;
  }
}
