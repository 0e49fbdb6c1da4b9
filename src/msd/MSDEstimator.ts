/**
 * MSDEstimator - Mean squared displacement from a single trajectory
 *
 * Estimators:
 * - direct: |r(t) − r(0)|², valid because a simulation starts from a
 *   known fixed point; no averaging
 * - sliding-window: average of |r(t+Δ) − r(t)|² over every pair of
 *   samples separated by Δ; for experimental windows
 * - analytic: the underdamped Langevin MSD, integrated numerically from
 *   the exponential velocity autocorrelation function
 * - vacf: the same integral over an empirical VACF measured from
 *   finite-difference velocities
 *
 * Every curve starts at (0, 0).
 */

import { derivePhysicalQuantities, validatePhysicalParameters } from "@/config/simulationConfig";
import {
  InsufficientDataError,
  InvalidParameterError,
  NumericInstabilityError,
  requirePositive,
} from "@/errors/SimulationError";
import { Vec2 } from "@/math/Vec2";
import type {
  IrregularTimeGrid,
  MSDCurve,
  MSDPoint,
  PhysicalParameters,
  Trajectory,
  TrajectorySample,
  Vector2,
} from "@/types";

// =============================================================================
// OPTIONS
// =============================================================================

export interface SlidingWindowOptions {
  /** Largest lag, in samples, for regular grids (default: all offsets) */
  readonly maxLagSteps?: number;
  /**
   * Irregular grids: a pair joins lag bin k when |Δt − k·h| <= binTolerance·h,
   * h being the median sampling interval (default 0.5, nearest bin)
   */
  readonly binTolerance?: number;
}

export interface AnalyticMSDOptions {
  /** Spatial dimensions summed into the MSD (default 2) */
  readonly dimensions?: number;
  /** Relative change allowed between successive refinements (default 0.01) */
  readonly tolerance?: number;
  /** Trapezoid intervals of the first estimate (default 64) */
  readonly initialIntervals?: number;
  /** Maximum number of interval halvings (default 16) */
  readonly maxRefinements?: number;
}

const DEFAULT_ANALYTIC_OPTIONS = {
  dimensions: 2,
  tolerance: 0.01,
  initialIntervals: 64,
  maxRefinements: 16,
} as const;

const DEFAULT_BIN_TOLERANCE = 0.5;

/**
 * Relaxation times after which the VACF integral switches to its closed
 * form; exp(−50) is below double precision relative to the head.
 */
const VACF_HORIZON = 50;

// =============================================================================
// ESTIMATORS
// =============================================================================

/**
 * Direct-mode MSD: squared displacement from the first sample,
 * at lag t_i − t_0.
 */
export function directMSD(trajectory: Trajectory): MSDCurve {
  const samples = requireSamples(trajectory);
  const first = samples[0];

  const points = samples.map((sample) => ({
    lag: sample.t - first.t,
    msd: Vec2.distanceSquared(first.position, sample.position),
  }));

  return freezeCurve("direct", points);
}

/**
 * Sliding-window MSD over all achievable lags.
 */
export function slidingWindowMSD(trajectory: Trajectory, options: SlidingWindowOptions = {}): MSDCurve {
  const samples = requireSamples(trajectory);
  const { grid } = trajectory;

  if (grid.type === "regular") {
    return regularSlidingWindow(samples, grid.dt, options.maxLagSteps);
  }
  return binnedSlidingWindow(samples, grid, options.binTolerance ?? DEFAULT_BIN_TOLERANCE);
}

/**
 * Choose the estimator from the trajectory's origin: direct for
 * fixed-origin simulations, sliding-window for experimental data.
 */
export function estimateMSD(trajectory: Trajectory, options: SlidingWindowOptions = {}): MSDCurve {
  return trajectory.source === "simulated"
    ? directMSD(trajectory)
    : slidingWindowMSD(trajectory, options);
}

/**
 * Underdamped Langevin MSD at the requested lags:
 *
 *   MSD(t) = 2 ∫₀ᵗ (t − τ) C(τ) dτ,   C(τ) = d · (k_B T / m) · exp(−γτ / m)
 *
 * C is the dot-product VACF ⟨v(0)·v(τ)⟩ in d dimensions. The integral
 * over [0, min(t, 50·m/γ)] is refined by halving the trapezoid step
 * until two successive estimates agree within the tolerance; the
 * remaining exponential tail is added in closed form.
 */
export function analyticUnderdampedMSD(
  physical: PhysicalParameters,
  lags: readonly number[],
  options: AnalyticMSDOptions = {}
): MSDCurve {
  validatePhysicalParameters(physical);
  const opts = { ...DEFAULT_ANALYTIC_OPTIONS, ...options };
  if (!Number.isInteger(opts.dimensions) || opts.dimensions < 1) {
    throw new InvalidParameterError(`dimensions must be an integer >= 1, got ${opts.dimensions}`);
  }
  requirePositive("tolerance", opts.tolerance);
  if (!Number.isInteger(opts.initialIntervals) || opts.initialIntervals < 1) {
    throw new InvalidParameterError(
      `initialIntervals must be an integer >= 1, got ${opts.initialIntervals}`
    );
  }

  const { thermalEnergy, relaxationTime } = derivePhysicalQuantities(physical);
  const amplitude = (opts.dimensions * thermalEnergy) / physical.mass;
  const vacf = (tau: number): number => amplitude * Math.exp(-tau / relaxationTime);

  for (const lag of lags) {
    if (!Number.isFinite(lag) || lag < 0) {
      throw new InvalidParameterError(`lags must be finite and >= 0, got ${lag}`);
    }
  }
  const sortedLags = [...new Set([0, ...lags])].sort((a, b) => a - b);

  const horizon = VACF_HORIZON * relaxationTime;

  const points = sortedLags.map((lag) => {
    const upper = Math.min(lag, horizon);
    const head = integrateToTolerance(
      (tau) => (lag - tau) * vacf(tau),
      upper,
      opts.tolerance,
      opts.initialIntervals,
      opts.maxRefinements
    );
    const tail = lag > upper ? amplitude * exponentialTail(lag, upper, relaxationTime) : 0;
    return { lag, msd: 2 * (head + tail) };
  });

  return freezeCurve("analytic", points);
}

/**
 * Finite-difference velocities at every sample: central differences
 * inside, one-sided at both ends. Works on irregular grids.
 */
export function velocitySeries(trajectory: Trajectory): Vector2[] {
  const samples = requireSamples(trajectory);
  const last = samples.length - 1;

  return samples.map((_, i) => {
    const before = samples[Math.max(i - 1, 0)];
    const after = samples[Math.min(i + 1, last)];
    if (!before || !after) {
      throw new InsufficientDataError(`No neighbouring samples for velocity at row ${i}`);
    }
    const span = after.t - before.t;
    const delta = Vec2.subtract(after.position, before.position);
    return Vec2.create(delta.x / span, delta.y / span);
  });
}

/**
 * Empirical dot-product VACF: C_k = mean over i of v_i · v_{i+k}, for
 * k = 0..n−1, each lag averaged over its n − k available pairs.
 */
export function empiricalVACF(velocities: readonly Vector2[]): number[] {
  const n = velocities.length;
  if (n < 2) {
    throw new InsufficientDataError(`A VACF needs at least 2 velocities, got ${n}`);
  }

  const vacf: number[] = [];
  for (let k = 0; k < n; k++) {
    let sum = 0;
    for (let i = 0; i + k < n; i++) {
      const a = velocities[i];
      const b = velocities[i + k];
      if (!a || !b) continue;
      sum += a.x * b.x + a.y * b.y;
    }
    vacf.push(sum / (n - k));
  }
  return vacf;
}

/**
 * MSD from a VACF sampled every dt:
 * MSD(t_k) = 2 ∫₀^{t_k} (t_k − s) C(s) ds, trapezoidal on the samples.
 */
export function msdFromVACF(vacf: readonly number[], dt: number): MSDCurve {
  requirePositive("dt", dt);
  if (vacf.length < 2) {
    throw new InsufficientDataError(`MSD from a VACF needs at least 2 lags, got ${vacf.length}`);
  }
  for (const value of vacf) {
    if (!Number.isFinite(value)) {
      throw new InvalidParameterError(`VACF values must be finite, got ${value}`);
    }
  }

  const points = vacf.map((_, k) => {
    const lag = k * dt;
    let integral = 0;
    for (let j = 0; j <= k; j++) {
      const weight = j === 0 || j === k ? 0.5 : 1;
      integral += weight * (lag - j * dt) * (vacf[j] ?? 0);
    }
    return { lag, msd: 2 * integral * dt };
  });

  return freezeCurve("vacf", points);
}

/**
 * `count` lags spaced evenly in log10 between minLag and maxLag,
 * inclusive. Keeps the analytic overlay cheap on long trajectories.
 */
export function logSpacedLags(minLag: number, maxLag: number, count: number): number[] {
  requirePositive("minLag", minLag);
  requirePositive("maxLag", maxLag);
  if (maxLag < minLag) {
    throw new InvalidParameterError(`maxLag (${maxLag}) must be >= minLag (${minLag})`);
  }
  if (!Number.isInteger(count) || count < 2) {
    throw new InvalidParameterError(`count must be an integer >= 2, got ${count}`);
  }

  const logMin = Math.log10(minLag);
  const span = Math.log10(maxLag) - logMin;
  return Array.from({ length: count }, (_, i) =>
    i === count - 1 ? maxLag : 10 ** (logMin + (span * i) / (count - 1))
  );
}

// =============================================================================
// SLIDING WINDOW INTERNALS
// =============================================================================

function regularSlidingWindow(
  samples: readonly TrajectorySample[],
  dt: number,
  maxLagSteps = samples.length - 1
): MSDCurve {
  if (!Number.isInteger(maxLagSteps) || maxLagSteps < 1) {
    throw new InvalidParameterError(`maxLagSteps must be an integer >= 1, got ${maxLagSteps}`);
  }
  const lastLag = Math.min(maxLagSteps, samples.length - 1);

  const points: MSDPoint[] = [{ lag: 0, msd: 0 }];
  for (let k = 1; k <= lastLag; k++) {
    let sum = 0;
    const pairs = samples.length - k;
    for (let i = 0; i < pairs; i++) {
      const a = samples[i];
      const b = samples[i + k];
      if (!a || !b) continue;
      sum += Vec2.distanceSquared(a.position, b.position);
    }
    points.push({ lag: k * dt, msd: sum / pairs });
  }

  return freezeCurve("sliding-window", points);
}

function binnedSlidingWindow(
  samples: readonly TrajectorySample[],
  grid: IrregularTimeGrid,
  binTolerance: number
): MSDCurve {
  if (!Number.isFinite(binTolerance) || binTolerance <= 0 || binTolerance > 0.5) {
    throw new InvalidParameterError(`binTolerance must be in (0, 0.5], got ${binTolerance}`);
  }

  const h = medianInterval(grid.times);
  const sums = new Map<number, { total: number; count: number }>();

  for (let i = 0; i < samples.length; i++) {
    const a = samples[i];
    if (!a) continue;
    for (let j = i + 1; j < samples.length; j++) {
      const b = samples[j];
      if (!b) continue;

      const separation = b.t - a.t;
      const k = Math.round(separation / h);
      // Bin 0 is reserved for the exact (0, 0) point
      if (k < 1 || Math.abs(separation - k * h) > binTolerance * h) continue;

      const bin = sums.get(k) ?? { total: 0, count: 0 };
      bin.total += Vec2.distanceSquared(a.position, b.position);
      bin.count += 1;
      sums.set(k, bin);
    }
  }

  const binned = [...sums.entries()]
    .sort(([a], [b]) => a - b)
    .map(([k, bin]) => ({ lag: k * h, msd: bin.total / bin.count }));

  return freezeCurve("sliding-window", [{ lag: 0, msd: 0 }, ...binned]);
}

/**
 * Median spacing of strictly increasing times.
 */
export function medianInterval(times: readonly number[]): number {
  const intervals: number[] = [];
  for (let i = 1; i < times.length; i++) {
    const current = times[i];
    const previous = times[i - 1];
    if (current === undefined || previous === undefined) continue;
    intervals.push(current - previous);
  }
  if (intervals.length === 0) {
    throw new InsufficientDataError("At least 2 sample times are needed for a sampling interval");
  }

  intervals.sort((a, b) => a - b);
  const mid = Math.floor(intervals.length / 2);
  const upper = intervals[mid] ?? 0;
  const lower = intervals[mid - 1] ?? upper;
  return intervals.length % 2 === 0 ? (lower + upper) / 2 : upper;
}

// =============================================================================
// QUADRATURE
// =============================================================================

/**
 * Composite trapezoidal rule on [0, upper] with n intervals.
 */
export function trapezoid(f: (x: number) => number, upper: number, intervals: number): number {
  const h = upper / intervals;
  let sum = (f(0) + f(upper)) / 2;
  for (let i = 1; i < intervals; i++) {
    sum += f(i * h);
  }
  return sum * h;
}

/**
 * ∫_from^t (t − s) e^{−s/τ} ds
 */
function exponentialTail(t: number, from: number, tau: number): number {
  const decayed = Math.exp(-from / tau);
  return tau * (t - from) * decayed - tau * tau * (decayed - Math.exp(-t / tau));
}

function integrateToTolerance(
  f: (x: number) => number,
  upper: number,
  tolerance: number,
  initialIntervals: number,
  maxRefinements: number
): number {
  if (upper === 0) return 0;

  let intervals = initialIntervals;
  let previous = trapezoid(f, upper, intervals);

  for (let refinement = 0; refinement < maxRefinements; refinement++) {
    intervals *= 2;
    const current = trapezoid(f, upper, intervals);
    if (Math.abs(current - previous) <= tolerance * Math.abs(current)) {
      return current;
    }
    previous = current;
  }

  throw new NumericInstabilityError(
    `VACF integral up to t = ${upper} s did not converge within ${maxRefinements} refinements`
  );
}

// =============================================================================
// HELPERS
// =============================================================================

function requireSamples(
  trajectory: Trajectory
): readonly [TrajectorySample, TrajectorySample, ...TrajectorySample[]] {
  const { samples } = trajectory;
  if (!isAtLeastTwo(samples)) {
    throw new InsufficientDataError(
      `MSD estimation needs at least 2 samples, got ${samples.length}`
    );
  }
  return samples;
}

function isAtLeastTwo<T>(items: readonly T[]): items is readonly [T, T, ...T[]] {
  return items.length >= 2;
}

function freezeCurve(mode: MSDCurve["mode"], points: MSDPoint[]): MSDCurve {
  return Object.freeze({ mode, points: Object.freeze(points) });
}
