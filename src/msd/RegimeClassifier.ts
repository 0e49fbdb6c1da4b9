import { InsufficientDataError, InvalidParameterError, requirePositive } from "@/errors/SimulationError";
import type { DiffusionRegime, FitWindow, MSDCurve, RegimeReport } from "@/types";

/** Ordinary least squares line through (x, y) */
export interface LinearFit {
  readonly slope: number;
  readonly intercept: number;
  readonly rSquared: number;
  readonly pointCount: number;
}

export interface ClassifyOptions {
  /** Lag range of the fit (default: defaultFitWindow(curve)) */
  readonly window?: FitWindow;
  /** Allowed distance from slope 1 or 2 (default 0.1) */
  readonly tolerance?: number;
}

const DEFAULT_REGIME_TOLERANCE = 0.1;

/**
 * Fit a line to y against x by ordinary least squares.
 *
 * @throws InsufficientDataError with fewer than 2 points or a
 *   degenerate x range
 */
export function fitLine(xs: readonly number[], ys: readonly number[]): LinearFit {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    throw new InsufficientDataError(`A line fit needs at least 2 points, got ${n}`);
  }

  let meanX = 0;
  let meanY = 0;
  for (let i = 0; i < n; i++) {
    meanX += xs[i] ?? 0;
    meanY += ys[i] ?? 0;
  }
  meanX /= n;
  meanY /= n;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = (xs[i] ?? 0) - meanX;
    const dy = (ys[i] ?? 0) - meanY;
    sxx += dx * dx;
    sxy += dx * dy;
    syy += dy * dy;
  }

  if (sxx === 0) {
    throw new InsufficientDataError("All fit points share the same lag; the slope is undefined");
  }

  const slope = sxy / sxx;
  // A perfectly flat response is fully explained by the line
  const rSquared = syy === 0 ? 1 : (sxy * sxy) / (sxx * syy);

  return { slope, intercept: meanY - slope * meanX, rSquared, pointCount: n };
}

/**
 * Default fit window: from the first positive lag
 * to one tenth of the last lag.
 *
 * Windows are inclusive at both ends, so the first positive lag is
 * always fitted; an exclusive lower bound would drop it.
 */
export function defaultFitWindow(curve: MSDCurve): FitWindow {
  const positive = curve.points.filter((p) => p.lag > 0);
  const first = positive[0];
  const last = positive[positive.length - 1];
  if (!first || !last) {
    throw new InsufficientDataError("The MSD curve has no positive lags");
  }
  return { minLag: first.lag, maxLag: last.lag / 10 };
}

/**
 * Fit log10(MSD) against log10(lag) over an inclusive lag window.
 * Points with lag <= 0 or MSD <= 0 have no logarithm and are dropped.
 *
 * @returns slope (the anomalous diffusion exponent), intercept
 *   (log10 of the MSD at lag 1 s) and R²
 */
export function fitLogLogSlope(curve: MSDCurve, window?: FitWindow): LinearFit {
  const logLag: number[] = [];
  const logMsd: number[] = [];

  for (const { lag, msd } of curve.points) {
    if (lag <= 0 || msd <= 0) continue;
    if (window && (lag < window.minLag || lag > window.maxLag)) continue;
    logLag.push(Math.log10(lag));
    logMsd.push(Math.log10(msd));
  }

  if (logLag.length < 2) {
    throw new InsufficientDataError(
      `Need at least 2 points with positive lag and MSD in the fit window, got ${logLag.length}`
    );
  }

  return fitLine(logLag, logMsd);
}

/**
 * Name the regime for a log-log slope.
 */
export function classifyRegime(slope: number, tolerance = DEFAULT_REGIME_TOLERANCE): DiffusionRegime {
  requirePositive("tolerance", tolerance);
  if (Math.abs(slope - 2) <= tolerance) return "ballistic";
  if (Math.abs(slope - 1) <= tolerance) return "diffusive";
  return "intermediate";
}

/**
 * Fit the curve and classify its regime.
 */
export function classify(curve: MSDCurve, options: ClassifyOptions = {}): RegimeReport {
  if (options.window && !(options.window.minLag <= options.window.maxLag)) {
    throw new InvalidParameterError(
      `Fit window minLag (${options.window.minLag}) must not exceed maxLag (${options.window.maxLag})`
    );
  }
  // Short curves give an empty default window; the fit reports it
  const window = options.window ?? defaultFitWindow(curve);

  const fit = fitLogLogSlope(curve, window);
  return {
    ...fit,
    window,
    regime: classifyRegime(fit.slope, options.tolerance),
  };
}
