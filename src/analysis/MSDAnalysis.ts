/**
 * MSDAnalysis - End-to-end pipelines
 *
 * configuration → trajectory → MSD curve → regime report, for simulated
 * runs and for experimental trajectories. Each call owns everything it
 * creates; nothing is shared between runs.
 */

import { createSimulationConfig } from "@/config/simulationConfig";
import { SimulationDebugLogger } from "@/debug/SimulationDebugLogger";
import { InsufficientDataError, InvalidParameterError } from "@/errors/SimulationError";
import {
  analyticUnderdampedMSD,
  directMSD,
  logSpacedLags,
  medianInterval,
  slidingWindowMSD,
  type AnalyticMSDOptions,
  type SlidingWindowOptions,
} from "@/msd/MSDEstimator";
import { classify, defaultFitWindow } from "@/msd/RegimeClassifier";
import { simulateTrajectory } from "@/trajectory/TrajectoryBuilder";
import type {
  FitWindow,
  MSDCurve,
  MSDPoint,
  RegimeReport,
  SimulationConfig,
  SimulationOptions,
  Trajectory,
} from "@/types";

// =============================================================================
// TYPES
// =============================================================================

export interface FitOptions {
  readonly window?: FitWindow;
  /** Regime classification tolerance around slopes 1 and 2 */
  readonly tolerance?: number;
}

export interface SimulationAnalysisOptions extends FitOptions {
  /** Number of log-spaced lags for the analytic overlay (default 50) */
  readonly analyticLagCount?: number;
  readonly analytic?: AnalyticMSDOptions;
}

export interface SimulationAnalysis {
  readonly config: SimulationConfig;
  readonly trajectory: Trajectory;
  /** Direct-mode MSD of the simulated trajectory */
  readonly msd: MSDCurve;
  /** VACF-integrated overlay; underdamped runs only */
  readonly analytic?: MSDCurve;
  readonly report: RegimeReport;
}

export interface ExperimentalAnalysisOptions extends FitOptions {
  /** Estimator for the trajectory (default "sliding-window") */
  readonly mode?: "direct" | "sliding-window";
  readonly slidingWindow?: SlidingWindowOptions;
}

export interface ExperimentalAnalysis {
  readonly trajectory: Trajectory;
  readonly msd: MSDCurve;
  readonly report: RegimeReport;
}

/** Particle description for simulating alongside an experiment */
export interface ComparisonParameters {
  readonly mass: number;
  readonly radius: number;
  readonly temperature?: number;
  readonly viscosity?: number;
  readonly seed?: number | string;
  readonly window?: FitWindow;
}

export interface SlopeComparison {
  readonly experimental: RegimeReport;
  readonly simulated: RegimeReport;
  /** |simulated slope − experimental slope| */
  readonly difference: number;
}

const DEFAULT_ANALYTIC_LAG_COUNT = 50;

// =============================================================================
// PIPELINES
// =============================================================================

/**
 * Simulate one trajectory and analyse it.
 */
export function runSimulationAnalysis(
  options: SimulationOptions,
  analysisOptions: SimulationAnalysisOptions = {}
): SimulationAnalysis {
  const config = createSimulationConfig(options);
  SimulationDebugLogger.beginRun("simulation", config);

  const trajectory = simulateTrajectory(config);
  SimulationDebugLogger.logTrajectory(trajectory);

  const msd = directMSD(trajectory);
  SimulationDebugLogger.logCurve(msd);

  let analytic: MSDCurve | undefined;
  if (config.regime === "underdamped") {
    const { dt, steps } = config.grid;
    const lags = logSpacedLags(
      dt,
      steps * dt,
      Math.max(2, analysisOptions.analyticLagCount ?? DEFAULT_ANALYTIC_LAG_COUNT)
    );
    analytic = analyticUnderdampedMSD(config.physical, lags, analysisOptions.analytic);
    SimulationDebugLogger.logCurve(analytic);
  }

  const report = classify(msd, analysisOptions);
  SimulationDebugLogger.logFit(report);

  return { config, trajectory, msd, analytic, report };
}

/**
 * Analyse an experimental (or any externally supplied) trajectory.
 */
export function runExperimentalAnalysis(
  trajectory: Trajectory,
  options: ExperimentalAnalysisOptions = {}
): ExperimentalAnalysis {
  SimulationDebugLogger.beginRun("experimental");
  SimulationDebugLogger.logTrajectory(trajectory);

  const msd =
    options.mode === "direct"
      ? directMSD(trajectory)
      : slidingWindowMSD(trajectory, options.slidingWindow);
  SimulationDebugLogger.logCurve(msd);

  const report = classify(msd, options);
  SimulationDebugLogger.logFit(report);

  return { trajectory, msd, report };
}

/**
 * Simulate an overdamped particle on the experiment's sampling and
 * compare log-log slopes. Both curves use the sliding-window estimator
 * and the same fit window (default: the experiment's default window).
 */
export function compareWithSimulation(
  experimental: Trajectory,
  parameters: ComparisonParameters
): SlopeComparison {
  const first = experimental.samples[0];
  const last = experimental.samples[experimental.samples.length - 1];
  if (!first || !last || first === last) {
    throw new InsufficientDataError(
      `The experimental trajectory needs at least 2 samples, got ${experimental.samples.length}`
    );
  }

  const { grid } = experimental;
  const dt =
    grid.type === "regular" ? grid.dt : medianInterval(experimental.samples.map((s) => s.t));

  const { window: requestedWindow, ...particle } = parameters;
  const simulated = simulateTrajectory(
    createSimulationConfig({
      ...particle,
      dt,
      duration: last.t - first.t,
      regime: "overdamped",
    })
  );

  const experimentalCurve = slidingWindowMSD(experimental);
  const window = requestedWindow ?? defaultFitWindow(experimentalCurve);

  const experimentalReport = classify(experimentalCurve, { window });
  const simulatedReport = classify(slidingWindowMSD(simulated), { window });

  return {
    experimental: experimentalReport,
    simulated: simulatedReport,
    difference: Math.abs(simulatedReport.slope - experimentalReport.slope),
  };
}

/**
 * Mean direct-mode MSD over independent runs.
 *
 * Run r is seeded with seed + r (numeric seeds) or `${seed}:${r}`
 * (string seeds); unseeded runs each draw their own entropy. Curves are
 * merged only after every run has finished.
 */
export function simulateEnsembleMSD(options: SimulationOptions, runs: number): MSDCurve {
  if (!Number.isInteger(runs) || runs < 1) {
    throw new InvalidParameterError(`runs must be an integer >= 1, got ${runs}`);
  }

  const curves: MSDCurve[] = [];
  for (let r = 0; r < runs; r++) {
    const config = createSimulationConfig({ ...options, seed: runSeed(options.seed, r) });
    curves.push(directMSD(simulateTrajectory(config)));
  }

  return averageCurves(curves);
}

/**
 * Pointwise mean of curves sampled at identical lags.
 */
export function averageCurves(curves: readonly MSDCurve[]): MSDCurve {
  const first = curves[0];
  if (!first) {
    throw new InvalidParameterError("At least one curve is required");
  }

  const points: MSDPoint[] = first.points.map((point, i) => {
    let sum = 0;
    for (const curve of curves) {
      const other = curve.points[i];
      if (!other || other.lag !== point.lag) {
        throw new InvalidParameterError(`Curves disagree on the lag at index ${i}`);
      }
      sum += other.msd;
    }
    return { lag: point.lag, msd: sum / curves.length };
  });

  return Object.freeze({ mode: first.mode, points: Object.freeze(points) });
}

function runSeed(seed: number | string | undefined, run: number): number | string | undefined {
  if (seed === undefined) return undefined;
  return typeof seed === "number" ? seed + run : `${seed}:${run}`;
}
