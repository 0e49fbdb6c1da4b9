/**
 * Core type definitions for Brownian motion simulation and MSD analysis
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable) */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

// =============================================================================
// PHYSICAL TYPES
// =============================================================================

/** Particle and solvent properties, SI units */
export interface PhysicalParameters {
  readonly mass: number; // kg
  readonly radius: number; // m
  readonly temperature: number; // K
  readonly viscosity: number; // Pa·s
}

/** Quantities derived from PhysicalParameters */
export interface DerivedQuantities {
  /** Stokes drag coefficient 6πηa (kg/s) */
  readonly friction: number;
  /** k_B T (J) */
  readonly thermalEnergy: number;
  /** k_B T / γ (m²/s) */
  readonly diffusionCoefficient: number;
  /** m / γ (s) */
  readonly relaxationTime: number;
}

/** Damping regime of the Langevin equation */
export type DampingRegime = "overdamped" | "underdamped";

// =============================================================================
// TIME GRID TYPES
// =============================================================================

/** Uniformly spaced sample times: start + i·dt for i = 0..steps */
export interface RegularTimeGrid {
  readonly type: "regular";
  readonly start: number;
  readonly dt: number;
  readonly steps: number;
  readonly duration: number;
}

/** Arbitrary strictly increasing sample times */
export interface IrregularTimeGrid {
  readonly type: "irregular";
  readonly times: readonly number[];
}

export type TimeGrid = RegularTimeGrid | IrregularTimeGrid;

// =============================================================================
// TRAJECTORY TYPES
// =============================================================================

/** Where a trajectory came from */
export type TrajectorySource = "simulated" | "experimental";

/** One sample of a 2D trajectory */
export interface TrajectorySample {
  readonly t: number;
  readonly position: Vector2;
  readonly velocity?: Vector2; // Only for underdamped simulations
}

/** Complete, immutable time series of a single particle */
export interface Trajectory {
  readonly grid: TimeGrid;
  readonly source: TrajectorySource;
  readonly samples: readonly TrajectorySample[];
}

/** Column-oriented external series, e.g. parsed from a CSV file */
export interface TimeSeriesInput {
  readonly t: readonly number[];
  readonly x: readonly number[];
  readonly y: readonly number[];
}

// =============================================================================
// MSD TYPES
// =============================================================================

/** MSD estimator mode */
export type MSDMode = "direct" | "sliding-window" | "analytic" | "vacf";

/** A single (lag, msd) pair */
export interface MSDPoint {
  readonly lag: number; // s
  readonly msd: number; // m²
}

/** Ordered MSD curve; the first point is always (0, 0) */
export interface MSDCurve {
  readonly mode: MSDMode;
  readonly points: readonly MSDPoint[];
}

/** Inclusive lag range used for a log-log fit */
export interface FitWindow {
  readonly minLag: number;
  readonly maxLag: number;
}

/** Diffusive regime read off the log-log slope */
export type DiffusionRegime =
  | "ballistic" // slope ≈ 2
  | "diffusive" // slope ≈ 1
  | "intermediate";

/** Result of fitting log10(MSD) against log10(lag) */
export interface RegimeReport {
  readonly slope: number;
  readonly intercept: number;
  readonly rSquared: number;
  readonly pointCount: number;
  readonly window: FitWindow;
  readonly regime: DiffusionRegime;
}

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

/** Caller-facing simulation options; omitted fields take defaults */
export interface SimulationOptions {
  readonly mass: number;
  readonly radius: number;
  readonly dt: number;
  readonly duration: number;
  readonly regime: DampingRegime;
  readonly temperature?: number;
  readonly viscosity?: number;
  readonly initialPosition?: Vector2;
  /** Fixed seed for reproducible runs; system entropy when omitted */
  readonly seed?: number | string;
  /** Fraction of the relaxation time above which dt triggers a warning */
  readonly stabilityFraction?: number;
}

/** Validated configuration, built once at the boundary */
export interface SimulationConfig {
  readonly physical: PhysicalParameters;
  readonly derived: DerivedQuantities;
  readonly grid: RegularTimeGrid;
  readonly regime: DampingRegime;
  readonly initialPosition: Vector2;
  readonly seed: number | string | undefined;
  readonly stabilityFraction: number;
}

// =============================================================================
// DEFAULT CONFIGURATIONS
// =============================================================================

/** Boltzmann constant (J/K) */
export const BOLTZMANN_CONSTANT = 1.380649e-23;

/** Default solvent: water at room temperature */
export const DEFAULT_PHYSICAL_CONSTANTS = {
  temperature: 298.15,
  viscosity: 1e-3,
} as const;

/** Defaults applied by createSimulationConfig */
export const DEFAULT_SIMULATION_OPTIONS = {
  ...DEFAULT_PHYSICAL_CONSTANTS,
  initialPosition: { x: 0, y: 0 },
  stabilityFraction: 0.1,
} as const;
