import {
  InvalidParameterError,
  requireNonNegative,
  requirePositive,
} from "@/errors/SimulationError";
import { Vec2 } from "@/math/Vec2";
import { createRegularGrid } from "@/trajectory/TimeGrid";
import type {
  DampingRegime,
  DerivedQuantities,
  PhysicalParameters,
  SimulationConfig,
  SimulationOptions,
} from "@/types";
import { BOLTZMANN_CONSTANT, DEFAULT_SIMULATION_OPTIONS } from "@/types";

const DAMPING_REGIMES: readonly DampingRegime[] = ["overdamped", "underdamped"];

/**
 * Type guard for regime values arriving from untyped input (CLI flags, forms).
 */
export function isDampingRegime(value: unknown): value is DampingRegime {
  return DAMPING_REGIMES.some((regime) => regime === value);
}

/**
 * Stokes friction, thermal energy, diffusion coefficient and
 * velocity relaxation time for a spherical particle.
 */
export function derivePhysicalQuantities(physical: PhysicalParameters): DerivedQuantities {
  const friction = 6 * Math.PI * physical.viscosity * physical.radius;
  const thermalEnergy = BOLTZMANN_CONSTANT * physical.temperature;

  return {
    friction,
    thermalEnergy,
    diffusionCoefficient: thermalEnergy / friction,
    relaxationTime: physical.mass / friction,
  };
}

/**
 * Validate physical parameters. Temperature may be zero, which switches
 * off the thermal noise.
 */
export function validatePhysicalParameters(physical: PhysicalParameters): void {
  requirePositive("mass", physical.mass);
  requirePositive("radius", physical.radius);
  requireNonNegative("temperature", physical.temperature);
  requirePositive("viscosity", physical.viscosity);
}

/**
 * Build the validated simulation configuration.
 *
 * Defaults fill in temperature, viscosity, initial position and the
 * stability fraction; everything is checked before any integration runs.
 */
export function createSimulationConfig(options: SimulationOptions): SimulationConfig {
  const opts = {
    ...options,
    temperature: options.temperature ?? DEFAULT_SIMULATION_OPTIONS.temperature,
    viscosity: options.viscosity ?? DEFAULT_SIMULATION_OPTIONS.viscosity,
    initialPosition: options.initialPosition ?? DEFAULT_SIMULATION_OPTIONS.initialPosition,
    stabilityFraction: options.stabilityFraction ?? DEFAULT_SIMULATION_OPTIONS.stabilityFraction,
  };

  if (!isDampingRegime(opts.regime)) {
    throw new InvalidParameterError(
      `regime must be one of ${DAMPING_REGIMES.join(", ")}, got "${String(opts.regime)}"`
    );
  }

  const physical: PhysicalParameters = {
    mass: opts.mass,
    radius: opts.radius,
    temperature: opts.temperature,
    viscosity: opts.viscosity,
  };
  validatePhysicalParameters(physical);
  requirePositive("stabilityFraction", opts.stabilityFraction);

  const { x, y } = opts.initialPosition;
  if (!Vec2.isFinite(opts.initialPosition)) {
    throw new InvalidParameterError(`initialPosition must be finite, got (${x}, ${y})`);
  }

  return {
    physical,
    derived: derivePhysicalQuantities(physical),
    grid: createRegularGrid(opts.dt, opts.duration),
    regime: opts.regime,
    initialPosition: Vec2.create(x, y),
    seed: opts.seed,
    stabilityFraction: opts.stabilityFraction,
  };
}
