/**
 * LangevinIntegrator - One-axis steppers for the Langevin equation
 *
 * The damping regime is resolved once, by createIntegrator, into one of
 * two strategies sharing the same interface. The stepping loop in
 * integrateAxis never branches on the regime.
 *
 * - Overdamped: Euler-Maruyama on dx = sqrt(2D) dW.
 * - Underdamped: semi-implicit Euler; the velocity update uses the
 *   friction and random force at v_i, the position update uses v_{i+1}.
 */

import { validatePhysicalParameters } from "@/config/simulationConfig";
import { SimulationDebugLogger } from "@/debug/SimulationDebugLogger";
import { NumericInstabilityError, requirePositive } from "@/errors/SimulationError";
import type { DampingRegime, SimulationConfig } from "@/types";

// =============================================================================
// TYPES
// =============================================================================

/** State of one axis; overdamped integrators keep velocity at 0 */
export interface AxisState {
  readonly position: number;
  readonly velocity: number;
}

/**
 * Stepper for a single axis.
 */
export interface LangevinIntegrator {
  readonly regime: DampingRegime;
  /** Whether velocity is part of the integrated state */
  readonly tracksVelocity: boolean;
  /** Variance of the noise draw consumed by each step */
  readonly noiseVariance: number;
  /**
   * Advance one timestep.
   *
   * @param state Current axis state
   * @param noise Draw from RandomForceGenerator with variance noiseVariance
   */
  step(state: AxisState, noise: number): AxisState;
}

// =============================================================================
// OVERDAMPED
// =============================================================================

export class OverdampedIntegrator implements LangevinIntegrator {
  readonly regime = "overdamped" as const;
  readonly tracksVelocity = false;
  readonly noiseVariance: number;

  /**
   * @param diffusionCoefficient D (m²/s)
   * @param dt Timestep (s)
   */
  constructor(diffusionCoefficient: number, dt: number) {
    this.noiseVariance = 2 * diffusionCoefficient * dt;
  }

  step(state: AxisState, noise: number): AxisState {
    return { position: state.position + noise, velocity: 0 };
  }
}

// =============================================================================
// UNDERDAMPED
// =============================================================================

export class UnderdampedIntegrator implements LangevinIntegrator {
  readonly regime = "underdamped" as const;
  readonly tracksVelocity = true;
  /** σ_F² = 2 γ k_B T / dt */
  readonly noiseVariance: number;

  constructor(
    private readonly mass: number,
    private readonly friction: number,
    thermalEnergy: number,
    private readonly dt: number
  ) {
    this.noiseVariance = (2 * friction * thermalEnergy) / dt;
  }

  step(state: AxisState, noise: number): AxisState {
    const acceleration = (-this.friction * state.velocity + noise) / this.mass;
    const velocity = state.velocity + acceleration * this.dt;
    return {
      position: state.position + velocity * this.dt,
      velocity,
    };
  }
}

// =============================================================================
// FACTORY & STEPPING
// =============================================================================

/**
 * dt / τ at or above which the underdamped velocity recursion
 * v ← (1 − dt/τ) v diverges.
 */
export const DIVERGENT_STEP_RATIO = 2;

/**
 * Check the underdamped timestep against the relaxation time τ = m/γ.
 * Divergent steps throw; steps above stabilityFraction·τ are integrable
 * but inaccurate and only warn.
 */
export function checkStability(config: SimulationConfig): void {
  if (config.regime !== "underdamped") return;

  const { dt } = config.grid;
  const tau = config.derived.relaxationTime;
  const ratio = dt / tau;

  if (ratio >= DIVERGENT_STEP_RATIO) {
    throw new NumericInstabilityError(
      `dt (${dt} s) is ${ratio.toPrecision(3)}x the relaxation time m/γ (${tau.toPrecision(3)} s); ` +
        `the underdamped integrator diverges for dt >= ${DIVERGENT_STEP_RATIO}·m/γ`
    );
  }

  if (ratio > config.stabilityFraction) {
    SimulationDebugLogger.warn(
      `dt (${dt} s) exceeds ${config.stabilityFraction}·m/γ (${tau.toPrecision(3)} s); ` +
        `velocity relaxation is under-resolved`
    );
  }
}

/**
 * Create the integrator for the configured regime.
 */
export function createIntegrator(config: SimulationConfig): LangevinIntegrator {
  validatePhysicalParameters(config.physical);
  requirePositive("dt", config.grid.dt);
  requirePositive("duration", config.grid.duration);
  checkStability(config);

  const { derived, grid } = config;
  switch (config.regime) {
    case "overdamped":
      return new OverdampedIntegrator(derived.diffusionCoefficient, grid.dt);
    case "underdamped":
      return new UnderdampedIntegrator(
        config.physical.mass,
        derived.friction,
        derived.thermalEnergy,
        grid.dt
      );
  }
}

/**
 * Integrate one axis over all noise draws.
 *
 * @returns noise.length + 1 states, starting with `initial`
 * @throws NumericInstabilityError if the state stops being finite
 */
export function integrateAxis(
  integrator: LangevinIntegrator,
  initial: AxisState,
  noise: readonly number[]
): AxisState[] {
  const states: AxisState[] = [initial];
  let state = initial;

  for (let i = 0; i < noise.length; i++) {
    state = integrator.step(state, noise[i] ?? 0);
    if (!Number.isFinite(state.position) || !Number.isFinite(state.velocity)) {
      throw new NumericInstabilityError(
        `${integrator.regime} integration diverged at step ${i + 1}`
      );
    }
    states.push(state);
  }

  return states;
}
