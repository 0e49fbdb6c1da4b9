/**
 * TimeGrid - Sample-time layouts for trajectories
 *
 * A regular grid is fully described by (start, dt, steps); an irregular
 * grid carries its explicit times. Downstream lag computation dispatches
 * on `type`.
 */

import { InvalidParameterError, MalformedInputError, requirePositive } from "@/errors/SimulationError";
import type { IrregularTimeGrid, RegularTimeGrid, TimeGrid } from "@/types";

/** Guards floor(duration / dt) against ratios like 9999.999999999998 */
const STEP_COUNT_EPSILON = 1e-9;

/** Relative spacing deviation still treated as uniform sampling */
export const UNIFORM_SPACING_TOLERANCE = 1e-6;

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

/**
 * Create a regular grid with floor(duration / dt) steps.
 */
export function createRegularGrid(dt: number, duration: number, start = 0): RegularTimeGrid {
  requirePositive("dt", dt);
  requirePositive("duration", duration);
  if (!Number.isFinite(start)) {
    throw new InvalidParameterError(`start must be finite, got ${start}`);
  }

  const steps = Math.floor((duration / dt) * (1 + STEP_COUNT_EPSILON));
  if (steps < 1) {
    throw new InvalidParameterError(
      `duration (${duration} s) must cover at least one timestep (${dt} s)`
    );
  }

  return { type: "regular", start, dt, steps, duration };
}

/**
 * Create an irregular grid from strictly increasing times.
 */
export function createIrregularGrid(times: readonly number[]): IrregularTimeGrid {
  assertStrictlyIncreasing(times);
  return { type: "irregular", times: Object.freeze([...times]) };
}

/**
 * Pick the grid that describes the given times: regular when the
 * spacing is uniform, irregular otherwise.
 */
export function inferGrid(times: readonly number[]): TimeGrid {
  assertStrictlyIncreasing(times);

  const first = times[0];
  const last = times[times.length - 1];
  if (first === undefined || last === undefined || times.length < 2) {
    return createIrregularGrid(times);
  }

  const steps = times.length - 1;
  const dt = (last - first) / steps;
  const uniform = times.every(
    (t, i) => Math.abs(t - (first + i * dt)) <= UNIFORM_SPACING_TOLERANCE * dt
  );

  if (!uniform) {
    return createIrregularGrid(times);
  }

  return { type: "regular", start: first, dt, steps, duration: last - first };
}

// =============================================================================
// QUERIES
// =============================================================================

/**
 * Number of sample times on the grid.
 */
export function gridSize(grid: TimeGrid): number {
  return grid.type === "regular" ? grid.steps + 1 : grid.times.length;
}

/**
 * Sample time at index i.
 */
export function gridTime(grid: TimeGrid, index: number): number {
  if (grid.type === "regular") {
    return grid.start + index * grid.dt;
  }
  const t = grid.times[index];
  if (t === undefined) {
    throw new InvalidParameterError(`Time index ${index} out of bounds [0, ${grid.times.length - 1}]`);
  }
  return t;
}

/**
 * All sample times on the grid.
 */
export function gridTimes(grid: TimeGrid): number[] {
  if (grid.type === "irregular") {
    return [...grid.times];
  }
  return Array.from({ length: grid.steps + 1 }, (_, i) => grid.start + i * grid.dt);
}

function assertStrictlyIncreasing(times: readonly number[]): void {
  for (let i = 0; i < times.length; i++) {
    const t = times[i];
    if (t === undefined || !Number.isFinite(t)) {
      throw new MalformedInputError(`Time value at row ${i} is not a finite number`);
    }
    const previous = times[i - 1];
    if (previous !== undefined && t <= previous) {
      throw new MalformedInputError(
        `Time column must be strictly increasing: row ${i} (${t}) <= row ${i - 1} (${previous})`
      );
    }
  }
}
