import {
  createIntegrator,
  integrateAxis,
  type AxisState,
  type LangevinIntegrator,
} from "@/dynamics/LangevinIntegrator";
import { InsufficientDataError, MalformedInputError } from "@/errors/SimulationError";
import { Vec2 } from "@/math/Vec2";
import { RandomForceGenerator } from "@/random/RandomForceGenerator";
import { createRandomSource, type RandomSource } from "@/random/RandomSource";
import type {
  SimulationConfig,
  TimeSeriesInput,
  Trajectory,
  TrajectorySample,
} from "@/types";
import { gridTime, inferGrid } from "./TimeGrid";

/**
 * TrajectoryBuilder - Assembles complete 2D trajectories
 *
 * First Principles:
 * - x and y are integrated independently, each from its own noise draws
 * - A simulated trajectory has steps + 1 samples, the first at t = 0
 * - Simulations start at rest at the configured initial position
 * - A finished trajectory is frozen; nothing downstream mutates it
 */
export class TrajectoryBuilder {
  private readonly integrator: LangevinIntegrator;
  private readonly forces: RandomForceGenerator;

  /**
   * @param config - Validated simulation configuration
   * @param source - Random source; defaults to one built from config.seed
   */
  constructor(
    private readonly config: SimulationConfig,
    source: RandomSource = createRandomSource(config.seed)
  ) {
    // Regime dispatch and stability checks happen here, before any step
    this.integrator = createIntegrator(config);
    this.forces = new RandomForceGenerator(source);
  }

  /**
   * Run the integrator over the whole grid.
   * Each call consumes fresh draws from the random source.
   */
  simulate(): Trajectory {
    const { grid, initialPosition } = this.config;
    const variance = this.integrator.noiseVariance;

    // x draws first, then y: fixed order keeps seeded runs reproducible
    const noiseX = this.forces.sample(grid.steps, variance);
    const noiseY = this.forces.sample(grid.steps, variance);

    const xs = integrateAxis(this.integrator, atRest(initialPosition.x), noiseX);
    const ys = integrateAxis(this.integrator, atRest(initialPosition.y), noiseY);

    const samples: TrajectorySample[] = [];
    for (let i = 0; i <= grid.steps; i++) {
      const x = xs[i];
      const y = ys[i];
      if (!x || !y) continue;

      samples.push(
        Object.freeze({
          t: gridTime(grid, i),
          position: Vec2.create(x.position, y.position),
          ...(this.integrator.tracksVelocity
            ? { velocity: Vec2.create(x.velocity, y.velocity) }
            : {}),
        })
      );
    }

    return freezeTrajectory({ grid, source: "simulated", samples });
  }

  /**
   * Adapt an externally measured (t, x, y) series.
   *
   * @throws MalformedInputError on ragged columns, non-finite values or
   *   a time column that is not strictly increasing
   * @throws InsufficientDataError on fewer than 2 rows
   */
  static fromSeries(series: TimeSeriesInput): Trajectory {
    const { t, x, y } = series;
    if (t.length !== x.length || t.length !== y.length) {
      throw new MalformedInputError(
        `Columns must have equal length (t: ${t.length}, x: ${x.length}, y: ${y.length})`
      );
    }
    if (t.length < 2) {
      throw new InsufficientDataError(`A trajectory needs at least 2 samples, got ${t.length}`);
    }

    const samples: TrajectorySample[] = t.map((time, i) => {
      const xi = x[i];
      const yi = y[i];
      if (xi === undefined || yi === undefined || !Number.isFinite(xi) || !Number.isFinite(yi)) {
        throw new MalformedInputError(`Position at row ${i} is not a finite number`);
      }
      return Object.freeze({ t: time, position: Vec2.create(xi, yi) });
    });

    // Validates the time column
    const grid = inferGrid(t);

    return freezeTrajectory({ grid, source: "experimental", samples });
  }
}

/**
 * Build a trajectory for the configuration in one call.
 */
export function simulateTrajectory(config: SimulationConfig, source?: RandomSource): Trajectory {
  return new TrajectoryBuilder(config, source).simulate();
}

function atRest(position: number): AxisState {
  return { position, velocity: 0 };
}

function freezeTrajectory(trajectory: Trajectory): Trajectory {
  Object.freeze(trajectory.samples);
  return Object.freeze(trajectory);
}
