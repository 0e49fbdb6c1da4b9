import { createSimulationConfig } from "@/config/simulationConfig";
import {
  checkStability,
  createIntegrator,
  integrateAxis,
  OverdampedIntegrator,
  UnderdampedIntegrator,
} from "@/dynamics/LangevinIntegrator";
import { NumericInstabilityError } from "@/errors/SimulationError";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  overdampedOptions,
  PROTEIN_PARTICLE,
  stableUnderdampedOptions,
} from "@test/helpers/trajectoryHelpers";

describe("LangevinIntegrator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("OverdampedIntegrator", () => {
    it("should draw noise with variance 2·D·dt", () => {
      expect(new OverdampedIntegrator(0.5, 0.1).noiseVariance).toBe(0.1);
    });

    it("should add the noise draw to the position", () => {
      const integrator = new OverdampedIntegrator(0.5, 0.1);
      expect(integrator.step({ position: 1, velocity: 0 }, 0.25)).toEqual({
        position: 1.25,
        velocity: 0,
      });
    });

    it("should not track velocity", () => {
      const integrator = new OverdampedIntegrator(0.5, 0.1);
      expect(integrator.tracksVelocity).toBe(false);
      expect(integrator.regime).toBe("overdamped");
    });
  });

  describe("UnderdampedIntegrator", () => {
    it("should draw random forces with variance 2·γ·k_B T / dt", () => {
      expect(new UnderdampedIntegrator(2, 0.5, 3, 0.1).noiseVariance).toBeCloseTo(30, 10);
    });

    it("should update the position with the new velocity", () => {
      // a = (−0.5·2 + 4) / 2 = 1.5, v = 2 + 0.15, x = 1 + 2.15·0.1
      const integrator = new UnderdampedIntegrator(2, 0.5, 3, 0.1);
      const next = integrator.step({ position: 1, velocity: 2 }, 4);

      expect(next.velocity).toBeCloseTo(2.15, 12);
      expect(next.position).toBeCloseTo(1.215, 12);
    });

    it("should decay velocity without a random force", () => {
      const integrator = new UnderdampedIntegrator(1, 1, 0, 0.5);
      const next = integrator.step({ position: 0, velocity: 1 }, 0);

      expect(next.velocity).toBe(0.5);
      expect(next.position).toBe(0.25);
    });
  });

  describe("integrateAxis", () => {
    it("should return the initial state followed by one state per draw", () => {
      const states = integrateAxis(
        new OverdampedIntegrator(1, 1),
        { position: 0, velocity: 0 },
        [1, 2, 3]
      );

      expect(states.map((s) => s.position)).toEqual([0, 1, 3, 6]);
      expect(states.every((s) => s.velocity === 0)).toBe(true);
    });

    it("should return only the initial state for no draws", () => {
      const initial = { position: 4, velocity: 0 };
      expect(integrateAxis(new OverdampedIntegrator(1, 1), initial, [])).toEqual([initial]);
    });

    it("should stop at the first non-finite state", () => {
      const integrator = new UnderdampedIntegrator(1, 1, 0, 10);

      expect(() =>
        integrateAxis(integrator, { position: 0, velocity: 0 }, [Number.MAX_VALUE, 0])
      ).toThrow("underdamped integration diverged at step 1");
    });
  });

  describe("createIntegrator", () => {
    it("should build an overdamped integrator from the derived diffusion coefficient", () => {
      const config = createSimulationConfig(overdampedOptions());
      const integrator = createIntegrator(config);

      expect(integrator).toBeInstanceOf(OverdampedIntegrator);
      expect(integrator.noiseVariance).toBe(
        2 * config.derived.diffusionCoefficient * config.grid.dt
      );
    });

    it("should build an underdamped integrator that tracks velocity", () => {
      const config = createSimulationConfig(stableUnderdampedOptions());
      const integrator = createIntegrator(config);

      expect(integrator).toBeInstanceOf(UnderdampedIntegrator);
      expect(integrator.tracksVelocity).toBe(true);
      expect(integrator.noiseVariance).toBe(
        (2 * config.derived.friction * config.derived.thermalEnergy) / config.grid.dt
      );
    });

    it("should reject an underdamped timestep of several relaxation times", () => {
      // dt / τ ≈ 9.4
      const config = createSimulationConfig({
        ...PROTEIN_PARTICLE,
        dt: 1e-9,
        duration: 1e-5,
        regime: "underdamped",
      });

      expect(() => createIntegrator(config)).toThrow(NumericInstabilityError);
    });

    it("should accept a coarse overdamped timestep", () => {
      const config = createSimulationConfig({
        ...PROTEIN_PARTICLE,
        dt: 1e-9,
        duration: 1e-5,
        regime: "overdamped",
      });

      expect(() => createIntegrator(config)).not.toThrow();
    });
  });

  describe("checkStability", () => {
    it("should warn when dt is a sizeable fraction of the relaxation time", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      // dt / τ ≈ 0.47
      const config = createSimulationConfig(
        stableUnderdampedOptions({ dt: 5e-11, duration: 5e-9 })
      );

      checkStability(config);

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toContain("exceeds 0.1·m/γ");
    });

    it("should respect a custom stability fraction", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const config = createSimulationConfig(
        stableUnderdampedOptions({ dt: 5e-11, duration: 5e-9, stabilityFraction: 0.5 })
      );

      checkStability(config);

      expect(warn).not.toHaveBeenCalled();
    });

    it("should stay quiet for a well-resolved timestep", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      checkStability(createSimulationConfig(stableUnderdampedOptions()));

      expect(warn).not.toHaveBeenCalled();
    });
  });
});
