import { InvalidParameterError } from "@/errors/SimulationError";
import { RandomForceGenerator } from "@/random/RandomForceGenerator";
import { createRandomSource } from "@/random/RandomSource";
import { describe, expect, it } from "vitest";
import { meanAndVariance } from "@test/helpers/trajectoryHelpers";

function generator(seed: number | string = 42): RandomForceGenerator {
  return new RandomForceGenerator(createRandomSource(seed));
}

describe("RandomForceGenerator", () => {
  it("should return exactly count samples", () => {
    expect(generator().sample(1, 1)).toHaveLength(1);
    expect(generator().sample(250, 1)).toHaveLength(250);
  });

  it("should scale unit draws by the standard deviation", () => {
    const unit = generator(3).sample(10, 1);
    const scaled = generator(3).sample(10, 4);

    expect(scaled).toEqual(unit.map((v) => 2 * v));
  });

  it("should return zeros for zero variance", () => {
    const samples = generator().sample(100, 0);
    expect(samples.every((v) => v === 0)).toBe(true);
  });

  it("should match the requested variance", () => {
    const samples = generator("force-variance").sample(20000, 9);
    const { mean, variance } = meanAndVariance(samples);

    expect(Math.abs(mean)).toBeLessThan(0.15);
    expect(Math.abs(variance / 9 - 1)).toBeLessThan(0.05);
  });

  it("should keep consuming the stream across calls", () => {
    const g = generator(5);
    const first = g.sample(5, 1);
    const second = g.sample(5, 1);

    expect(second).not.toEqual(first);
    expect([...first, ...second]).toEqual(generator(5).sample(10, 1));
  });

  it.each([0, -3, 2.5, Number.NaN])("should reject count %s", (count) => {
    expect(() => generator().sample(count, 1)).toThrow(InvalidParameterError);
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])("should reject variance %s", (variance) => {
    expect(() => generator().sample(10, variance)).toThrow(InvalidParameterError);
  });
});
