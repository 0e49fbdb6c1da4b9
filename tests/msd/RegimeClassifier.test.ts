import { InsufficientDataError, InvalidParameterError } from "@/errors/SimulationError";
import {
  classify,
  classifyRegime,
  defaultFitWindow,
  fitLine,
  fitLogLogSlope,
} from "@/msd/RegimeClassifier";
import { describe, expect, it } from "vitest";
import { createCurve } from "@test/helpers/trajectoryHelpers";

/** msd = scale · lag^exponent at lags 0, 1, ..., lastLag */
function powerLawCurve(scale: number, exponent: number, lastLag = 100) {
  return createCurve(
    Array.from({ length: lastLag + 1 }, (_, lag) => [lag, scale * lag ** exponent] as const)
  );
}

describe("RegimeClassifier", () => {
  describe("fitLine", () => {
    it("should fit an exact line", () => {
      expect(fitLine([0, 1, 2], [1, 3, 5])).toEqual({
        slope: 2,
        intercept: 1,
        rSquared: 1,
        pointCount: 3,
      });
    });

    it("should report R² below 1 for scattered points", () => {
      const fit = fitLine([0, 1, 2, 3], [0, 2, 1, 3]);

      expect(fit.slope).toBeCloseTo(0.8, 12);
      expect(fit.rSquared).toBeCloseTo(0.64, 12);
    });

    it("should need at least 2 points with distinct x", () => {
      expect(() => fitLine([1], [1])).toThrow(InsufficientDataError);
      expect(() => fitLine([2, 2, 2], [1, 2, 3])).toThrow(InsufficientDataError);
    });
  });

  describe("fitLogLogSlope", () => {
    it("should recover the exponent and the MSD at lag 1", () => {
      const fit = fitLogLogSlope(powerLawCurve(4, 1));

      expect(fit.slope).toBeCloseTo(1, 10);
      expect(fit.intercept).toBeCloseTo(Math.log10(4), 10);
      expect(fit.rSquared).toBeCloseTo(1, 10);
    });

    it("should only use lags inside the inclusive window", () => {
      const fit = fitLogLogSlope(powerLawCurve(1, 2), { minLag: 2, maxLag: 5 });
      expect(fit.pointCount).toBe(4);
    });

    it("should skip points with zero MSD", () => {
      const curve = createCurve([
        [0, 0],
        [1, 0],
        [2, 4],
        [4, 16],
      ]);

      expect(fitLogLogSlope(curve).pointCount).toBe(2);
    });

    it("should need 2 usable points", () => {
      const curve = createCurve([
        [0, 0],
        [1, 1],
      ]);
      expect(() => fitLogLogSlope(curve)).toThrow(InsufficientDataError);
    });
  });

  describe("classifyRegime", () => {
    it.each([
      [2, "ballistic"],
      [1.95, "ballistic"],
      [1, "diffusive"],
      [1.05, "diffusive"],
      [0.5, "intermediate"],
      [1.5, "intermediate"],
    ])("should classify slope %s as %s", (slope, regime) => {
      expect(classifyRegime(slope)).toBe(regime);
    });

    it("should honour a wider tolerance", () => {
      expect(classifyRegime(1.25)).toBe("intermediate");
      expect(classifyRegime(1.25, 0.3)).toBe("diffusive");
    });

    it("should reject a non-positive tolerance", () => {
      expect(() => classifyRegime(1, 0)).toThrow(InvalidParameterError);
    });
  });

  describe("defaultFitWindow", () => {
    it("should span the first positive lag to a tenth of the last lag", () => {
      expect(defaultFitWindow(powerLawCurve(1, 1))).toEqual({ minLag: 1, maxLag: 10 });
    });

    it("should fit the window's end points", () => {
      const curve = powerLawCurve(1, 1);
      const window = defaultFitWindow(curve);

      // Lags 1 through 10, both bounds included
      expect(fitLogLogSlope(curve, window).pointCount).toBe(10);
      expect(fitLogLogSlope(curve, { minLag: 1, maxLag: 2 }).pointCount).toBe(2);
    });

    it("should need a positive lag", () => {
      expect(() => defaultFitWindow(createCurve([[0, 0]]))).toThrow(InsufficientDataError);
    });
  });

  describe("classify", () => {
    it("should report a diffusive curve over the default window", () => {
      const report = classify(powerLawCurve(4, 1));

      expect(report.regime).toBe("diffusive");
      expect(report.window).toEqual({ minLag: 1, maxLag: 10 });
      expect(report.pointCount).toBe(10);
    });

    it("should report a ballistic curve", () => {
      const report = classify(powerLawCurve(3, 2));

      expect(report.regime).toBe("ballistic");
      expect(report.slope).toBeCloseTo(2, 10);
    });

    it("should use an explicit window", () => {
      const report = classify(powerLawCurve(1, 1.5), { window: { minLag: 10, maxLag: 100 } });

      expect(report.regime).toBe("intermediate");
      expect(report.pointCount).toBe(91);
    });

    it("should reject an inverted window", () => {
      expect(() => classify(powerLawCurve(1, 1), { window: { minLag: 10, maxLag: 1 } })).toThrow(
        InvalidParameterError
      );
    });

    it("should report too few points for a short curve", () => {
      const curve = createCurve([
        [0, 0],
        [1, 1],
        [2, 2],
      ]);
      expect(() => classify(curve)).toThrow(InsufficientDataError);
    });
  });
});
