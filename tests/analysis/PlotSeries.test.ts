import { classify } from "@/msd/RegimeClassifier";
import { toLogLogSeries } from "@/analysis/PlotSeries";
import { describe, expect, it } from "vitest";
import { createCurve } from "@test/helpers/trajectoryHelpers";

describe("PlotSeries", () => {
  const curve = createCurve([
    [0, 0],
    [1, 1],
    [10, 100],
    [100, 1e4],
  ]);

  it("should take log10 of positive lags and MSDs", () => {
    expect(toLogLogSeries(curve)).toEqual({
      logLag: [0, 1, 2],
      logMsd: [0, 2, 4],
    });
  });

  it("should evaluate the fitted line over the fit window", () => {
    const report = classify(curve, { window: { minLag: 1, maxLag: 10 } });
    const series = toLogLogSeries(curve, report);

    expect(series.fit).toEqual({ logLag: [0, 1], logMsd: [0, 2], slope: 2 });
  });
});
