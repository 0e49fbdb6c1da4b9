/**
 * PlotSeries - Plain numeric sequences for a log-log MSD plot
 *
 * The plotting library is an external collaborator; this module only
 * derives the data it draws: log10 lag and log10 MSD of the curve, and
 * the fitted line over the report's window.
 */

import type { MSDCurve, RegimeReport } from "@/types";

export interface LogLogLine {
  readonly logLag: readonly number[];
  readonly logMsd: readonly number[];
}

export interface LogLogSeries extends LogLogLine {
  /** Fitted line, evaluated at the curve's lags inside the fit window */
  readonly fit?: LogLogLine & { readonly slope: number };
}

/**
 * Derive log-log plot data. Points with lag <= 0 or MSD <= 0 have no
 * logarithm and are left out.
 */
export function toLogLogSeries(curve: MSDCurve, report?: RegimeReport): LogLogSeries {
  const logLag: number[] = [];
  const logMsd: number[] = [];
  for (const { lag, msd } of curve.points) {
    if (lag <= 0 || msd <= 0) continue;
    logLag.push(Math.log10(lag));
    logMsd.push(Math.log10(msd));
  }

  if (!report) {
    return { logLag, logMsd };
  }

  const { minLag, maxLag } = report.window;
  const fitLag = curve.points
    .filter(({ lag }) => lag > 0 && lag >= minLag && lag <= maxLag)
    .map(({ lag }) => Math.log10(lag));

  return {
    logLag,
    logMsd,
    fit: {
      logLag: fitLag,
      logMsd: fitLag.map((x) => report.intercept + report.slope * x),
      slope: report.slope,
    },
  };
}
