/**
 * Short-horizon crime trend: simple least-squares line over (periodIndex, crimeCount).
 * Refitted from scratch on every call; same series → same forecast.
 */

import type {
  ForecastPoint,
  LinearTrendFit,
  SeriesPoint,
  TrendDirection,
} from "@/domain/risk/risk-forecast.types";
import { DEFAULT_FORECAST_HORIZON } from "@/config/engineDefaults";
import { InsufficientDataError } from "@/engine/errors";

const DEFAULT_TREND_SLOPE_THRESHOLD = 0.05;

/**
 * Ordinary least squares with one predictor.
 * Throws InsufficientDataError with fewer than 2 distinct period indices.
 */
export function fitLinearTrend(series: readonly SeriesPoint[]): LinearTrendFit {
  const distinct = new Set(series.map((p) => p.periodIndex)).size;
  if (distinct < 2) throw new InsufficientDataError(distinct);

  const n = series.length;
  let sumX = 0;
  let sumY = 0;
  let lastPeriodIndex = -Infinity;
  for (const p of series) {
    sumX += p.periodIndex;
    sumY += p.crimeCount;
    if (p.periodIndex > lastPeriodIndex) lastPeriodIndex = p.periodIndex;
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let sxy = 0;
  for (const p of series) {
    const dx = p.periodIndex - meanX;
    sxx += dx * dx;
    sxy += dx * (p.crimeCount - meanY);
  }
  const slope = sxy / sxx;

  return {
    slope,
    intercept: meanY - slope * meanX,
    meanCrimeCount: meanY,
    distinctPeriods: distinct,
    lastPeriodIndex,
  };
}

/** Projects the fitted line onto the `horizon` period indices after the last observed one. */
export function projectTrend(fit: LinearTrendFit, horizon: number): ForecastPoint[] {
  if (!Number.isInteger(horizon) || horizon < 0) {
    throw new RangeError(`Forecast horizon must be a non-negative integer, got ${horizon}`);
  }
  const points: ForecastPoint[] = [];
  for (let step = 1; step <= horizon; step++) {
    const periodIndex = fit.lastPeriodIndex + step;
    const predicted = fit.intercept + fit.slope * periodIndex;
    points.push({
      periodIndex,
      predictedCrimeCount: Number.isFinite(predicted) ? Math.max(0, predicted) : 0,
    });
  }
  return points;
}

export function forecastTrend(
  series: readonly SeriesPoint[],
  horizon: number = DEFAULT_FORECAST_HORIZON
): ForecastPoint[] {
  return projectTrend(fitLinearTrend(series), horizon);
}

/** Direction of the fitted line: slope relative to the mean count, with the mean floored at 1. */
export function classifyTrend(
  fit: LinearTrendFit,
  threshold: number = DEFAULT_TREND_SLOPE_THRESHOLD
): TrendDirection {
  const relative = fit.slope / Math.max(fit.meanCrimeCount, 1);
  if (relative > threshold) return "rising";
  if (relative < -threshold) return "falling";
  return "stable";
}
