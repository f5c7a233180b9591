/**
 * Types for the linear crime-count trend forecast.
 */

import type { PeriodIndex } from "@/domain/indicator/indicator.schema";

/** One observed point of a neighborhood's crime series. */
export type SeriesPoint = {
  periodIndex: number;
  crimeCount: number;
};

export type ForecastPoint = {
  periodIndex: number;
  /** Clamped to >= 0. */
  predictedCrimeCount: number;
};

/** Forecast point as exposed on RiskResult, with the calendar period attached. */
export type PeriodForecastPoint = ForecastPoint & {
  period: PeriodIndex;
};

/** OLS fit of crimeCount against periodIndex. */
export type LinearTrendFit = {
  slope: number;
  intercept: number;
  /** Mean observed crime count (basis for the relative trend). */
  meanCrimeCount: number;
  distinctPeriods: number;
  lastPeriodIndex: number;
};

export type TrendDirection = "rising" | "falling" | "stable";
