/**
 * Dev-only shared invariant helpers for Engine Health.
 * Deterministic predicates and tolerances, no side effects.
 */

import type { RiskResult } from "@/domain/risk/risk-result.types";

export const FLOAT_TOLERANCE = 1e-9;

export function approxEqual(a: number, b: number, tolerance = FLOAT_TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance;
}

export function allNonNegative(arr: number[]): boolean {
  return arr.every((v) => Number.isFinite(v) && v >= 0);
}

export function inClosed01(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 1;
}

/** Violations of the RiskResult contract; empty when the result is well-formed. */
export function riskResultViolations(result: RiskResult, horizon: number): string[] {
  const errors: string[] = [];
  const id = result.neighborhoodId;
  if (Number.isNaN(result.score) || result.score < 0) errors.push(`${id}: score ${result.score} not >= 0`);
  if (result.effectivenessRatio !== null && !inClosed01(result.effectivenessRatio))
    errors.push(`${id}: effectiveness ${result.effectivenessRatio} outside [0, 1]`);
  if (result.forecast) {
    if (result.forecast.length !== horizon) errors.push(`${id}: forecast length ${result.forecast.length} != ${horizon}`);
    if (!allNonNegative(result.forecast.map((p) => p.predictedCrimeCount)))
      errors.push(`${id}: negative forecast value`);
    for (let i = 1; i < result.forecast.length; i++) {
      if (result.forecast[i].periodIndex !== result.forecast[i - 1].periodIndex + 1)
        errors.push(`${id}: forecast periods not consecutive at ${i}`);
    }
  }
  if (result.recommendations.length === 0) errors.push(`${id}: no recommendations`);
  return errors;
}
