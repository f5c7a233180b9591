/**
 * Engine error taxonomy. Every error is local to one neighborhood's evaluation;
 * the table evaluator catches them and records the failure instead of aborting.
 */

export type EngineErrorCode = "INVALID_INDICATOR" | "INSUFFICIENT_DATA" | "INVALID_CONFIG";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

/** A record with a negative count, malformed period or duplicate period. Rejected, never clamped. */
export class InvalidIndicatorError extends EngineError {
  readonly neighborhoodId: string;
  readonly period: string;
  readonly issues: string[];

  constructor(neighborhoodId: string, period: string, issues: string[]) {
    super(
      "INVALID_INDICATOR",
      `[${neighborhoodId || "unknown"} @ ${period}] invalid indicator record: ${issues.join("; ")}`
    );
    this.name = "InvalidIndicatorError";
    this.neighborhoodId = neighborhoodId;
    this.period = period;
    this.issues = issues;
  }
}

/** Fewer than 2 distinct period indices to fit a trend. */
export class InsufficientDataError extends EngineError {
  readonly distinctPeriods: number;

  constructor(distinctPeriods: number) {
    super(
      "INSUFFICIENT_DATA",
      `Trend forecast needs at least 2 distinct periods, got ${distinctPeriods}`
    );
    this.name = "InsufficientDataError";
    this.distinctPeriods = distinctPeriods;
  }
}

export class InvalidConfigError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIG", `Invalid engine config: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}
