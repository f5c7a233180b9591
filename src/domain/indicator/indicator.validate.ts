import type { IndicatorRecord, PeriodIndex } from "./indicator.schema";
import { IndicatorRecordSchema } from "./indicator.schema";
import { formatPeriod, normalizePeriod, periodOrdinal } from "./indicator.period";
import { InvalidIndicatorError } from "@/engine/errors";

/** Id used to group records whose neighborhood id is missing or not a string. */
export const UNKNOWN_NEIGHBORHOOD = "unknown";

/** A record that passed validation, with its period normalized. */
export type ValidatedRecord = IndicatorRecord & {
  normalizedPeriod: PeriodIndex;
  /** Period ordinal: forecaster x-axis and sort key. */
  ordinal: number;
};

function rawPeriod(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || !("period" in raw)) return undefined;
  return raw.period;
}

/** Best-effort neighborhood id of an unvalidated record, for grouping and error reports. */
export function rawNeighborhoodId(raw: unknown): string {
  if (typeof raw !== "object" || raw === null || !("neighborhoodId" in raw)) return UNKNOWN_NEIGHBORHOOD;
  const id = raw.neighborhoodId;
  return typeof id === "string" && id.trim() !== "" ? id.trim() : UNKNOWN_NEIGHBORHOOD;
}

/**
 * Validates one input record. Negative counts and malformed periods are rejected,
 * never clamped. Throws InvalidIndicatorError naming the neighborhood and period.
 */
export function validateIndicatorRecord(raw: unknown, periodsPerYear: number): ValidatedRecord {
  const neighborhoodId = rawNeighborhoodId(raw);
  const periodLabel = formatPeriod(rawPeriod(raw));

  const parsed = IndicatorRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.length ? i.path.join(".") : "(record)"}: ${i.message}`
    );
    throw new InvalidIndicatorError(neighborhoodId, periodLabel, issues);
  }

  const record = parsed.data;
  const normalizedPeriod = normalizePeriod(record.period, periodsPerYear);
  if (normalizedPeriod === null) {
    throw new InvalidIndicatorError(neighborhoodId, periodLabel, [
      `period: not a valid period for ${periodsPerYear} periods per year`,
    ]);
  }

  return {
    ...record,
    normalizedPeriod,
    ordinal: periodOrdinal(normalizedPeriod, periodsPerYear),
  };
}
