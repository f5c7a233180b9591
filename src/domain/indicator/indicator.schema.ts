import { z } from "zod";

/** Kind of police operation active in a period; "none" when there was none. */
export const OperationTypeSchema = z.enum([
  "none",
  "patrol",
  "raid",
  "checkpoint",
  "investigation",
  "other",
]);
export type OperationType = z.infer<typeof OperationTypeSchema>;

/** Sentinel operation type: no active operation in the period. */
export const NO_OPERATION: OperationType = "none";

/**
 * Reporting period: either an explicit (year, index) pair or an ISO month/date.
 * Dates are normalized to monthly periods by normalizePeriod.
 */
export const PeriodIndexSchema = z.object({
  year: z.number().int().min(1900).max(9999),
  index: z.number().int().min(1),
});
export type PeriodIndex = z.infer<typeof PeriodIndexSchema>;

export const PeriodDateSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])(-(0[1-9]|[12]\d|3[01]))?$/, "expected YYYY-MM or YYYY-MM-DD");

export const PeriodSchema = z.union([PeriodIndexSchema, PeriodDateSchema]);
export type Period = z.infer<typeof PeriodSchema>;

const CountSchema = z.number().int().min(0);

/**
 * One neighborhood, one reporting period. Owned by the loading collaborator;
 * the engine only reads it.
 */
export const IndicatorRecordSchema = z.object({
  neighborhoodId: z.string().trim().min(1),
  period: PeriodSchema,
  crimeCount: CountSchema,
  deathsInIntervention: CountSchema,
  arrests: CountSchema,
  weaponsSeized: CountSchema,
  drugsSeizedKg: z.number().finite().min(0),
  officersInvolved: CountSchema,
  operationType: OperationTypeSchema,
});
export type IndicatorRecord = z.infer<typeof IndicatorRecordSchema>;

/** Numeric indicator fields (everything the score and effectiveness read). */
export type IndicatorCounts = Pick<
  IndicatorRecord,
  | "crimeCount"
  | "deathsInIntervention"
  | "arrests"
  | "weaponsSeized"
  | "drugsSeizedKg"
  | "officersInvolved"
  | "operationType"
>;
