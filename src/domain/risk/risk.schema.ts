import { z } from "zod";

/** Eight ordered risk tiers, lowest first. */
export const TIERS = [
  "very_low",
  "low",
  "low_medium",
  "medium",
  "medium_high",
  "high",
  "very_high",
  "critical",
] as const;

export const TierSchema = z.enum(TIERS);
export type Tier = z.infer<typeof TierSchema>;

/** Score terms, in declaration order (used to break ties for the dominant indicator). */
export const SCORE_TERMS = [
  "crimeCount",
  "deathsInIntervention",
  "arrests",
  "weaponsSeized",
  "drugsSeizedKg",
  "activeOperation",
] as const;

export const ScoreTermSchema = z.enum(SCORE_TERMS);
export type ScoreTerm = z.infer<typeof ScoreTermSchema>;

/** Signed weight per score term. Negative weights discount the crime signal. */
export const ScoreWeightsSchema = z.object({
  crimeCount: z.number().finite(),
  deathsInIntervention: z.number().finite(),
  arrests: z.number().finite(),
  weaponsSeized: z.number().finite(),
  drugsSeizedKg: z.number().finite(),
  activeOperation: z.number().finite(),
});
export type ScoreWeights = z.infer<typeof ScoreWeightsSchema>;

export const TierBreakpointSchema = z.object({
  tier: TierSchema,
  /** Inclusive lower bound; the upper bound is the next breakpoint's min (exclusive). */
  min: z.number().finite().min(0),
});
export type TierBreakpoint = z.infer<typeof TierBreakpointSchema>;

/**
 * Breakpoint table: exactly one entry per tier, in tier order, starting at 0,
 * strictly ascending. The last tier is unbounded above.
 */
export const TierBreakpointsSchema = z
  .array(TierBreakpointSchema)
  .length(TIERS.length)
  .superRefine((rows, ctx) => {
    rows.forEach((row, i) => {
      if (row.tier !== TIERS[i]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "tier"],
          message: `expected tier "${TIERS[i]}" at position ${i}`,
        });
      }
      if (i === 0 && row.min !== 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [0, "min"], message: "first tier must start at 0" });
      }
      const prev = rows[i - 1];
      if (prev && row.min <= prev.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "min"],
          message: "breakpoints must be strictly ascending",
        });
      }
    });
  });
