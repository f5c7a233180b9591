/**
 * Engine configuration: named, user-tunable settings validated with zod.
 * Partial overrides are merged onto DEFAULT_ENGINE_CONFIG.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  ScoreWeightsSchema,
  TierBreakpointsSchema,
  TierSchema,
} from "@/domain/risk/risk.schema";
import { InvalidConfigError } from "@/engine/errors";
import { DEFAULT_ENGINE_CONFIG } from "./engineDefaults";

export const EffectivenessDenominatorSchema = z.enum(["crimeCount", "officersInvolved"]);
export type EffectivenessDenominator = z.infer<typeof EffectivenessDenominatorSchema>;

export const EffectivenessConfigSchema = z.object({
  /** What the weighted enforcement outcome is divided by. */
  denominator: EffectivenessDenominatorSchema,
  arrestsWeight: z.number().finite().min(0),
  weaponsWeight: z.number().finite().min(0),
  drugsKgWeight: z.number().finite().min(0),
});
export type EffectivenessConfig = z.infer<typeof EffectivenessConfigSchema>;

export const RecommendationConfigSchema = z.object({
  /** Effectiveness below this (or null) counts as low for high-and-above tiers. */
  lowEffectivenessBelow: z.number().min(0).max(1),
  /** Lowest tier that suggests operations when none are active. */
  considerOperationsFromTier: TierSchema,
});
export type RecommendationConfig = z.infer<typeof RecommendationConfigSchema>;

export const AlertThresholdsSchema = z.object({
  /** Latest-period crime count at or above this → HIGH_VOLUME. */
  volumeThreshold: z.number().finite().positive(),
  /** Relative period-over-period increase at or above this → SIGNIFICANT_INCREASE. */
  increaseThreshold: z.number().finite().positive(),
  /** Latest-period deaths in intervention at or above this → INTERVENTION_DEATHS. */
  deathsThreshold: z.number().int().positive(),
});
export type AlertThresholds = z.infer<typeof AlertThresholdsSchema>;

export const EngineConfigSchema = z.object({
  weights: ScoreWeightsSchema,
  tierBreakpoints: TierBreakpointsSchema,
  /** Number of future periods projected by the trend forecaster. */
  forecastHorizon: z.number().int().min(0),
  /** Periods per year in the indicator table (12 = monthly). */
  periodsPerYear: z.number().int().min(1),
  /** Most recent periods summed into the scored indicators; "all" sums the whole series. */
  aggregationWindow: z.union([z.number().int().min(1), z.literal("all")]),
  /** |slope| / mean crime count above this → rising/falling trend. */
  trendSlopeThreshold: z.number().finite().min(0),
  effectiveness: EffectivenessConfigSchema,
  recommendations: RecommendationConfigSchema,
  alerts: AlertThresholdsSchema,
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const EngineConfigOverridesSchema = z
  .object({
    weights: ScoreWeightsSchema.partial().strict(),
    tierBreakpoints: TierBreakpointsSchema,
    forecastHorizon: EngineConfigSchema.shape.forecastHorizon,
    periodsPerYear: EngineConfigSchema.shape.periodsPerYear,
    aggregationWindow: EngineConfigSchema.shape.aggregationWindow,
    trendSlopeThreshold: EngineConfigSchema.shape.trendSlopeThreshold,
    effectiveness: EffectivenessConfigSchema.partial().strict(),
    recommendations: RecommendationConfigSchema.partial().strict(),
    alerts: AlertThresholdsSchema.partial().strict(),
  })
  .partial()
  .strict();
export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/**
 * Merges overrides onto defaults and validates the result.
 * Throws InvalidConfigError on unknown keys or out-of-range values.
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const parsed = EngineConfigOverridesSchema.safeParse(overrides);
  if (!parsed.success) throw new InvalidConfigError(formatIssues(parsed.error));
  const o = parsed.data;
  const base = DEFAULT_ENGINE_CONFIG;

  const merged: EngineConfig = {
    weights: { ...base.weights, ...o.weights },
    tierBreakpoints: (o.tierBreakpoints ?? base.tierBreakpoints).map((bp) => ({ ...bp })),
    forecastHorizon: o.forecastHorizon ?? base.forecastHorizon,
    periodsPerYear: o.periodsPerYear ?? base.periodsPerYear,
    aggregationWindow: o.aggregationWindow ?? base.aggregationWindow,
    trendSlopeThreshold: o.trendSlopeThreshold ?? base.trendSlopeThreshold,
    effectiveness: { ...base.effectiveness, ...o.effectiveness },
    recommendations: { ...base.recommendations, ...o.recommendations },
    alerts: { ...base.alerts, ...o.alerts },
  };

  const checked = EngineConfigSchema.safeParse(merged);
  if (!checked.success) throw new InvalidConfigError(formatIssues(checked.error));
  return checked.data;
}

/** Reads a JSON settings file of overrides and resolves it against the defaults. */
export function loadEngineConfigFile(path: string): EngineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InvalidConfigError([`${path}: ${reason}`]);
  }
  const parsed = EngineConfigOverridesSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidConfigError(formatIssues(parsed.error));
  return resolveEngineConfig(parsed.data);
}
