import type { ScoreWeights } from "@/domain/risk/risk.schema";
import type {
  AlertThresholds,
  EffectivenessConfig,
  EngineConfig,
  RecommendationConfig,
} from "./engineConfig";
import { DEFAULT_TIER_BREAKPOINTS } from "./riskTiers";

/** Synergistic score weights: deaths dominate, enforcement outcomes discount the crime tally. */
export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
  crimeCount: 1,
  deathsInIntervention: 75,
  arrests: -3,
  weaponsSeized: -8,
  drugsSeizedKg: -5,
  activeOperation: -2,
};

/** Enforcement outcome relative to crime volume. */
export const DEFAULT_EFFECTIVENESS_CONFIG: EffectivenessConfig = {
  denominator: "crimeCount",
  arrestsWeight: 1,
  weaponsWeight: 2,
  drugsKgWeight: 1,
};

export const DEFAULT_RECOMMENDATION_CONFIG: RecommendationConfig = {
  lowEffectivenessBelow: 0.3,
  considerOperationsFromTier: "medium",
};

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  volumeThreshold: 10,
  increaseThreshold: 0.3,
  deathsThreshold: 1,
};

export const DEFAULT_FORECAST_HORIZON = 7;

/** Default engine config (weights + tiers + horizon + tunable thresholds). */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  weights: DEFAULT_SCORE_WEIGHTS,
  tierBreakpoints: DEFAULT_TIER_BREAKPOINTS.map((bp) => ({ ...bp })),
  forecastHorizon: DEFAULT_FORECAST_HORIZON,
  periodsPerYear: 12,
  aggregationWindow: 1,
  trendSlopeThreshold: 0.05,
  effectiveness: DEFAULT_EFFECTIVENESS_CONFIG,
  recommendations: DEFAULT_RECOMMENDATION_CONFIG,
  alerts: DEFAULT_ALERT_THRESHOLDS,
};
