/**
 * Rule-based recommendations (pure functions).
 * Order is the contract: use-of-force review, then operational presence, then tier advice.
 */

import type { Tier, ScoreTerm } from "@/domain/risk/risk.schema";
import type { RecommendationConfig } from "@/config/engineConfig";
import { DEFAULT_RECOMMENDATION_CONFIG } from "@/config/engineDefaults";
import { isAtLeast } from "@/config/riskTiers";

export const USE_OF_FORCE_REVIEW =
  "Review use-of-force protocols: deaths in police interventions are the main driver of this score";
export const INCREASE_OPERATIONAL_PRESENCE =
  "Increase operational presence: current enforcement effectiveness is low for this risk level";
export const CONSIDER_OPERATIONS = "Consider planning police operations in the area";

export const TIER_RECOMMENDATIONS: Record<Tier, readonly string[]> = {
  very_low: ["Maintain current preventive actions"],
  low: ["Maintain current preventive actions", "Keep community reporting channels active"],
  low_medium: ["Maintain regular surveillance", "Keep community reporting channels active"],
  medium: ["Maintain regular surveillance", "Implement community safety actions"],
  medium_high: [
    "Intensify surveillance at recurring hotspots",
    "Implement community safety actions",
    "Improve public lighting",
  ],
  high: ["Increase patrols in the region", "Implement preventive operations", "Improve public lighting"],
  very_high: [
    "Increase patrols in the region",
    "Implement preventive operations",
    "Coordinate with social services on local risk factors",
  ],
  critical: [
    "Deploy dedicated task force",
    "Increase patrols in the region",
    "Implement preventive operations",
    "Coordinate with social services on local risk factors",
  ],
};

/** Tiers where low effectiveness triggers the operational-presence message. */
const PRESENCE_FLOOR: Tier = "high";

export function recommend(
  tier: Tier,
  effectiveness: number | null,
  dominant: ScoreTerm,
  config: RecommendationConfig = DEFAULT_RECOMMENDATION_CONFIG
): string[] {
  const out = [...TIER_RECOMMENDATIONS[tier]];
  const highOrAbove = isAtLeast(tier, PRESENCE_FLOOR);

  if (highOrAbove && (effectiveness === null || effectiveness < config.lowEffectivenessBelow)) {
    out.unshift(INCREASE_OPERATIONAL_PRESENCE);
  } else if (effectiveness === null && isAtLeast(tier, config.considerOperationsFromTier)) {
    out.push(CONSIDER_OPERATIONS);
  }

  if (dominant === "deathsInIntervention") out.unshift(USE_OF_FORCE_REVIEW);

  return out;
}
