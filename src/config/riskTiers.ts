/**
 * Central tier table for neighborhood risk scores.
 * Half-open bands [min, nextMin); a score on a boundary belongs to the upper tier.
 */

import { TIERS, type Tier, type TierBreakpoint } from "@/domain/risk/risk.schema";

/** very_low < 3, low 3–8, low_medium 8–15, medium 15–30, medium_high 30–50, high 50–80, very_high 80–120, critical >= 120. */
export const DEFAULT_TIER_BREAKPOINTS: readonly TierBreakpoint[] = [
  { tier: "very_low", min: 0 },
  { tier: "low", min: 3 },
  { tier: "low_medium", min: 8 },
  { tier: "medium", min: 15 },
  { tier: "medium_high", min: 30 },
  { tier: "high", min: 50 },
  { tier: "very_high", min: 80 },
  { tier: "critical", min: 120 },
];

/**
 * Returns the tier for a non-negative score. Total: NaN and negatives fall to the lowest tier.
 */
export function classify(
  score: number,
  breakpoints: readonly TierBreakpoint[] = DEFAULT_TIER_BREAKPOINTS
): Tier {
  const s = Number(score);
  if (Number.isNaN(s) || s < 0) return TIERS[0];
  let tier: Tier = TIERS[0];
  for (const bp of breakpoints) {
    if (s >= bp.min) tier = bp.tier;
    else break;
  }
  return tier;
}

/** Position of a tier in the ordered table (0 = very_low). */
export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

/** True when `tier` is at or above `floor`. */
export function isAtLeast(tier: Tier, floor: Tier): boolean {
  return tierRank(tier) >= tierRank(floor);
}
