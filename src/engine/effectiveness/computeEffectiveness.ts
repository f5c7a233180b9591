/**
 * Operational effectiveness ratio in [0, 1], or null when no operation happened
 * and nothing was achieved. null is a sentinel and must not be read as 0.
 */

import type { IndicatorCounts } from "@/domain/indicator/indicator.schema";
import { NO_OPERATION } from "@/domain/indicator/indicator.schema";
import type { EffectivenessConfig } from "@/config/engineConfig";
import { DEFAULT_EFFECTIVENESS_CONFIG } from "@/config/engineDefaults";

function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.max(0, Math.min(1, x));
}

/** True when there is nothing to measure: no operation and no enforcement outcome. */
export function hasNoEnforcement(indicators: IndicatorCounts): boolean {
  return (
    indicators.operationType === NO_OPERATION &&
    indicators.arrests === 0 &&
    indicators.weaponsSeized === 0 &&
    indicators.drugsSeizedKg === 0
  );
}

/**
 * (arrestsWeight·arrests + weaponsWeight·weapons + drugsKgWeight·kg) / denominator, clipped to [0, 1].
 * A zero denominator yields 1 when something was achieved, else 0.
 */
export function computeEffectiveness(
  indicators: IndicatorCounts,
  config: EffectivenessConfig = DEFAULT_EFFECTIVENESS_CONFIG
): number | null {
  if (hasNoEnforcement(indicators)) return null;

  const outcome =
    config.arrestsWeight * indicators.arrests +
    config.weaponsWeight * indicators.weaponsSeized +
    config.drugsKgWeight * indicators.drugsSeizedKg;
  const denominator =
    config.denominator === "officersInvolved" ? indicators.officersInvolved : indicators.crimeCount;

  if (denominator <= 0) return outcome > 0 ? 1 : 0;
  return clamp01(outcome / denominator);
}
