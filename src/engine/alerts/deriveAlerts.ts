/**
 * Rule-based neighborhood alerts (pure functions).
 * Reads the latest period and the period right before it; deterministic, no duplicates.
 */

import type { IndicatorCounts } from "@/domain/indicator/indicator.schema";
import type { Alert, AlertPriority, AlertType } from "@/domain/risk/risk-result.types";
import type { AlertThresholds } from "@/config/engineConfig";
import { DEFAULT_ALERT_THRESHOLDS } from "@/config/engineDefaults";

const PRIORITY_ORDER: Record<AlertPriority, number> = { critical: 0, high: 1, medium: 2 };

/** Relative increase at or above this is high priority. */
const HIGH_INCREASE = 0.5;

/** One period of a neighborhood series; `ordinal` is the period ordinal. */
export type AlertPeriod = IndicatorCounts & { ordinal: number };

/**
 * Derives alerts from a period-ordered series (oldest first).
 * SIGNIFICANT_INCREASE only when the immediately preceding period exists with a non-zero count.
 */
export function deriveAlerts(
  series: readonly AlertPeriod[],
  thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS
): Alert[] {
  const latest = series[series.length - 1];
  if (!latest) return [];
  const before = series.length > 1 ? series[series.length - 2] : undefined;
  const previous = before && before.ordinal === latest.ordinal - 1 ? before : undefined;

  const alerts: Alert[] = [];
  const add = (type: AlertType, priority: AlertPriority, value: number) => {
    if (!alerts.some((a) => a.type === type)) alerts.push({ type, priority, value });
  };

  if (latest.deathsInIntervention >= thresholds.deathsThreshold) {
    add("INTERVENTION_DEATHS", "critical", latest.deathsInIntervention);
  }

  if (latest.crimeCount >= thresholds.volumeThreshold) {
    add(
      "HIGH_VOLUME",
      latest.crimeCount >= thresholds.volumeThreshold * 2 ? "high" : "medium",
      latest.crimeCount
    );
  }

  if (previous && previous.crimeCount > 0) {
    const change = (latest.crimeCount - previous.crimeCount) / previous.crimeCount;
    if (change >= thresholds.increaseThreshold) {
      add("SIGNIFICANT_INCREASE", change >= HIGH_INCREASE ? "high" : "medium", change);
    }
  }

  // stable sort keeps rule order within a priority
  return alerts.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
}
