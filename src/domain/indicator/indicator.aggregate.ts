import type { IndicatorCounts } from "./indicator.schema";
import { NO_OPERATION } from "./indicator.schema";
import type { ValidatedRecord } from "./indicator.validate";

/**
 * Sums the most recent `window` periods of an ordered series (oldest first).
 * Operation type is the latest active one in the window, else "none".
 */
export function aggregateWindow(
  series: readonly ValidatedRecord[],
  window: number | "all"
): IndicatorCounts {
  const slice = window === "all" ? series : series.slice(-window);
  const total: IndicatorCounts = {
    crimeCount: 0,
    deathsInIntervention: 0,
    arrests: 0,
    weaponsSeized: 0,
    drugsSeizedKg: 0,
    officersInvolved: 0,
    operationType: NO_OPERATION,
  };
  for (const r of slice) {
    total.crimeCount += r.crimeCount;
    total.deathsInIntervention += r.deathsInIntervention;
    total.arrests += r.arrests;
    total.weaponsSeized += r.weaponsSeized;
    total.drugsSeizedKg += r.drugsSeizedKg;
    total.officersInvolved += r.officersInvolved;
    if (r.operationType !== NO_OPERATION) total.operationType = r.operationType;
  }
  return total;
}

/** Groups records by key, preserving first-appearance order of keys and input order within a group. */
export function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) group.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}
