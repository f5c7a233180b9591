/**
 * Process-wide status collector (data freshness, cache hit rate) for dashboards.
 * Reads engine outputs; the engine never depends on it.
 */

import type { PeriodIndex } from "@/domain/indicator/indicator.schema";
import type { TableEvaluation } from "@/domain/risk/risk-result.types";
import type { CacheStats } from "@/engine/evaluate/evaluationCache";
import { dlog } from "@/lib/debug";

const DEFAULT_STALE_AFTER_HOURS = 24;
const MS_PER_HOUR = 3_600_000;

export type SystemStatus = {
  /** ISO time of the last recorded evaluation, or null before any. */
  lastLoadedAt: string | null;
  ageHours: number | null;
  stale: boolean;
  latestPeriod: PeriodIndex | null;
  neighborhoods: number;
  failedNeighborhoods: number;
  rejectedRecords: number;
  /** hits / (hits + misses); null before any cache lookup or with no cache attached. */
  cacheHitRate: number | null;
};

export type SystemStatusCollector = {
  recordEvaluation: (evaluation: TableEvaluation, at: Date) => void;
  attachCache: (stats: () => CacheStats) => void;
  snapshot: (now: Date) => SystemStatus;
};

function laterPeriod(a: PeriodIndex | null, b: PeriodIndex): PeriodIndex {
  if (a === null) return b;
  if (b.year !== a.year) return b.year > a.year ? b : a;
  return b.index > a.index ? b : a;
}

export function createSystemStatus(options?: { staleAfterHours?: number }): SystemStatusCollector {
  const staleAfterHours = options?.staleAfterHours ?? DEFAULT_STALE_AFTER_HOURS;
  let loadedAt: Date | null = null;
  let latestPeriod: PeriodIndex | null = null;
  let neighborhoods = 0;
  let failedNeighborhoods = 0;
  let rejectedRecords = 0;
  let cacheStats: (() => CacheStats) | null = null;

  return {
    recordEvaluation(evaluation, at) {
      loadedAt = at;
      latestPeriod = null;
      for (const r of evaluation.results) latestPeriod = laterPeriod(latestPeriod, r.period);
      neighborhoods = evaluation.results.length;
      failedNeighborhoods = evaluation.failures.length;
      rejectedRecords =
        evaluation.results.reduce((s, r) => s + r.rejected.length, 0) +
        evaluation.failures.reduce((s, f) => s + f.rejected.length, 0);
      dlog("status", `recorded ${neighborhoods} neighborhoods at ${at.toISOString()}`);
    },
    attachCache(stats) {
      cacheStats = stats;
    },
    snapshot(now) {
      const ageHours = loadedAt ? (now.getTime() - loadedAt.getTime()) / MS_PER_HOUR : null;
      const stats = cacheStats ? cacheStats() : null;
      const lookups = stats ? stats.hits + stats.misses : 0;
      return {
        lastLoadedAt: loadedAt ? loadedAt.toISOString() : null,
        ageHours,
        stale: ageHours === null || ageHours > staleAfterHours,
        latestPeriod: latestPeriod ? { ...latestPeriod } : null,
        neighborhoods,
        failedNeighborhoods,
        rejectedRecords,
        cacheHitRate: stats && lookups > 0 ? stats.hits / lookups : null,
      };
    },
  };
}
