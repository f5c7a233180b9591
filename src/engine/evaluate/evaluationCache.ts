/**
 * Compute-once cache for table evaluations, keyed by a content fingerprint of
 * (records, resolved config). Optional: recomputation yields identical output.
 */

import { createHash } from "node:crypto";
import type { TableEvaluation } from "@/domain/risk/risk-result.types";
import type { EngineConfig } from "@/config/engineConfig";
import { DEFAULT_ENGINE_CONFIG } from "@/config/engineDefaults";
import { dlog } from "@/lib/debug";
import { evaluateTable } from "./evaluateTable";

const DEFAULT_MAX_ENTRIES = 32;

export type CacheStats = {
  hits: number;
  misses: number;
  size: number;
};

export type EvaluationCache = {
  /** Returns a fresh copy; callers may mutate it without affecting the cache. */
  evaluate: (records: readonly unknown[], config?: EngineConfig) => TableEvaluation;
  stats: () => CacheStats;
  clear: () => void;
};

/**
 * JSON with object keys sorted, so key order does not change the fingerprint.
 * Values plain JSON would fold into null or 0 (NaN, ±Infinity, -0, undefined) get tagged encodings.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === "number" && (!Number.isFinite(v) || Object.is(v, -0))) {
      return { $num: Object.is(v, -0) ? "-0" : String(v) };
    }
    if (v === undefined) return { $undefined: true };
    if (typeof v === "bigint") return { $bigint: v.toString() };
    if (v === null || typeof v !== "object" || Array.isArray(v)) return v;
    const sorted: Record<string, unknown> = {};
    for (const k of Object.keys(v).sort()) {
      sorted[k] = Object.getOwnPropertyDescriptor(v, k)?.value;
    }
    return sorted;
  });
}

export function fingerprint(records: readonly unknown[], config: EngineConfig): string {
  return createHash("sha256")
    .update(canonicalJson({ records, config }))
    .digest("hex");
}

export function createEvaluationCache(options?: { maxEntries?: number }): EvaluationCache {
  const maxEntries = Math.max(1, Math.floor(options?.maxEntries ?? DEFAULT_MAX_ENTRIES));
  const entries = new Map<string, TableEvaluation>();
  let hits = 0;
  let misses = 0;

  return {
    evaluate(records, config = DEFAULT_ENGINE_CONFIG) {
      const key = fingerprint(records, config);
      const cached = entries.get(key);
      if (cached) {
        hits++;
        // refresh recency
        entries.delete(key);
        entries.set(key, cached);
        return structuredClone(cached);
      }

      misses++;
      const evaluation = evaluateTable(records, config);
      entries.set(key, evaluation);
      while (entries.size > maxEntries) {
        const oldest = entries.keys().next();
        if (oldest.done) break;
        entries.delete(oldest.value);
        dlog("cache", `evicted ${oldest.value.slice(0, 12)}`);
      }
      return structuredClone(evaluation);
    },
    stats() {
      return { hits, misses, size: entries.size };
    },
    clear() {
      entries.clear();
      hits = 0;
      misses = 0;
    },
  };
}
