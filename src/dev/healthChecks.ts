/**
 * Dev-only Engine Health check registry.
 * Grouped by: Scoring, Tiers, Forecast, Evaluation, Cache.
 * Deterministic invariants only; no hard-coded expected scores.
 */

import { DEFAULT_ENGINE_CONFIG } from "@/config/engineDefaults";
import { classify } from "@/config/riskTiers";
import { TIERS } from "@/domain/risk/risk.schema";
import { computeScore } from "@/engine/scoring/computeScore";
import { forecastTrend } from "@/engine/forecast/linearTrend";
import { evaluateTable } from "@/engine/evaluate/evaluateTable";
import { createEvaluationCache } from "@/engine/evaluate/evaluationCache";
import { baselineRecords, edgeRecords } from "@/dev/fixtures";
import { allNonNegative, approxEqual, riskResultViolations } from "@/dev/invariants";

export type CheckStatus = "pass" | "warn" | "fail";

export type CheckResult = {
  status: CheckStatus;
  message: string;
  details?: unknown;
};

export type CheckGroup = "Scoring" | "Tiers" | "Forecast" | "Evaluation" | "Cache";

export type GroupedCheck = {
  group: CheckGroup;
  name: string;
  run: () => CheckResult;
};

export const groupedHealthChecks: GroupedCheck[] = [
  // ---------- Scoring ----------
  {
    group: "Scoring",
    name: "Score never negative",
    run: () => {
      const bad = baselineRecords.filter((r) => computeScore(r) < 0).map((r) => r.neighborhoodId);
      if (bad.length > 0) return { status: "fail", message: `negative score for ${bad.join(", ")}` };
      return { status: "pass", message: "all fixture scores >= 0" };
    },
  },
  {
    group: "Scoring",
    name: "Deaths strictly increase score",
    run: () => {
      const errors: string[] = [];
      for (const r of baselineRecords) {
        const more = { ...r, deathsInIntervention: r.deathsInIntervention + 1 };
        if (!(computeScore(more) > computeScore(r))) errors.push(r.neighborhoodId);
      }
      if (errors.length > 0) return { status: "fail", message: `no increase for ${errors.join(", ")}` };
      return { status: "pass", message: "+1 death raises every fixture score" };
    },
  },
  // ---------- Tiers ----------
  {
    group: "Tiers",
    name: "Breakpoints map to their own tier",
    run: () => {
      const errors = DEFAULT_ENGINE_CONFIG.tierBreakpoints
        .filter((bp) => classify(bp.min) !== bp.tier)
        .map((bp) => `${bp.min} → ${classify(bp.min)} (expected ${bp.tier})`);
      if (errors.length > 0) return { status: "fail", message: errors.join("; ") };
      return { status: "pass", message: `${TIERS.length} boundaries belong to the upper tier` };
    },
  },
  // ---------- Forecast ----------
  {
    group: "Forecast",
    name: "Perfect line reproduced",
    run: () => {
      const series = [0, 1, 2, 3].map((i) => ({ periodIndex: i, crimeCount: 10 + 3 * i }));
      const points = forecastTrend(series, 2);
      const expected = [22, 25];
      const ok = points.length === 2 && points.every((p, i) => approxEqual(p.predictedCrimeCount, expected[i] ?? NaN));
      if (!ok) return { status: "fail", message: "linear series not reproduced", details: points };
      return { status: "pass", message: "OLS fit exact on a perfect line" };
    },
  },
  {
    group: "Forecast",
    name: "Declining series clamped at zero",
    run: () => {
      const series = [0, 1, 2].map((i) => ({ periodIndex: i, crimeCount: 40 - 15 * i }));
      const values = forecastTrend(series, 5).map((p) => p.predictedCrimeCount);
      if (!allNonNegative(values)) return { status: "fail", message: "negative prediction", details: values };
      return { status: "pass", message: "predictions >= 0" };
    },
  },
  // ---------- Evaluation ----------
  {
    group: "Evaluation",
    name: "Baseline results satisfy result invariants",
    run: () => {
      const { results } = evaluateTable(baselineRecords);
      const errors = results.flatMap((r) => riskResultViolations(r, DEFAULT_ENGINE_CONFIG.forecastHorizon));
      if (errors.length > 0) return { status: "fail", message: errors.join("; "), details: { errors } };
      return { status: "pass", message: `${results.length} neighborhoods well-formed` };
    },
  },
  {
    group: "Evaluation",
    name: "Edge records: no throw, bad rows isolated",
    run: () => {
      try {
        const { results, failures } = evaluateTable([...baselineRecords, ...edgeRecords]);
        const names = new Set(results.map((r) => r.neighborhoodId));
        if (!names.has("centro") || !names.has("bom-fim"))
          return { status: "fail", message: "valid neighborhoods lost to bad rows", details: { failures } };
        return { status: "pass", message: "bad rows rejected without aborting the table" };
      } catch (e) {
        return { status: "fail", message: `engine threw: ${e instanceof Error ? e.message : String(e)}` };
      }
    },
  },
  {
    group: "Evaluation",
    name: "Input not mutated",
    run: () => {
      const before = JSON.stringify(baselineRecords);
      evaluateTable(baselineRecords);
      if (JSON.stringify(baselineRecords) !== before) return { status: "fail", message: "evaluateTable mutated its input" };
      return { status: "pass", message: "input unchanged after evaluation" };
    },
  },
  // ---------- Cache ----------
  {
    group: "Cache",
    name: "Cached evaluation equals fresh evaluation",
    run: () => {
      const cache = createEvaluationCache();
      cache.evaluate(baselineRecords);
      const cached = cache.evaluate(baselineRecords);
      const fresh = evaluateTable(baselineRecords);
      if (JSON.stringify(cached) !== JSON.stringify(fresh))
        return { status: "fail", message: "cached result differs from recomputation" };
      if (cache.stats().hits !== 1) return { status: "warn", message: "expected one cache hit", details: cache.stats() };
      return { status: "pass", message: "referentially transparent" };
    },
  },
];

export type RunResult = {
  results: Array<{ group: CheckGroup; name: string; status: CheckStatus; message: string; details?: unknown }>;
  durationMs: number;
};

export function runAllChecks(): RunResult {
  const start = performance.now();
  const results = groupedHealthChecks.map((c) => ({
    group: c.group,
    name: c.name,
    ...c.run(),
  }));
  const durationMs = performance.now() - start;
  return { results, durationMs };
}
