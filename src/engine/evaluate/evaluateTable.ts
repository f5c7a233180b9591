/**
 * Table evaluation: validate → group by neighborhood → score, tier, effectiveness,
 * forecast, alerts, recommendations. One neighborhood's failure never aborts the rest.
 */

import type { ValidatedRecord } from "@/domain/indicator/indicator.validate";
import { rawNeighborhoodId, validateIndicatorRecord } from "@/domain/indicator/indicator.validate";
import { aggregateWindow, groupBy } from "@/domain/indicator/indicator.aggregate";
import { formatPeriod, periodFromOrdinal } from "@/domain/indicator/indicator.period";
import type {
  NeighborhoodFailure,
  RejectedRecord,
  RiskResult,
  TableEvaluation,
} from "@/domain/risk/risk-result.types";
import type { PeriodForecastPoint, TrendDirection } from "@/domain/risk/risk-forecast.types";
import type { EngineConfig } from "@/config/engineConfig";
import { DEFAULT_ENGINE_CONFIG } from "@/config/engineDefaults";
import { classify } from "@/config/riskTiers";
import { computeScore, dominantIndicator, scoreContributions } from "@/engine/scoring/computeScore";
import { computeEffectiveness } from "@/engine/effectiveness/computeEffectiveness";
import { classifyTrend, fitLinearTrend, projectTrend } from "@/engine/forecast/linearTrend";
import { recommend } from "@/engine/recommendations/recommend";
import { deriveAlerts } from "@/engine/alerts/deriveAlerts";
import { InsufficientDataError, InvalidIndicatorError } from "@/engine/errors";
import { derr, dwarn } from "@/lib/debug";

type Screened = { valid: ValidatedRecord[]; rejected: RejectedRecord[] };

function toRejected(e: InvalidIndicatorError): RejectedRecord {
  return { neighborhoodId: e.neighborhoodId, period: e.period, issues: [...e.issues] };
}

/** Orders by period and rejects later duplicates of an already-seen period. */
function orderSeries(records: readonly ValidatedRecord[]): Screened {
  const sorted = [...records].sort((a, b) => a.ordinal - b.ordinal);
  const valid: ValidatedRecord[] = [];
  const rejected: RejectedRecord[] = [];
  for (const r of sorted) {
    const last = valid[valid.length - 1];
    if (last && last.ordinal === r.ordinal) {
      rejected.push(
        toRejected(
          new InvalidIndicatorError(r.neighborhoodId, formatPeriod(r.normalizedPeriod), [
            "period: duplicate period in series",
          ])
        )
      );
      continue;
    }
    valid.push(r);
  }
  return { valid, rejected };
}

function buildForecast(
  series: readonly ValidatedRecord[],
  config: EngineConfig
): { forecast: PeriodForecastPoint[]; trend: TrendDirection } | null {
  try {
    const fit = fitLinearTrend(
      series.map((r) => ({ periodIndex: r.ordinal, crimeCount: r.crimeCount }))
    );
    const forecast = projectTrend(fit, config.forecastHorizon).map((p) => ({
      ...p,
      period: periodFromOrdinal(p.periodIndex, config.periodsPerYear),
    }));
    return { forecast, trend: classifyTrend(fit, config.trendSlopeThreshold) };
  } catch (e) {
    if (e instanceof InsufficientDataError) return null;
    throw e;
  }
}

/**
 * Evaluates one neighborhood from its validated records (any order).
 * Returns a failure when no usable record remains.
 */
export function evaluateNeighborhood(
  neighborhoodId: string,
  records: readonly ValidatedRecord[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  priorRejections: readonly RejectedRecord[] = []
): RiskResult | NeighborhoodFailure {
  const { valid, rejected: duplicates } = orderSeries(records);
  const rejected = [...priorRejections, ...duplicates];
  const latest = valid[valid.length - 1];
  if (!latest) return { neighborhoodId, rejected };

  const indicators = aggregateWindow(valid, config.aggregationWindow);
  const contributions = scoreContributions(indicators, config.weights);
  const score = computeScore(indicators, config.weights);
  const tier = classify(score, config.tierBreakpoints);
  const effectivenessRatio = computeEffectiveness(indicators, config.effectiveness);
  const dominant = dominantIndicator(contributions);
  const projected = buildForecast(valid, config);

  const result: RiskResult = {
    neighborhoodId,
    period: { ...latest.normalizedPeriod },
    score,
    tier,
    effectivenessRatio,
    dominantIndicator: dominant,
    contributions,
    alerts: deriveAlerts(valid, config.alerts),
    recommendations: recommend(tier, effectivenessRatio, dominant, config.recommendations),
    rejected,
  };
  if (projected) {
    result.forecast = projected.forecast;
    result.trend = projected.trend;
  }
  return result;
}

export function isRiskResult(x: RiskResult | NeighborhoodFailure): x is RiskResult {
  return "tier" in x;
}

/**
 * Evaluates every neighborhood in the table. Invalid records are rejected and reported
 * on their neighborhood's result; neighborhoods appear in first-appearance order.
 */
export function evaluateTable(
  records: readonly unknown[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): TableEvaluation {
  const results: RiskResult[] = [];
  const failures: NeighborhoodFailure[] = [];

  for (const [neighborhoodId, group] of groupBy(records, rawNeighborhoodId)) {
    const screened: Screened = { valid: [], rejected: [] };
    try {
      for (const raw of group) {
        try {
          screened.valid.push(validateIndicatorRecord(raw, config.periodsPerYear));
        } catch (e) {
          if (!(e instanceof InvalidIndicatorError)) throw e;
          dwarn("evaluate", e.message);
          screened.rejected.push(toRejected(e));
        }
      }
      const outcome = evaluateNeighborhood(neighborhoodId, screened.valid, config, screened.rejected);
      if (isRiskResult(outcome)) results.push(outcome);
      else failures.push(outcome);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      derr("evaluate", `neighborhood ${neighborhoodId} failed:`, reason);
      failures.push({
        neighborhoodId,
        rejected: [...screened.rejected, { neighborhoodId, period: "*", issues: [reason] }],
      });
    }
  }

  return { results, failures };
}
