/**
 * Neighborhood risk engine: pure deterministic functions.
 * Score, tier, effectiveness, trend forecast, alerts and recommendations per neighborhood.
 */

export type {
  IndicatorRecord,
  IndicatorCounts,
  OperationType,
  Period,
  PeriodIndex,
} from "./domain/indicator/indicator.schema";
export { IndicatorRecordSchema, NO_OPERATION } from "./domain/indicator/indicator.schema";
export type { ValidatedRecord } from "./domain/indicator/indicator.validate";
export { validateIndicatorRecord } from "./domain/indicator/indicator.validate";
export { normalizePeriod, periodOrdinal, periodFromOrdinal } from "./domain/indicator/indicator.period";

export type { Tier, ScoreTerm, ScoreWeights, TierBreakpoint } from "./domain/risk/risk.schema";
export { TIERS } from "./domain/risk/risk.schema";
export type {
  Alert,
  AlertPriority,
  AlertType,
  NeighborhoodFailure,
  RejectedRecord,
  RiskResult,
  TableEvaluation,
} from "./domain/risk/risk-result.types";
export type {
  ForecastPoint,
  LinearTrendFit,
  PeriodForecastPoint,
  SeriesPoint,
  TrendDirection,
} from "./domain/risk/risk-forecast.types";

export type { EngineConfig, EngineConfigOverrides } from "./config/engineConfig";
export { resolveEngineConfig, loadEngineConfigFile } from "./config/engineConfig";
export { DEFAULT_ENGINE_CONFIG } from "./config/engineDefaults";
export { classify, DEFAULT_TIER_BREAKPOINTS } from "./config/riskTiers";

export { computeScore, scoreContributions, dominantIndicator } from "./engine/scoring/computeScore";
export { computeEffectiveness } from "./engine/effectiveness/computeEffectiveness";
export { fitLinearTrend, forecastTrend, classifyTrend } from "./engine/forecast/linearTrend";
export { recommend } from "./engine/recommendations/recommend";
export type { AlertPeriod } from "./engine/alerts/deriveAlerts";
export { deriveAlerts } from "./engine/alerts/deriveAlerts";
export { evaluateTable, evaluateNeighborhood, isRiskResult } from "./engine/evaluate/evaluateTable";
export type { EvaluationCache, CacheStats } from "./engine/evaluate/evaluationCache";
export { createEvaluationCache } from "./engine/evaluate/evaluationCache";
export {
  EngineError,
  InvalidIndicatorError,
  InsufficientDataError,
  InvalidConfigError,
} from "./engine/errors";

export type { SystemStatus, SystemStatusCollector } from "./lib/systemStatus";
export { createSystemStatus } from "./lib/systemStatus";
export { parseIndicatorWorkbook, rowsToIndicatorInputs, readIndicatorFile } from "./lib/indicatorImport";
