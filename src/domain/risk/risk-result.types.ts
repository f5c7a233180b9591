/**
 * Output records handed to presentation collaborators. Plain data only.
 */

import type { PeriodIndex } from "@/domain/indicator/indicator.schema";
import type { ScoreTerm, Tier } from "./risk.schema";
import type { PeriodForecastPoint, TrendDirection } from "./risk-forecast.types";

export type AlertType = "INTERVENTION_DEATHS" | "HIGH_VOLUME" | "SIGNIFICANT_INCREASE";

export type AlertPriority = "critical" | "high" | "medium";

export type Alert = {
  type: AlertType;
  priority: AlertPriority;
  /** Observed value that triggered the alert (count or relative change). */
  value: number;
};

/** A record dropped from evaluation; neighborhood and period identify it. */
export type RejectedRecord = {
  neighborhoodId: string;
  period: string;
  issues: string[];
};

export type RiskResult = {
  neighborhoodId: string;
  /** Latest evaluated period. */
  period: PeriodIndex;
  /** >= 0, unbounded above. */
  score: number;
  tier: Tier;
  /** [0, 1], or null when no operation took place. */
  effectivenessRatio: number | null;
  dominantIndicator: ScoreTerm;
  /** Signed weighted term per indicator. */
  contributions: Record<ScoreTerm, number>;
  /** Absent when fewer than 2 periods exist. */
  forecast?: PeriodForecastPoint[];
  trend?: TrendDirection;
  alerts: Alert[];
  /** Highest priority first. */
  recommendations: string[];
  rejected: RejectedRecord[];
};

/** Neighborhood with no valid record left to evaluate. */
export type NeighborhoodFailure = {
  neighborhoodId: string;
  rejected: RejectedRecord[];
};

export type TableEvaluation = {
  results: RiskResult[];
  failures: NeighborhoodFailure[];
};
