/**
 * Synergistic neighborhood risk score (pure, deterministic).
 * score = Σ weight[term] * term, clamped at 0: enforcement can offset crime but never invert it.
 */

import type { IndicatorCounts } from "@/domain/indicator/indicator.schema";
import { NO_OPERATION } from "@/domain/indicator/indicator.schema";
import { SCORE_TERMS, type ScoreTerm, type ScoreWeights } from "@/domain/risk/risk.schema";
import { DEFAULT_SCORE_WEIGHTS } from "@/config/engineDefaults";

export type ScoreContributions = Record<ScoreTerm, number>;

/** Raw (unweighted) value of each term; an active operation counts as 1. */
export function termValues(indicators: IndicatorCounts): ScoreContributions {
  return {
    crimeCount: indicators.crimeCount,
    deathsInIntervention: indicators.deathsInIntervention,
    arrests: indicators.arrests,
    weaponsSeized: indicators.weaponsSeized,
    drugsSeizedKg: indicators.drugsSeizedKg,
    activeOperation: indicators.operationType !== NO_OPERATION ? 1 : 0,
  };
}

/** Signed weighted term per indicator, before clamping. */
export function scoreContributions(
  indicators: IndicatorCounts,
  weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS
): ScoreContributions {
  const values = termValues(indicators);
  const out = { ...values };
  for (const term of SCORE_TERMS) {
    const weighted = weights[term] * values[term];
    // a negative weight on a zero term gives -0
    out[term] = weighted === 0 ? 0 : weighted;
  }
  return out;
}

export function computeScore(
  indicators: IndicatorCounts,
  weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS
): number {
  const contributions = scoreContributions(indicators, weights);
  let score = 0;
  for (const term of SCORE_TERMS) score += contributions[term];
  if (score === Infinity) return Infinity;
  return Number.isFinite(score) ? Math.max(score, 0) : 0;
}

/**
 * Term with the largest absolute contribution. Ties keep declaration order;
 * when every term is zero the crime count is reported.
 */
export function dominantIndicator(contributions: ScoreContributions): ScoreTerm {
  let best: ScoreTerm = "crimeCount";
  let bestMagnitude = Math.abs(contributions.crimeCount);
  for (const term of SCORE_TERMS) {
    const magnitude = Math.abs(contributions[term]);
    if (magnitude > bestMagnitude) {
      best = term;
      bestMagnitude = magnitude;
    }
  }
  return best;
}
