import {
  CRITERIA,
  type Ballot,
  type CriterionWeights,
  type RankingEntry,
  type ScoreMetrics,
} from '../types/index.js';

export const MAX_METRIC = 5;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clampMetrics(metrics: ScoreMetrics): ScoreMetrics {
  const clamped = { ...metrics };
  for (const criterion of CRITERIA) {
    const value = Number.isFinite(metrics[criterion]) ? metrics[criterion] : 0;
    clamped[criterion] = Math.min(MAX_METRIC, Math.max(0, value));
  }
  return clamped;
}

/**
 * Weighted 0-100 score, rounded to two decimals.
 */
export function weightedScore(metrics: ScoreMetrics, weights: CriterionWeights): number {
  const clamped = clampMetrics(metrics);
  let total = 0;
  for (const criterion of CRITERIA) {
    total += (weights[criterion] * clamped[criterion]) / MAX_METRIC;
  }
  return round2(total * 100);
}

/**
 * Candidates by descending mean overall score. The sort is stable, so equal
 * means keep the order of `candidates`.
 */
export function rankCandidates(candidates: readonly string[], ballots: readonly Ballot[]): RankingEntry[] {
  const entries: RankingEntry[] = candidates.map((candidate) => {
    const scores = ballots.filter((b) => b.candidate === candidate).map((b) => b.overallScore);
    const mean = scores.length === 0 ? 0 : scores.reduce((sum, s) => sum + s, 0) / scores.length;
    return [candidate, round2(mean)];
  });
  return entries.sort((a, b) => b[1] - a[1]);
}

/**
 * Weight profiles compare equal when every criterion weight matches.
 */
export function sameWeights(a: CriterionWeights, b: CriterionWeights): boolean {
  return CRITERIA.every((criterion) => a[criterion] === b[criterion]);
}
