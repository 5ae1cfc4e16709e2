import {
  BudgetStatus,
  ScoringDimension,
} from './interfaces/scoring.interface';

export const SCORING_DIMENSIONS: readonly ScoringDimension[] = [
  'timing',
  'growth',
  'tech_modernization',
  'company_size',
  'budget_availability',
];

/** Fixed weights; they sum to 1.0. */
export const DIMENSION_WEIGHTS: Readonly<Record<ScoringDimension, number>> =
  Object.freeze({
    timing: 0.3,
    growth: 0.25,
    tech_modernization: 0.2,
    company_size: 0.15,
    budget_availability: 0.1,
  });

export const GREEN_THRESHOLD = 70;
export const YELLOW_THRESHOLD = 40;

/**
 * Σ score × weight, unrounded. Summed in whole percent so that half-point
 * totals such as 81.5 are exact before rounding.
 */
export function computeWeightedScore(
  scores: Record<ScoringDimension, number>,
): number {
  const hundredths = SCORING_DIMENSIONS.reduce(
    (sum, dimension) =>
      sum + scores[dimension] * Math.round(DIMENSION_WEIGHTS[dimension] * 100),
    0,
  );
  return hundredths / 100;
}

export function statusForScore(score: number): BudgetStatus {
  if (score >= GREEN_THRESHOLD) {
    return BudgetStatus.GREEN;
  }
  if (score >= YELLOW_THRESHOLD) {
    return BudgetStatus.YELLOW;
  }
  return BudgetStatus.RED;
}
