import { BudgetStatus } from './interfaces/scoring.interface';
import {
  computeWeightedScore,
  DIMENSION_WEIGHTS,
  SCORING_DIMENSIONS,
  statusForScore,
} from './dimension-weights';

describe('dimension weights', () => {
  it('should sum to 1.0', () => {
    const total = SCORING_DIMENSIONS.reduce(
      (sum, dimension) => sum + DIMENSION_WEIGHTS[dimension],
      0,
    );
    expect(total).toBeCloseTo(1.0, 10);
  });

  it('should use the fixed per-dimension weights', () => {
    expect(DIMENSION_WEIGHTS).toEqual({
      timing: 0.3,
      growth: 0.25,
      tech_modernization: 0.2,
      company_size: 0.15,
      budget_availability: 0.1,
    });
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(DIMENSION_WEIGHTS)).toBe(true);
  });
});

describe('computeWeightedScore', () => {
  it('should weight each dimension and round half up to 82', () => {
    const weighted = computeWeightedScore({
      timing: 80,
      growth: 70,
      tech_modernization: 90,
      company_size: 100,
      budget_availability: 70,
    });

    expect(weighted).toBe(81.5);
    expect(Math.round(weighted)).toBe(82);
    expect(statusForScore(Math.round(weighted))).toBe(BudgetStatus.GREEN);
  });

  it('should return the common value when all dimensions agree', () => {
    expect(
      computeWeightedScore({
        timing: 50,
        growth: 50,
        tech_modernization: 50,
        company_size: 50,
        budget_availability: 50,
      }),
    ).toBe(50);
  });

  it('should score an all-unknown profile from the rubric fallbacks', () => {
    // timing unknown 50, stable growth 50, mixed stack 50, other size 40, no signal 30
    expect(
      computeWeightedScore({
        timing: 50,
        growth: 50,
        tech_modernization: 50,
        company_size: 40,
        budget_availability: 30,
      }),
    ).toBe(46.5);
  });
});

describe('statusForScore', () => {
  it.each([
    [100, BudgetStatus.GREEN],
    [70, BudgetStatus.GREEN],
    [69, BudgetStatus.YELLOW],
    [40, BudgetStatus.YELLOW],
    [39, BudgetStatus.RED],
    [0, BudgetStatus.RED],
  ])('should map %i to %s', (score, status) => {
    expect(statusForScore(score)).toBe(status);
  });
});
