import { describe, it, expect } from '@jest/globals';
import { calculateScore, CalculateScoreOptions } from './calculateScore';

const defaultWeights = { openPrs: 10, linesPer100: 1, recentReviews: 3 };

function calc(overrides: Partial<CalculateScoreOptions> = {}) {
  return calculateScore({
    openPrsCount: 0,
    totalLinesInReview: 0,
    recentReviewsCount: 0,
    weights: defaultWeights,
    ...overrides,
  });
}

describe('calculateScore', () => {
  it('gives an idle reviewer a score of exactly 0 for any weights', () => {
    expect(calc()).toBe(0);
    expect(
      calc({ weights: { openPrs: 0, linesPer100: 0, recentReviews: 0 } }),
    ).toBe(0);
    expect(
      calc({ weights: { openPrs: 2.5, linesPer100: 7, recentReviews: 100 } }),
    ).toBe(0);
  });

  it('sums the three weighted terms', () => {
    expect(
      calc({ openPrsCount: 2, totalLinesInReview: 250, recentReviewsCount: 1 }),
    ).toBe(25.5);
  });

  it('counts lines per hundred', () => {
    expect(
      calc({
        openPrsCount: 1,
        totalLinesInReview: 40,
        weights: { openPrs: 10, linesPer100: 1, recentReviews: 0 },
      }),
    ).toBeCloseTo(10.4);
  });

  it('only uses recent reviews when there is no open workload', () => {
    expect(calc({ recentReviewsCount: 4 })).toBe(12);
    expect(
      calc({
        recentReviewsCount: 4,
        weights: { openPrs: 10, linesPer100: 1, recentReviews: 0 },
      }),
    ).toBe(0);
  });

  it('never decreases when a single signal grows', () => {
    const base = {
      openPrsCount: 3,
      totalLinesInReview: 120,
      recentReviewsCount: 2,
    };
    const baseScore = calc(base);

    expect(baseScore).toBeGreaterThanOrEqual(0);
    expect(calc({ ...base, openPrsCount: 4 })).toBeGreaterThan(baseScore);
    expect(calc({ ...base, totalLinesInReview: 121 })).toBeGreaterThan(
      baseScore,
    );
    expect(calc({ ...base, recentReviewsCount: 3 })).toBeGreaterThan(
      baseScore,
    );
  });

  it('ignores a signal whose weight is 0', () => {
    const weights = { openPrs: 0, linesPer100: 1, recentReviews: 3 };
    expect(calc({ openPrsCount: 9, weights })).toBe(calc({ weights }));
  });
});
