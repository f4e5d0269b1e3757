import { Weights } from '../types';

export interface CalculateScoreOptions {
  openPrsCount: number;
  totalLinesInReview: number;
  recentReviewsCount: number;
  weights: Weights;
}

/**
 * Lower is less busy. With non-negative weights and counts the result is
 * never negative, and an idle reviewer scores exactly 0.
 */
export function calculateScore(options: CalculateScoreOptions): number {
  const { openPrsCount, totalLinesInReview, recentReviewsCount, weights } =
    options;

  return (
    openPrsCount * weights.openPrs +
    (totalLinesInReview / 100) * weights.linesPer100 +
    recentReviewsCount * weights.recentReviews
  );
}
