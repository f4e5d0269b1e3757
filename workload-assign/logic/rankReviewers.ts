import { ReviewerScore } from '../types';

export function compareScores(a: ReviewerScore, b: ReviewerScore): number {
  if (Number.isNaN(a.totalScore) || Number.isNaN(b.totalScore)) {
    return 0;
  }
  return a.totalScore - b.totalScore;
}

// Array.prototype.sort is stable, so equal scores keep roster order
export function rankReviewers(scores: ReviewerScore[]): ReviewerScore[] {
  return [...scores].sort(compareScores);
}
