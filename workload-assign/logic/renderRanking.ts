import { ReviewerScore } from '../types';

const RANK_MARKERS = ['🥇', '🥈', '🥉'];

export function renderRanking(scores: ReviewerScore[]): string[] {
  return scores.flatMap((score, i) => [
    `${RANK_MARKERS[i] ?? '  '} #${i + 1} @${
      score.username
    }: ${score.totalScore.toFixed(2)} points`,
    `       ${score.openPrsCount} open PRs, ${score.totalLinesInReview} lines, ${score.recentReviewsCount} recent reviews`,
  ]);
}
