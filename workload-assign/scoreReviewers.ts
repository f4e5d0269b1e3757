import * as core from '@actions/core';
import { Log } from '../lib/mkLog';
import { calculateScore } from './logic/calculateScore';
import { rankReviewers } from './logic/rankReviewers';
import { fetchRecentReviewCount } from './fetchRecentReviewCount';
import { Client, RepoInfo, ReviewerScore, Weights, WorkloadMap } from './types';

export interface ScoreReviewersOptions extends RepoInfo {
  teamMembers: string[];
  weights: Weights;
  workloads: WorkloadMap;
  prAuthor: string;
}

/**
 * Scores every team member except the PR author and returns them ordered from
 * least to most busy.
 */
export async function scoreReviewers(
  client: Client,
  options: ScoreReviewersOptions,
  log: Log = core.info,
): Promise<ReviewerScore[]> {
  const { owner, repo, teamMembers, weights, workloads, prAuthor } = options;

  const scores: ReviewerScore[] = [];

  for (const member of teamMembers) {
    if (member === prAuthor) {
      continue;
    }

    const workload = workloads.get(member);
    if (!workload) {
      throw new Error(`No workload was recorded for team member @${member}`);
    }

    const recent = await fetchRecentReviewCount(client, {
      owner,
      repo,
      username: member,
    });
    if (!recent.ok) {
      core.warning(
        `Failed to search recent reviews for @${member}, assuming 0: ${recent.error}`,
      );
    }
    const recentReviewsCount = recent.ok ? recent.value : 0;

    const totalScore = calculateScore({
      ...workload,
      recentReviewsCount,
      weights,
    });

    log(
      `@${member}: ${totalScore.toFixed(2)} points (Open: ${
        workload.openPrsCount
      } × ${weights.openPrs}, Lines: ${workload.totalLinesInReview} ÷ 100 × ${
        weights.linesPer100
      }, Recent: ${recentReviewsCount} × ${weights.recentReviews})`,
    );

    scores.push({
      username: member,
      openPrsCount: workload.openPrsCount,
      totalLinesInReview: workload.totalLinesInReview,
      recentReviewsCount,
      totalScore,
    });
  }

  return rankReviewers(scores);
}
