import type * as github from '@actions/github';

export type Client = ReturnType<typeof github.getOctokit>;

export interface Weights {
  /** Points per open pull request the reviewer is engaged on */
  openPrs: number;
  /** Points per 100 changed lines across those pull requests */
  linesPer100: number;
  /** Points per review on a pull request closed within the recent window */
  recentReviews: number;
}

export interface Config {
  token: string;
  teamMembers: string[];
  weights: Weights;
  owner: string;
  repo: string;
  prNumber: number;
}

export interface RepoInfo {
  owner: string;
  repo: string;
}

export interface ReviewerWorkload {
  openPrsCount: number;
  totalLinesInReview: number;
}

export type WorkloadMap = Map<string, ReviewerWorkload>;

export interface PullRequestSnapshot {
  number: number;
  authorLogin?: string;
  changedLines: number;
  requestedReviewers: string[];
  reviewAuthors: string[];
}

export interface ReviewerScore {
  username: string;
  openPrsCount: number;
  totalLinesInReview: number;
  recentReviewsCount: number;
  totalScore: number;
}

/**
 * Outcome of a best-effort fetch. Callers decide what a failure defaults to.
 */
export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };
