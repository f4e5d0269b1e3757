import { PullRequestSnapshot } from '../types';

/**
 * Team members that are either requested on the pull request or have already
 * submitted a review on it. Someone who is both is returned once.
 */
export function collectEngagedReviewers(
  pr: Pick<PullRequestSnapshot, 'requestedReviewers' | 'reviewAuthors'>,
  team: { has(login: string): boolean },
): Set<string> {
  const engaged = new Set<string>();

  for (const login of pr.requestedReviewers) {
    if (team.has(login)) {
      engaged.add(login);
    }
  }
  for (const login of pr.reviewAuthors) {
    if (team.has(login)) {
      engaged.add(login);
    }
  }

  return engaged;
}
