import * as core from '@actions/core';
import { Log } from '../lib/mkLog';
import { collectEngagedReviewers } from './logic/collectEngagedReviewers';
import { fetchPullRequest } from './fetchPullRequest';
import { fetchReviewAuthors } from './fetchReviewAuthors';
import {
  Client,
  PullRequestSnapshot,
  RepoInfo,
  WorkloadMap,
} from './types';

export function createWorkloadMap(teamMembers: string[]): WorkloadMap {
  const workloads: WorkloadMap = new Map();
  for (const member of teamMembers) {
    workloads.set(member, { openPrsCount: 0, totalLinesInReview: 0 });
  }
  return workloads;
}

/**
 * Counts, for every team member, the open pull requests they are requested on
 * or have reviewed, along with the lines changed across those pull requests.
 */
export async function aggregateWorkload(
  client: Client,
  options: RepoInfo & { teamMembers: string[] },
  log: Log = core.info,
): Promise<WorkloadMap> {
  const { owner, repo, teamMembers } = options;
  const workloads = createWorkloadMap(teamMembers);

  // Every page is listed before the first per-PR request
  const prNumbers = await listOpenPrNumbers(client, { owner, repo });
  log(`Found ${prNumbers.length} open PRs, fetching details...`);

  for (const prNumber of prNumbers) {
    const pr = await fetchPullRequestSnapshot(client, {
      owner,
      repo,
      prNumber,
    });

    for (const reviewer of collectEngagedReviewers(pr, workloads)) {
      const workload = workloads.get(reviewer);
      if (!workload) {
        continue;
      }
      workload.openPrsCount += 1;
      workload.totalLinesInReview += pr.changedLines;
      log(`PR #${pr.number}: @${reviewer} reviewing (${pr.changedLines} lines)`);
    }
  }

  log(`Analyzed ${prNumbers.length} open PRs`);

  return workloads;
}

async function listOpenPrNumbers(
  client: Client,
  options: RepoInfo,
): Promise<number[]> {
  try {
    const pulls = await client.paginate(client.rest.pulls.list, {
      ...options,
      state: 'open',
      per_page: 100,
    });
    return pulls.map(pull => pull.number);
  } catch (error) {
    throw new Error(`Failed to fetch open PRs: ${error}`, { cause: error });
  }
}

async function fetchPullRequestSnapshot(
  client: Client,
  options: RepoInfo & { prNumber: number },
): Promise<PullRequestSnapshot> {
  const { prNumber } = options;

  const pr = await fetchPullRequest(client, options);
  const reviewAuthors = await fetchReviewAuthors(client, options);
  if (!reviewAuthors.ok) {
    core.warning(
      `Failed to list reviews for PR #${prNumber}, assuming none: ${reviewAuthors.error}`,
    );
  }

  return {
    number: prNumber,
    authorLogin: pr.user?.login,
    changedLines: (pr.additions ?? 0) + (pr.deletions ?? 0),
    requestedReviewers: (pr.requested_reviewers ?? []).map(r => r.login),
    reviewAuthors: reviewAuthors.ok ? reviewAuthors.value : [],
  };
}
