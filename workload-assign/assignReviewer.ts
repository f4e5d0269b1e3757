import * as core from '@actions/core';
import { Log } from '../lib/mkLog';
import { aggregateWorkload } from './aggregateWorkload';
import { fetchPullRequest } from './fetchPullRequest';
import { renderRanking } from './logic/renderRanking';
import { scoreReviewers } from './scoreReviewers';
import { Client, Config, RepoInfo, ReviewerScore } from './types';

/**
 * Requests a review from the least busy eligible team member on the
 * configured pull request. Returns the chosen reviewer, or undefined when
 * nobody besides the author is on the team.
 */
export async function assignReviewer(
  client: Client,
  config: Omit<Config, 'token'>,
  log: Log = core.info,
): Promise<ReviewerScore | undefined> {
  const { owner, repo, prNumber, teamMembers, weights } = config;

  core.startGroup(`Pull request #${prNumber}`);
  const prAuthor = await fetchPrAuthor(client, { owner, repo, prNumber }, log);
  core.endGroup();

  core.startGroup('Reviewer workload');
  const workloads = await aggregateWorkload(
    client,
    { owner, repo, teamMembers },
    log,
  );
  core.endGroup();

  core.startGroup('Scores');
  const ranking = await scoreReviewers(
    client,
    { owner, repo, teamMembers, weights, workloads, prAuthor },
    log,
  );
  core.endGroup();

  log('Final rankings (lowest score = least busy):');
  for (const line of renderRanking(ranking)) {
    log(line);
  }

  const winner = ranking[0];
  if (!winner) {
    core.warning(
      'No eligible reviewers found (is everyone except the author on the team list?)',
    );
    return undefined;
  }

  log(`Best choice: @${winner.username}`);
  await requestReview(
    client,
    { owner, repo, prNumber, reviewer: winner.username },
    log,
  );
  log(`Done! PR #${prNumber} has been assigned to @${winner.username}`);

  return winner;
}

async function fetchPrAuthor(
  client: Client,
  options: RepoInfo & { prNumber: number },
  log: Log,
): Promise<string> {
  const { prNumber } = options;

  log(`Fetching PR #${prNumber}...`);
  const pr = await fetchPullRequest(client, options);

  const author = pr.user?.login;
  if (!author) {
    throw new Error(`PR #${prNumber} has no author`);
  }

  log(`Author: @${author}`);
  log(`Title: ${pr.title || '(no title)'}`);
  log(`State: ${pr.state}`);

  return author;
}

async function requestReview(
  client: Client,
  options: RepoInfo & { prNumber: number; reviewer: string },
  log: Log,
) {
  const { owner, repo, prNumber, reviewer } = options;

  log(`Assigning @${reviewer} to PR #${prNumber}...`);
  try {
    await client.rest.pulls.requestReviewers({
      owner,
      repo,
      pull_number: prNumber,
      reviewers: [reviewer],
    });
  } catch (error) {
    throw new Error(
      `Failed to assign @${reviewer} as reviewer to PR #${prNumber}: ${error}`,
      { cause: error },
    );
  }
}
