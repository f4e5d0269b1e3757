import { Client, RepoInfo } from './types';

export async function fetchPullRequest(
  client: Client,
  options: RepoInfo & { prNumber: number },
) {
  const { owner, repo, prNumber } = options;

  try {
    const { data } = await client.rest.pulls.get({
      owner,
      repo,
      pull_number: prNumber,
    });
    return data;
  } catch (error) {
    throw new Error(`Failed to fetch details for PR #${prNumber}: ${error}`, {
      cause: error,
    });
  }
}
