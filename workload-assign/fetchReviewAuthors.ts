import { Client, FetchResult, RepoInfo } from './types';

/**
 * Logins of everyone who has submitted a review on the pull request. Review
 * listings are best-effort, so failures are returned rather than thrown.
 */
export async function fetchReviewAuthors(
  client: Client,
  options: RepoInfo & { prNumber: number },
): Promise<FetchResult<string[]>> {
  const { owner, repo, prNumber } = options;

  try {
    const reviews = await client.paginate(client.rest.pulls.listReviews, {
      owner,
      repo,
      pull_number: prNumber,
      per_page: 100,
    });
    const logins = reviews
      .map(review => review.user?.login)
      .filter((login): login is string => Boolean(login));
    return { ok: true, value: logins };
  } catch (error) {
    return { ok: false, error };
  }
}
