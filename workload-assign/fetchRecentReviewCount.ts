import { buildRecentReviewsQuery } from './logic/buildRecentReviewsQuery';
import { Client, FetchResult, RepoInfo } from './types';

/**
 * Number of pull requests in the repository that the user reviewed and that
 * were closed within the recent window.
 */
export async function fetchRecentReviewCount(
  client: Client,
  options: RepoInfo & { username: string },
): Promise<FetchResult<number>> {
  const q = buildRecentReviewsQuery(options);

  try {
    const { data } = await client.rest.search.issuesAndPullRequests({
      q,
      per_page: 1,
    });
    return { ok: true, value: data.total_count ?? 0 };
  } catch (error) {
    return { ok: false, error };
  }
}
