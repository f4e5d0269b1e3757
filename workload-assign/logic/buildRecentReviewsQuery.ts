export const RECENT_WINDOW_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildRecentReviewsQuery(options: {
  owner: string;
  repo: string;
  username: string;
  now?: Date;
}): string {
  const { owner, repo, username, now = new Date() } = options;

  const since = new Date(now.getTime() - RECENT_WINDOW_DAYS * DAY_MS);
  const sinceDate = since.toISOString().split('T')[0]; // YYYY-MM-DD

  return `repo:${owner}/${repo} is:pr reviewed-by:${username} closed:>${sinceDate}`;
}
