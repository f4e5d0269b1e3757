import { jest } from '@jest/globals';
import { Client } from '../types';

export interface MockPull {
  number: number;
  title?: string;
  state?: string;
  user: { login: string } | null;
  additions?: number;
  deletions?: number;
  requested_reviewers?: Array<{ login: string }> | null;
}

export interface MockRepository {
  pulls: MockPull[];
  /** Review author logins per PR number, or an error to fail the listing */
  reviews?: Record<number, string[] | Error>;
  /** Recent review counts per login, or an error to fail the search */
  recentReviews?: Record<string, number | Error>;
}

type PageFn = (params: unknown) => Promise<{ data: unknown }>;

/**
 * Stand-in for the Octokit client covering the endpoints the action calls.
 * `paginate` resolves a single page, like Octokit does when there is no
 * `next` link.
 */
export function createMockClient() {
  const mocks = {
    paginate: jest.fn(
      async (fn: PageFn, params: unknown) => (await fn(params)).data,
    ),
    rest: {
      pulls: {
        list: jest.fn<
          (params: {
            owner: string;
            repo: string;
          }) => Promise<{ data: Array<{ number: number }> }>
        >(),
        get: jest.fn<
          (params: { pull_number: number }) => Promise<{ data: MockPull }>
        >(),
        listReviews: jest.fn<
          (params: { pull_number: number }) => Promise<{
            data: Array<{ user: { login: string } | null }>;
          }>
        >(),
        requestReviewers: jest.fn<
          (params: {
            pull_number: number;
            reviewers: string[];
          }) => Promise<{ data: { number: number } }>
        >(),
      },
      search: {
        issuesAndPullRequests: jest.fn<
          (params: {
            q: string;
          }) => Promise<{ data: { total_count?: number } }>
        >(),
      },
    },
  };

  return { mocks, client: mocks as unknown as Client };
}

export type MockClient = ReturnType<typeof createMockClient>['mocks'];

export function mockRepository(mocks: MockClient, repository: MockRepository) {
  const { pulls, reviews = {}, recentReviews = {} } = repository;

  mocks.rest.pulls.list.mockResolvedValue({
    data: pulls.map(pull => ({ number: pull.number })),
  });

  mocks.rest.pulls.get.mockImplementation(async ({ pull_number }) => {
    const pull = pulls.find(p => p.number === pull_number);
    if (!pull) {
      throw new Error('Not Found');
    }
    return { data: pull };
  });

  mocks.rest.pulls.listReviews.mockImplementation(async ({ pull_number }) => {
    const logins = reviews[pull_number] ?? [];
    if (logins instanceof Error) {
      throw logins;
    }
    return { data: logins.map(login => ({ user: { login } })) };
  });

  mocks.rest.search.issuesAndPullRequests.mockImplementation(async ({ q }) => {
    const login = /reviewed-by:(\S*)/.exec(q)?.[1] ?? '';
    const count = recentReviews[login] ?? 0;
    if (count instanceof Error) {
      throw count;
    }
    return { data: { total_count: count } };
  });

  mocks.rest.pulls.requestReviewers.mockImplementation(
    async ({ pull_number }) => ({ data: { number: pull_number } }),
  );
}
