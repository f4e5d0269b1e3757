import * as core from '@actions/core';
import * as github from '@actions/github';
import { Config } from './types';

type EventContext = Pick<typeof github.context, 'payload'>;

export function getConfig(
  context: EventContext = github.context,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const token = core.getInput('github-token', { required: true });
  const teamMembers = parseTeamMembers(
    core.getInput('team-members', { required: true }),
  );

  const weights = {
    openPrs: parseWeight('weight-open-prs', 10),
    linesPer100: parseWeight('weight-lines-per-100', 1),
    recentReviews: parseWeight('weight-recent-reviews', 3),
  };

  const owner = env.GITHUB_REPOSITORY_OWNER;
  if (!owner) {
    throw new Error('Missing GITHUB_REPOSITORY_OWNER');
  }
  const repository = env.GITHUB_REPOSITORY;
  if (!repository) {
    throw new Error('Missing GITHUB_REPOSITORY');
  }
  const repo = repository.split('/')[1];
  if (!repo) {
    throw new Error(`Invalid GITHUB_REPOSITORY format: ${repository}`);
  }

  return {
    token,
    teamMembers,
    weights,
    owner,
    repo,
    prNumber: parsePrNumber(context),
  };
}

// Empty segments are kept as-is, so "a,,b" yields a member named ""
function parseTeamMembers(value: string): string[] {
  return value.split(',').map(member => member.trim());
}

function parseWeight(name: string, fallback: number): number {
  const raw = core.getInput(name, { required: false });
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  if (value < 0) {
    throw new Error(`Invalid ${name}: must not be negative, got ${raw}`);
  }
  return value;
}

function parsePrNumber(context: EventContext): number {
  const number: unknown = context.payload.pull_request?.number;
  if (typeof number !== 'number' || !Number.isInteger(number) || number < 1) {
    throw new Error(
      'Could not extract PR number from event (pull_request.number)',
    );
  }
  return number;
}
