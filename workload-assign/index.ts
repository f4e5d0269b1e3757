import * as core from '@actions/core';
import * as github from '@actions/github';
import { mkLog } from '../lib/mkLog';
import { assignReviewer } from './assignReviewer';
import { getConfig } from './getConfig';

async function main() {
  core.info('Parsing configuration...');
  const { token, ...config } = getConfig();
  core.setSecret(token);

  core.startGroup('Configuration');
  core.info(`Repository: ${config.owner}/${config.repo}`);
  core.info(`PR Number: ${config.prNumber}`);
  core.info(`Team Members: [${config.teamMembers.join(', ')}]`);
  core.info(`Weight per open PR: ${config.weights.openPrs}`);
  core.info(`Weight per 100 lines: ${config.weights.linesPer100}`);
  core.info(`Weight per recent review: ${config.weights.recentReviews}`);
  core.endGroup();

  const client = github.getOctokit(token);

  const winner = await assignReviewer(client, config, mkLog('workload-assign'));
  core.setOutput('reviewer', winner?.username ?? '');
}

main().catch(error => {
  core.error(error.stack);
  core.setFailed(String(error));
  process.exit(1);
});
