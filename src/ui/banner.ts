import chalk from 'chalk';

import { redactSecret } from '../core/config.js';
import { getPackageInfo } from '../utils/package-info.js';

const ACCENT = '#2F81F7';

export interface BannerDetails {
  jiraUrl: string;
  email: string;
  apiToken: string;
  project: string;
  markerLabel: string;
  dryRun: boolean;
}

export function printBanner(details: BannerDetails): void {
  const { version } = getPackageInfo();
  const hr = chalk.dim('─'.repeat(58));

  console.log();
  console.log(hr);
  console.log(`  ${chalk.bold.hex(ACCENT)('taskbridge')}  ${chalk.dim(`v${version}`)}`);
  console.log(`  ${chalk.dim('Jira:')}    ${details.jiraUrl}`);
  console.log(`  ${chalk.dim('Auth:')}    ${details.email}, API token ${redactSecret(details.apiToken)}`);
  console.log(`  ${chalk.dim('Project:')} ${details.project}`);
  console.log(`  ${chalk.dim('Label:')}   ${details.markerLabel}`);
  if (details.dryRun) {
    console.log(`  ${chalk.yellow('Dry run: nothing will be written')}`);
  }
  console.log(hr);
  console.log();
}
