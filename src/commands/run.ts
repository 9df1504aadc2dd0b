import chalk from 'chalk';

import { createServices } from '../core/services.js';
import type { BatchSummary, OutcomeStatus } from '../core/task-processor.js';
import type { Task } from '../trackers/types.js';
import { printBanner } from '../ui/banner.js';
import { logger } from '../ui/logger.js';
import { confirmPrompt, isInteractive } from '../ui/prompts.js';

export interface RunOptions {
  dryRun?: boolean;
  task?: string;
  limit?: number;
  force?: boolean;
  yes?: boolean;
  config?: string;
}

const STATUS_LABELS: Record<OutcomeStatus, string> = {
  opened: chalk.green('opened'),
  planned: chalk.cyan('planned'),
  skipped: chalk.yellow('skipped'),
  failed: chalk.red('failed'),
};

async function confirmTasks(tasks: Task[]): Promise<boolean> {
  logger.header(`${tasks.length} task(s) ready:`);
  for (const task of tasks) {
    console.log(`  ${chalk.cyan(task.key)}  ${task.summary}`);
  }
  console.log();
  return confirmPrompt('Move these tasks to in progress and open pull requests?', true);
}

export function printSummary(summary: BatchSummary): void {
  if (summary.outcomes.length === 0) return;

  logger.header('Summary');
  const width = Math.max(...summary.outcomes.map((o) => o.key.length));
  for (const outcome of summary.outcomes) {
    const detail = outcome.pullRequestUrl ?? outcome.reason ?? outcome.files?.join(', ') ?? '';
    console.log(`  ${outcome.key.padEnd(width)}  ${STATUS_LABELS[outcome.status]}  ${chalk.dim(detail)}`);
  }
  console.log();
  logger.dim(
    `  ${summary.opened} opened, ${summary.planned} planned, ${summary.skipped} skipped, ${summary.failed} failed`,
  );
}

export async function runCommand(options: RunOptions): Promise<BatchSummary> {
  const { config, processor } = await createServices({ configPath: options.config });
  const dryRun = options.dryRun ?? false;

  printBanner({
    jiraUrl: config.jira.url,
    email: config.jira.email,
    apiToken: config.jira.apiToken,
    project: config.jira.project,
    markerLabel: config.jira.markerLabel,
    dryRun,
  });

  const summary = await processor.processTasks({
    dryRun,
    taskKey: options.task,
    limit: options.limit,
    force: options.force,
    confirm: options.yes || !isInteractive() ? undefined : confirmTasks,
  });

  printSummary(summary);
  if (summary.failed > 0) {
    process.exitCode = 1;
  }
  return summary;
}
