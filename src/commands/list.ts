import chalk from 'chalk';

import { createServices } from '../core/services.js';
import { formatRepo, resolveRepository } from '../core/task-selection.js';
import { logger } from '../ui/logger.js';

export interface ListOptions {
  config?: string;
}

export async function listCommand(options: ListOptions): Promise<void> {
  const { config, processor } = await createServices({ configPath: options.config });

  await processor.verifyCredentials();
  const tasks = await processor.selectTasks();

  if (tasks.length === 0) {
    logger.info(
      `No tasks in ${config.jira.project} labelled "${config.jira.markerLabel}" with status "${config.jira.readyStatus}".`,
    );
    return;
  }

  logger.header(`Eligible tasks in ${config.jira.project}`);
  for (const task of tasks) {
    const repo = resolveRepository(task, config.github.repo);
    console.log(`${chalk.bold.cyan(task.key)}  ${task.summary}`);
    console.log(chalk.dim(`  Status: ${task.status}`));
    console.log(chalk.dim(`  Labels: ${task.labels.join(', ') || '(none)'}`));
    console.log(
      repo ? chalk.dim(`  Repository: ${formatRepo(repo)}`) : chalk.yellow('  Repository: not set'),
    );
  }
  console.log();
}
