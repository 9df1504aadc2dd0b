import { createServices } from '../core/services.js';
import { formatRepo, resolveRepository } from '../core/task-selection.js';
import { logger } from '../ui/logger.js';

export interface AnalyzeOptions {
  config?: string;
}

/** Draft the changes for one task and print them. Nothing is written anywhere. */
export async function analyzeCommand(key: string, options: AnalyzeOptions): Promise<void> {
  const { config, processor, tracker } = await createServices({ configPath: options.config });

  const task = await tracker.getTask(key);
  const repo = resolveRepository(task, config.github.repo);
  if (!repo) {
    throw new Error(`${task.key} has no repo:owner/name label and GITHUB_REPO is not set`);
  }

  logger.task(task.key, task.summary);
  logger.dim(`  Repository: ${formatRepo(repo)}`);

  const draft = await processor.draftChanges(task, repo);

  logger.header('Analysis');
  console.log(JSON.stringify(draft.analysis, null, 2));

  logger.header('Code changes');
  console.log(JSON.stringify(draft.plan, null, 2));

  logger.header(`Files (branch ${draft.branch})`);
  for (const change of draft.changes) {
    if (change.operation === 'create') {
      logger.fileCreated(change.path);
    } else {
      logger.fileModified(change.path);
    }
  }
  console.log();
}
