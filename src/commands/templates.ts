import { relative } from 'node:path';

import chalk from 'chalk';

import { TemplateStore } from '../core/template-store.js';
import { logger } from '../ui/logger.js';

export async function listTemplatesCommand(cwd = process.cwd()): Promise<void> {
  const store = new TemplateStore(cwd);

  logger.header('Templates');
  for (const entry of await store.list()) {
    const marker = entry.customized ? chalk.yellow(' (customized)') : '';
    console.log(`  ${chalk.cyan(entry.name)}${marker}`);
    console.log(chalk.dim(`    ${entry.description}`));
    console.log(chalk.dim(`    ${entry.path}`));
  }
  console.log();
}

export async function initTemplatesCommand(cwd = process.cwd()): Promise<void> {
  const store = new TemplateStore(cwd);
  const written = await store.ensureOverrides();

  if (written.length === 0) {
    logger.info('All templates already have local copies.');
    return;
  }
  for (const path of written) {
    logger.success(`Created ${relative(cwd, path)}`);
  }
  logger.dim('Edit these files to change the prompts and pull request body.');
}
