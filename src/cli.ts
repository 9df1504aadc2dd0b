import { Command, InvalidArgumentError } from 'commander';

import { getPackageInfo } from './utils/package-info.js';

const pkg = getPackageInfo();

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

interface RunFlags {
  dryRun?: boolean;
  task?: string;
  limit?: number;
  force?: boolean;
  yes?: boolean;
  config?: string;
}

export const program = new Command().name('taskbridge').description(pkg.description).version(pkg.version);

program
  .command('run', { isDefault: true })
  .description('Open pull requests for the eligible Jira tasks')
  .option('--dry-run', 'Draft the changes and print them without writing anything')
  .option('-t, --task <key>', 'Process a single task')
  .option('-l, --limit <n>', 'Process at most n tasks', parsePositiveInt)
  .option('--force', 'Process --task even when it is not labelled or ready')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('-c, --config <path>', 'Path to taskbridge.yaml')
  .action(async (options: RunFlags) => {
    const { runCommand } = await import('./commands/run.js');
    await runCommand(options);
  });

program
  .command('list')
  .description('List the tasks a run would pick up')
  .option('-c, --config <path>', 'Path to taskbridge.yaml')
  .action(async (options: { config?: string }) => {
    const { listCommand } = await import('./commands/list.js');
    await listCommand(options);
  });

program
  .command('analyze')
  .description('Draft the changes for one task and print them, writing nothing')
  .argument('<key>', 'Jira task key, e.g. PROJ-12')
  .option('-c, --config <path>', 'Path to taskbridge.yaml')
  .action(async (key: string, options: { config?: string }) => {
    const { analyzeCommand } = await import('./commands/analyze.js');
    await analyzeCommand(key, options);
  });

const templates = program
  .command('templates')
  .description('List the prompt and pull request templates')
  .action(async () => {
    const { listTemplatesCommand } = await import('./commands/templates.js');
    await listTemplatesCommand();
  });

templates
  .command('init')
  .description('Copy the templates into .taskbridge/templates for editing')
  .action(async () => {
    const { initTemplatesCommand } = await import('./commands/templates.js');
    await initTemplatesCommand();
  });
