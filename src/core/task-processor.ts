import type { CodeHost } from '../hosts/types.js';
import type { Task, TaskTracker } from '../trackers/types.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { LLMResponseError, UserCancelledError, errorMessage } from '../utils/errors.js';
import type { AIService, CodeChangePlan, TaskAnalysis } from './ai-service.js';
import { buildCodebaseContext } from './codebase-context.js';
import type { CodebaseContext } from './codebase-context.js';
import type { AppConfig } from './config.js';
import { buildFileChanges } from './edit-applier.js';
import type { FileChange } from './edit-applier.js';
import {
  buildCommitMessage,
  buildPullRequestBody,
  buildPullRequestTitle,
  createBranchName,
} from './pull-request.js';
import {
  buildTaskQuery,
  formatRepo,
  isEligible,
  resolveRepository,
} from './task-selection.js';
import type { RepoRef } from './task-selection.js';
import type { TemplateStore } from './template-store.js';

export type OutcomeStatus = 'opened' | 'planned' | 'skipped' | 'failed';

export interface TaskOutcome {
  key: string;
  status: OutcomeStatus;
  reason?: string;
  pullRequestUrl?: string;
  branch?: string;
  files?: string[];
}

export interface BatchSummary {
  outcomes: TaskOutcome[];
  opened: number;
  planned: number;
  skipped: number;
  failed: number;
}

export interface ProcessOptions {
  dryRun?: boolean;
  /** Process only this task. */
  taskKey?: string;
  limit?: number;
  /** Process `taskKey` even when its labels or status make it ineligible. */
  force?: boolean;
  /** Asked once before anything is written; returning false cancels the run. */
  confirm?: (tasks: Task[]) => Promise<boolean>;
}

export interface TaskProcessorDeps {
  tracker: TaskTracker;
  host: CodeHost;
  ai: AIService;
  templates: TemplateStore;
  config: AppConfig;
}

export interface TaskDraft {
  repo: RepoRef;
  baseBranch: string;
  branch: string;
  context: CodebaseContext;
  analysis: TaskAnalysis;
  plan: CodeChangePlan;
  changes: FileChange[];
}

export function summarize(outcomes: TaskOutcome[]): BatchSummary {
  const count = (status: OutcomeStatus) => outcomes.filter((o) => o.status === status).length;
  return {
    outcomes,
    opened: count('opened'),
    planned: count('planned'),
    skipped: count('skipped'),
    failed: count('failed'),
  };
}

/**
 * One pass over the eligible tasks: each is analyzed, drafted, committed to
 * its own branch and opened as a pull request. Tasks run one after another;
 * a failure marks only that task.
 */
export class TaskProcessor {
  private readonly tracker: TaskTracker;
  private readonly host: CodeHost;
  private readonly ai: AIService;
  private readonly templates: TemplateStore;
  private readonly config: AppConfig;

  constructor(deps: TaskProcessorDeps) {
    this.tracker = deps.tracker;
    this.host = deps.host;
    this.ai = deps.ai;
    this.templates = deps.templates;
    this.config = deps.config;
  }

  async verifyCredentials(): Promise<string> {
    return withSpinner(
      `Connecting to ${this.tracker.name}...`,
      () => this.tracker.getCurrentUser(),
      (user) => `Authenticated as ${user}`,
    );
  }

  /** Eligible tasks in search order, or the single `taskKey` task. */
  async selectTasks(options: Pick<ProcessOptions, 'taskKey' | 'limit' | 'force'> = {}): Promise<Task[]> {
    const { jira } = this.config;

    if (options.taskKey) {
      const task = await this.tracker.getTask(options.taskKey);
      if (!options.force && !isEligible(task, jira)) {
        logger.warn(
          `${task.key} is not eligible (status "${task.status}"; needs label "${jira.markerLabel}" ` +
            `and status "${jira.readyStatus}"). Use --force to process it anyway.`,
        );
        return [];
      }
      return [task];
    }

    const query = buildTaskQuery(jira);
    logger.debug(`JQL: ${query}`);
    const found = await withSpinner(
      'Searching for tasks...',
      () => this.tracker.searchTasks(query, jira.maxResults),
      (tasks) => `Found ${tasks.length} task(s)`,
    );

    const eligible = found.filter((task) => isEligible(task, jira));
    return options.limit !== undefined ? eligible.slice(0, options.limit) : eligible;
  }

  async processTasks(options: ProcessOptions = {}): Promise<BatchSummary> {
    await this.verifyCredentials();

    const tasks = await this.selectTasks(options);
    if (tasks.length === 0) {
      logger.info('No eligible tasks found.');
      return summarize([]);
    }

    if (!options.dryRun && options.confirm && !(await options.confirm(tasks))) {
      throw new UserCancelledError();
    }

    const outcomes: TaskOutcome[] = [];
    for (const task of tasks) {
      outcomes.push(await this.processTask(task, options.dryRun ?? false));
    }
    return summarize(outcomes);
  }

  async processTask(task: Task, dryRun = false): Promise<TaskOutcome> {
    logger.task(task.key, task.summary);

    const repo = resolveRepository(task, this.config.github.repo);
    if (!repo) {
      return this.skip(task, 'no repository label (repo:owner/name) and no GITHUB_REPO default');
    }

    const branch = createBranchName(task);

    // Nothing has been written yet: failures here leave the task untouched.
    try {
      if (await this.host.branchExists(repo, branch)) {
        const existing = await this.host.findOpenPullRequest(repo, branch);
        return this.skip(
          task,
          existing ? `already has pull request ${existing.url}` : `branch ${branch} already exists`,
          branch,
        );
      }

      if (dryRun) {
        return this.plan(task, await this.draftChanges(task, repo));
      }

      await this.tracker.transitionTask(task.key, this.config.jira.inProgressStatus);
      logger.dim(`  Moved ${task.key} to "${this.config.jira.inProgressStatus}"`);
    } catch (error) {
      return this.fail(task, error, branch);
    }

    try {
      const draft = await this.draftChanges(task, repo);
      return await this.publish(task, draft);
    } catch (error) {
      await this.reportFailure(task, error);
      return this.fail(task, error, branch);
    }
  }

  /** Read the repository, ask the model, and resolve its plan into file contents. */
  async draftChanges(task: Task, repo: RepoRef): Promise<TaskDraft> {
    const baseBranch = this.config.github.baseBranch ?? (await this.host.getDefaultBranch(repo));
    const readFile = (path: string) => this.host.readFile(repo, path, baseBranch);

    const context = await withSpinner(
      `Reading ${formatRepo(repo)}@${baseBranch}...`,
      () => buildCodebaseContext(this.host, repo, baseBranch, this.config.context),
      (ctx) =>
        `Read ${Object.keys(ctx.sourceFiles).length} source file(s) from a ${ctx.projectType} project`,
    );

    const analysis = await withSpinner(`Analyzing ${task.key} with ${this.ai.modelName}...`, () =>
      this.ai.analyzeTask(task, context, { repository: formatRepo(repo), baseBranch }),
    );

    const plan = await withSpinner('Generating code changes...', () =>
      this.ai.generateCodeChanges(task, analysis, context, readFile),
    );

    const changes = await buildFileChanges(plan, readFile);
    if (changes.length === 0) {
      throw new LLMResponseError('The model proposed no file changes', JSON.stringify(plan));
    }

    return { repo, baseBranch, branch: createBranchName(task), context, analysis, plan, changes };
  }

  private async publish(task: Task, draft: TaskDraft): Promise<TaskOutcome> {
    const { repo, baseBranch, branch, changes } = draft;

    await this.host.createBranch(repo, branch, baseBranch);
    for (const change of changes) {
      await this.host.commitFile(repo, branch, {
        path: change.path,
        content: change.content,
        message: buildCommitMessage(task.key, change, draft.plan.commit_message),
      });
      this.logChange(change);
    }

    const body = await buildPullRequestBody(this.templates, {
      task,
      explanation: draft.analysis.explanation,
      changes,
      model: this.ai.modelName,
    });
    const pr = await this.host.openPullRequest(repo, {
      head: branch,
      base: baseBranch,
      title: buildPullRequestTitle(task),
      body,
    });
    logger.success(`${task.key}: opened ${pr.url}`);

    try {
      await this.tracker.addComment(task.key, `Pull request created: ${pr.url}`);
    } catch (error) {
      logger.warn(`${task.key}: could not comment on the task: ${errorMessage(error)}`);
    }

    return {
      key: task.key,
      status: 'opened',
      pullRequestUrl: pr.url,
      branch,
      files: changes.map((c) => c.path),
    };
  }

  private async reportFailure(task: Task, error: unknown): Promise<void> {
    try {
      await this.tracker.addComment(
        task.key,
        `taskbridge could not open a pull request for this task: ${errorMessage(error)}`,
      );
    } catch (commentError) {
      logger.warn(`${task.key}: could not comment on the task: ${errorMessage(commentError)}`);
    }
  }

  private plan(task: Task, draft: TaskDraft): TaskOutcome {
    logger.dim(`  Branch: ${draft.branch} (from ${draft.baseBranch})`);
    logger.dim(`  Title:  ${buildPullRequestTitle(task)}`);
    draft.changes.forEach((change) => this.logChange(change));
    return {
      key: task.key,
      status: 'planned',
      branch: draft.branch,
      files: draft.changes.map((c) => c.path),
    };
  }

  private logChange(change: FileChange): void {
    if (change.operation === 'create') {
      logger.fileCreated(change.path);
    } else {
      logger.fileModified(change.path);
    }
  }

  private skip(task: Task, reason: string, branch?: string): TaskOutcome {
    logger.warn(`${task.key}: skipped, ${reason}`);
    return { key: task.key, status: 'skipped', reason, branch };
  }

  private fail(task: Task, error: unknown, branch: string): TaskOutcome {
    const reason = errorMessage(error);
    logger.error(`${task.key}: ${reason}`);
    if (error instanceof LLMResponseError) {
      logger.debug(`Model answer for ${task.key}:\n${error.raw}`);
    }
    return { key: task.key, status: 'failed', reason, branch };
  }
}
