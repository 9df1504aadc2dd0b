import type { z } from 'zod';

import type { AppConfig } from '../../../src/core/config.js';
import type { RepoRef } from '../../../src/core/task-selection.js';
import type {
  CodeHost,
  FileCommit,
  PullRequestInput,
  PullRequestRef,
} from '../../../src/hosts/types.js';
import type { CompletionOptions, LLMClient } from '../../../src/llm/types.js';
import { cleanResponse } from '../../../src/llm/types.js';
import type { Task, TaskTracker } from '../../../src/trackers/types.js';
import { BranchExistsError, LLMResponseError, TrackerError, errorMessage } from '../../../src/utils/errors.js';

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    jira: {
      url: 'https://example.atlassian.net',
      email: 'bot@example.com',
      apiToken: 'test-token',
      project: 'AIAGENTPOC',
      markerLabel: 'ai-task',
      readyStatus: 'To Do',
      inProgressStatus: 'In Progress',
      maxResults: 50,
    },
    github: { token: 'test-token', repo: null, baseBranch: null, apiUrl: 'https://api.github.com' },
    gemini: { apiKey: 'test-key', model: 'gemini-1.5-pro', apiUrl: 'https://gemini.test' },
    timeoutMs: 1_000,
    context: { maxFiles: 40, maxBytes: 200_000 },
    ...overrides,
  };
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    key: 'DEMO-1',
    summary: 'Add a health endpoint',
    description: 'Expose GET /health returning ok.',
    status: 'To Do',
    labels: ['ai-task', 'repo:acme/api'],
    ...overrides,
  };
}

export class FakeTracker implements TaskTracker {
  readonly name = 'Jira';
  readonly tasks = new Map<string, Task>();
  readonly queries: string[] = [];
  readonly transitions: { key: string; status: string }[] = [];
  readonly comments: { key: string; body: string }[] = [];
  transitionError: Error | null = null;
  commentError: Error | null = null;

  constructor(tasks: Task[] = []) {
    for (const task of tasks) this.tasks.set(task.key, task);
  }

  async getCurrentUser(): Promise<string> {
    return 'Test User';
  }

  async searchTasks(query: string, maxResults: number): Promise<Task[]> {
    this.queries.push(query);
    return [...this.tasks.values()].slice(0, maxResults);
  }

  async getTask(key: string): Promise<Task> {
    const task = this.tasks.get(key);
    if (!task) throw new TrackerError(`Issue ${key} does not exist`, 404);
    return task;
  }

  async transitionTask(key: string, statusName: string): Promise<void> {
    if (this.transitionError) throw this.transitionError;
    this.transitions.push({ key, status: statusName });
  }

  async addComment(key: string, body: string): Promise<void> {
    if (this.commentError) throw this.commentError;
    this.comments.push({ key, body });
  }
}

export class FakeHost implements CodeHost {
  readonly name = 'GitHub';
  readonly files = new Map<string, string>();
  readonly branches = new Set<string>(['main']);
  readonly commits: { branch: string; commit: FileCommit }[] = [];
  readonly pullRequests: (PullRequestRef & { input: PullRequestInput })[] = [];
  readonly createdBranches: { branch: string; from: string }[] = [];

  constructor(files: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(files)) this.files.set(path, content);
  }

  async getDefaultBranch(): Promise<string> {
    return 'main';
  }

  async listFiles(): Promise<string[]> {
    return [...this.files.keys()];
  }

  async readFile(_repo: RepoRef, path: string): Promise<string | null> {
    return this.files.get(path) ?? null;
  }

  async branchExists(_repo: RepoRef, branch: string): Promise<boolean> {
    return this.branches.has(branch);
  }

  async createBranch(_repo: RepoRef, branch: string, fromBranch: string): Promise<void> {
    if (this.branches.has(branch)) throw new BranchExistsError(branch);
    this.branches.add(branch);
    this.createdBranches.push({ branch, from: fromBranch });
  }

  async commitFile(_repo: RepoRef, branch: string, commit: FileCommit): Promise<void> {
    this.commits.push({ branch, commit });
  }

  async openPullRequest(repo: RepoRef, input: PullRequestInput): Promise<PullRequestRef> {
    const number = this.pullRequests.length + 1;
    const pr = { number, url: `https://github.com/${repo.owner}/${repo.name}/pull/${number}`, input };
    this.pullRequests.push(pr);
    return { number: pr.number, url: pr.url };
  }

  async findOpenPullRequest(_repo: RepoRef, head: string): Promise<PullRequestRef | null> {
    const pr = this.pullRequests.find((p) => p.input.head === head);
    return pr ? { number: pr.number, url: pr.url } : null;
  }
}

/** Answers prompts from a queue of canned responses, in order. */
export class FakeLLM implements LLMClient {
  readonly provider = 'fake';
  readonly model = 'test-model';
  readonly prompts: string[] = [];
  private readonly responses: string[];

  constructor(responses: (string | object)[] = []) {
    this.responses = responses.map((r) => (typeof r === 'string' ? r : JSON.stringify(r)));
  }

  async complete(prompt: string, _options?: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    const next = this.responses.shift();
    if (next === undefined) throw new Error('FakeLLM has no response left');
    return next;
  }

  async completeJson<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const text = await this.complete(prompt, { json: true });
    try {
      return schema.parse(JSON.parse(cleanResponse(text)));
    } catch (error) {
      throw new LLMResponseError(errorMessage(error), text);
    }
  }
}
