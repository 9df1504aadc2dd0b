import type { RepoRef } from '../core/task-selection.js';

export interface PullRequestInput {
  head: string;
  base: string;
  title: string;
  body: string;
}

export interface PullRequestRef {
  number: number;
  url: string;
}

export interface FileCommit {
  path: string;
  content: string;
  message: string;
}

/**
 * A remote code host: repositories, branches, file commits and pull requests.
 */
export interface CodeHost {
  readonly name: string;
  getDefaultBranch(repo: RepoRef): Promise<string>;
  listFiles(repo: RepoRef, ref: string): Promise<string[]>;
  /** Returns null when the path does not exist (or is not a file) at `ref`. */
  readFile(repo: RepoRef, path: string, ref: string): Promise<string | null>;
  branchExists(repo: RepoRef, branch: string): Promise<boolean>;
  createBranch(repo: RepoRef, branch: string, fromBranch: string): Promise<void>;
  commitFile(repo: RepoRef, branch: string, commit: FileCommit): Promise<void>;
  openPullRequest(repo: RepoRef, input: PullRequestInput): Promise<PullRequestRef>;
  findOpenPullRequest(repo: RepoRef, head: string): Promise<PullRequestRef | null>;
}
