import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';

import type { AppConfig } from '../core/config.js';
import { formatRepo } from '../core/task-selection.js';
import type { RepoRef } from '../core/task-selection.js';
import { logger } from '../ui/logger.js';
import { BranchExistsError, CodeHostError, errorMessage } from '../utils/errors.js';
import { getPackageInfo } from '../utils/package-info.js';
import type { CodeHost, FileCommit, PullRequestInput, PullRequestRef } from './types.js';

function hasStatus(error: unknown, status: number): boolean {
  return error instanceof RequestError && error.status === status;
}

function decodeContent(content: string, encoding: string): string {
  return encoding === 'base64' ? Buffer.from(content, 'base64').toString('utf-8') : content;
}

export class GitHubHost implements CodeHost {
  readonly name = 'github';
  private readonly octokit: Octokit;

  constructor(octokit: Octokit) {
    this.octokit = octokit;
  }

  static fromConfig(config: AppConfig): GitHubHost {
    const { version } = getPackageInfo();
    return new GitHubHost(
      new Octokit({
        auth: config.github.token,
        baseUrl: config.github.apiUrl,
        userAgent: `taskbridge/${version}`,
      }),
    );
  }

  async getDefaultBranch(repo: RepoRef): Promise<string> {
    const { data } = await this.call(`get ${formatRepo(repo)}`, () =>
      this.octokit.rest.repos.get({ owner: repo.owner, repo: repo.name }),
    );
    return data.default_branch;
  }

  async listFiles(repo: RepoRef, ref: string): Promise<string[]> {
    const { data } = await this.call(`list files of ${formatRepo(repo)}@${ref}`, () =>
      this.octokit.rest.git.getTree({
        owner: repo.owner,
        repo: repo.name,
        tree_sha: ref,
        recursive: 'true',
      }),
    );

    if (data.truncated) {
      logger.debug(`Tree of ${formatRepo(repo)}@${ref} was truncated by GitHub`);
    }

    return data.tree.flatMap((entry) => (entry.type === 'blob' && entry.path ? [entry.path] : []));
  }

  async readFile(repo: RepoRef, path: string, ref: string): Promise<string | null> {
    const file = await this.getFile(repo, path, ref);
    return file?.content ?? null;
  }

  async branchExists(repo: RepoRef, branch: string): Promise<boolean> {
    try {
      await this.octokit.rest.git.getRef({
        owner: repo.owner,
        repo: repo.name,
        ref: `heads/${branch}`,
      });
      return true;
    } catch (error) {
      if (hasStatus(error, 404)) return false;
      throw this.wrap(`look up branch ${branch}`, error);
    }
  }

  async createBranch(repo: RepoRef, branch: string, fromBranch: string): Promise<void> {
    const { data: base } = await this.call(`get branch ${fromBranch}`, () =>
      this.octokit.rest.repos.getBranch({ owner: repo.owner, repo: repo.name, branch: fromBranch }),
    );

    try {
      await this.octokit.rest.git.createRef({
        owner: repo.owner,
        repo: repo.name,
        ref: `refs/heads/${branch}`,
        sha: base.commit.sha,
      });
    } catch (error) {
      if (hasStatus(error, 422)) throw new BranchExistsError(branch);
      throw this.wrap(`create branch ${branch}`, error);
    }
  }

  async commitFile(repo: RepoRef, branch: string, commit: FileCommit): Promise<void> {
    const existing = await this.getFile(repo, commit.path, branch);

    await this.call(`commit ${commit.path}`, () =>
      this.octokit.rest.repos.createOrUpdateFileContents({
        owner: repo.owner,
        repo: repo.name,
        path: commit.path,
        branch,
        message: commit.message,
        content: Buffer.from(commit.content, 'utf-8').toString('base64'),
        ...(existing ? { sha: existing.sha } : {}),
      }),
    );
  }

  async openPullRequest(repo: RepoRef, input: PullRequestInput): Promise<PullRequestRef> {
    const { data } = await this.call(`open pull request for ${input.head}`, () =>
      this.octokit.rest.pulls.create({
        owner: repo.owner,
        repo: repo.name,
        head: input.head,
        base: input.base,
        title: input.title,
        body: input.body,
      }),
    );
    return { number: data.number, url: data.html_url };
  }

  async findOpenPullRequest(repo: RepoRef, head: string): Promise<PullRequestRef | null> {
    const { data } = await this.call(`list pull requests for ${head}`, () =>
      this.octokit.rest.pulls.list({
        owner: repo.owner,
        repo: repo.name,
        state: 'open',
        head: `${repo.owner}:${head}`,
        per_page: 1,
      }),
    );
    const pr = data[0];
    return pr ? { number: pr.number, url: pr.html_url } : null;
  }

  private async getFile(
    repo: RepoRef,
    path: string,
    ref: string,
  ): Promise<{ content: string; sha: string } | null> {
    let file: { content: string; encoding: string; sha: string };
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: repo.owner,
        repo: repo.name,
        path,
        ref,
      });
      if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
        return null;
      }
      file = data;
    } catch (error) {
      if (hasStatus(error, 404)) return null;
      throw this.wrap(`read ${path}`, error);
    }

    // Files over 1 MB come back without content; the blob API still serves them.
    if (file.encoding === 'none') {
      const { data } = await this.call(`read ${path}`, () =>
        this.octokit.rest.git.getBlob({ owner: repo.owner, repo: repo.name, file_sha: file.sha }),
      );
      file = { content: data.content, encoding: data.encoding, sha: file.sha };
    }

    return { content: decodeContent(file.content, file.encoding), sha: file.sha };
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrap(action, error);
    }
  }

  private wrap(action: string, error: unknown): CodeHostError {
    const status = error instanceof RequestError ? error.status : undefined;
    return new CodeHostError(`GitHub: failed to ${action}: ${errorMessage(error)}`, status);
  }
}
