import type { Task } from '../trackers/types.js';
import type { FileChange } from './edit-applier.js';
import type { TemplateStore } from './template-store.js';

const BRANCH_SUFFIX_LENGTH = 30;

/**
 * `<KEY>-<slug>`, where the slug is the summary lowercased, reduced to
 * `[a-z0-9-]` and cut to thirty characters.
 */
export function createBranchName(task: Pick<Task, 'key' | 'summary'>): string {
  const slug = task.summary
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .slice(0, BRANCH_SUFFIX_LENGTH)
    .replace(/-+$/, '');

  return slug ? `${task.key}-${slug}` : task.key;
}

export function buildPullRequestTitle(task: Pick<Task, 'key' | 'summary'>): string {
  return `Task ${task.key}: ${task.summary}`;
}

export function buildCommitMessage(key: string, change: FileChange, planMessage?: string): string {
  const message = planMessage?.trim();
  if (message) return `Task ${key}: ${message}`;
  const verb = change.operation === 'create' ? 'Add' : 'Update';
  return `Task ${key}: ${verb} ${change.path}`;
}

export function describeChange(change: FileChange): string {
  return `\`${change.path}\` (${change.operation === 'create' ? 'created' : 'modified'})`;
}

export interface PullRequestBodyInput {
  task: Task;
  explanation: string;
  changes: FileChange[];
  model: string;
}

export async function buildPullRequestBody(
  templates: TemplateStore,
  { task, explanation, changes, model }: PullRequestBodyInput,
): Promise<string> {
  return templates.render('pull-request', {
    key: task.key,
    summary: task.summary,
    status: task.status,
    labels: task.labels.join(', '),
    description: task.description.trim(),
    explanation: explanation.trim(),
    files: changes.map(describeChange),
    model,
  });
}
