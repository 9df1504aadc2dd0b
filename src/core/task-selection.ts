import type { Task } from '../trackers/types.js';

export interface RepoRef {
  owner: string;
  name: string;
}

export interface SelectionSettings {
  project: string;
  markerLabel: string;
  readyStatus: string;
}

// repo:owner/name or repo-owner:owner/name
const REPO_LABEL_PATTERN = /^repo(?:-owner)?:([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/i;
const REPO_SLUG_PATTERN = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/;

export function parseRepoLabel(label: string): RepoRef | null {
  const match = label.trim().match(REPO_LABEL_PATTERN);
  if (!match) return null;
  return { owner: match[1], name: match[2] };
}

export function parseRepoSlug(slug: string): RepoRef | null {
  const match = slug.trim().match(REPO_SLUG_PATTERN);
  if (!match) return null;
  return { owner: match[1], name: match[2] };
}

export function formatRepo(repo: RepoRef): string {
  return `${repo.owner}/${repo.name}`;
}

/**
 * The first repository label on the task wins; `fallback` (an owner/name slug)
 * is used when the task names none.
 */
export function resolveRepository(task: Task, fallback: string | null): RepoRef | null {
  for (const label of task.labels) {
    const repo = parseRepoLabel(label);
    if (repo) return repo;
  }
  return fallback ? parseRepoSlug(fallback) : null;
}

function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function buildTaskQuery(settings: SelectionSettings): string {
  return [
    `project = ${quoteJql(settings.project)}`,
    `labels = ${quoteJql(settings.markerLabel)}`,
    `status = ${quoteJql(settings.readyStatus)}`,
  ]
    .join(' AND ')
    .concat(' ORDER BY created DESC');
}

export function isEligible(task: Task, settings: Omit<SelectionSettings, 'project'>): boolean {
  const hasMarker = task.labels.some((l) => l.toLowerCase() === settings.markerLabel.toLowerCase());
  const isReady = task.status.toLowerCase() === settings.readyStatus.toLowerCase();
  return hasMarker && isReady;
}
