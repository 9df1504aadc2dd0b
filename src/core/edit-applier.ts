import { EditConflictError } from '../utils/errors.js';
import type { CodeChangePlan, CodeEdit } from './ai-service.js';

export type FileOperation = 'create' | 'modify';

export interface FileChange {
  path: string;
  content: string;
  operation: FileOperation;
}

type ReadFile = (path: string) => Promise<string | null>;

/**
 * Repository-relative POSIX path. Absolute-looking prefixes are dropped;
 * `..` segments and paths into .git are rejected.
 */
export function normalizePath(path: string): string {
  const segments = path
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');

  if (segments.length === 0) {
    throw new EditConflictError(path, 'empty path');
  }
  if (segments.includes('..')) {
    throw new EditConflictError(path, 'path escapes the repository');
  }
  if (segments[0] === '.git') {
    throw new EditConflictError(path, 'refusing to write inside .git');
  }
  return segments.join('/');
}

function applyEdit(path: string, content: string, edit: CodeEdit, index: number): string {
  const { context, old_code: oldCode, new_code: newCode } = edit;

  let anchor = 0;
  if (context) {
    anchor = content.indexOf(context);
    if (anchor === -1) {
      if (!oldCode || !content.includes(oldCode)) {
        throw new EditConflictError(path, 'context not found in file', index);
      }
      // The model paraphrased the context; fall back to old_code alone.
      anchor = 0;
    } else if (!oldCode) {
      const insertAt = anchor + context.length;
      return content.slice(0, insertAt) + newCode + content.slice(insertAt);
    }
  }

  if (!oldCode) {
    const separator = content === '' || content.endsWith('\n') ? '' : '\n';
    return content + separator + newCode;
  }

  const position = content.indexOf(oldCode, anchor);
  if (position === -1) {
    throw new EditConflictError(path, 'old_code not found in file', index);
  }
  return content.slice(0, position) + newCode + content.slice(position + oldCode.length);
}

/**
 * Apply `edits` in order. Each edit replaces the first occurrence of
 * `old_code` at or after the first occurrence of `context`.
 */
export function applyEdits(path: string, original: string, edits: CodeEdit[]): string {
  return edits.reduce((content, edit, index) => applyEdit(path, content, edit, index), original);
}

/**
 * Tracks the pending content of every touched path, so that several entries
 * for one path build on each other.
 */
export class ChangeSet {
  private readonly files = new Map<string, FileChange>();

  get(path: string): FileChange | undefined {
    return this.files.get(path);
  }

  write(path: string, content: string, operation: FileOperation): void {
    const previous = this.files.get(path);
    // A file created earlier in the plan stays a creation.
    this.files.set(path, { path, content, operation: previous?.operation ?? operation });
  }

  getChanges(): FileChange[] {
    return [...this.files.values()];
  }
}

/**
 * Resolve a plan into final file contents against the repository's current
 * files. New files are applied before modifications.
 */
export async function buildFileChanges(plan: CodeChangePlan, readFile: ReadFile): Promise<FileChange[]> {
  const changes = new ChangeSet();

  for (const file of plan.files_to_create) {
    const path = normalizePath(file.path);
    const existing = changes.get(path) ? null : await readFile(path);
    changes.write(path, file.content, existing === null ? 'create' : 'modify');
  }

  for (const file of plan.files_to_modify) {
    const path = normalizePath(file.path);
    const pending = changes.get(path);
    const current = pending ? pending.content : await readFile(path);
    const updated = applyEdits(path, current ?? '', file.changes);
    changes.write(path, updated, current === null ? 'create' : 'modify');
  }

  return changes.getChanges();
}
