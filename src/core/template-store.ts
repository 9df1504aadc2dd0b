import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { fileExists, readFileIfExists } from '../utils/fs.js';
import { packagePath } from '../utils/package-info.js';
import { renderTemplate } from '../utils/template.js';
import type { TemplateVars } from '../utils/template.js';

export const TEMPLATES_DIR = '.taskbridge/templates';

export const TEMPLATE_NAMES = ['analyze-task', 'generate-changes', 'pull-request'] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export interface TemplateEntry {
  name: TemplateName;
  description: string;
  path: string;
  customized: boolean;
}

const DESCRIPTIONS: Record<TemplateName, string> = {
  'analyze-task': 'Prompt asking the model which files a task needs to touch',
  'generate-changes': 'Prompt asking the model for exact edits and new files',
  'pull-request': 'Body of the pull request opened for a task',
};

/**
 * Templates ship in the package's templates/ directory; a copy under
 * `<cwd>/.taskbridge/templates/<name>.md` overrides the shipped one.
 */
export class TemplateStore {
  private readonly overridesDir: string;
  private readonly cache = new Map<TemplateName, string>();

  constructor(cwd: string) {
    this.overridesDir = join(cwd, TEMPLATES_DIR);
  }

  getOverridePath(name: TemplateName): string {
    return join(this.overridesDir, `${name}.md`);
  }

  getDefaultPath(name: TemplateName): string {
    return packagePath('templates', `${name}.md`);
  }

  async load(name: TemplateName): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const content =
      (await readFileIfExists(this.getOverridePath(name))) ??
      (await readFile(this.getDefaultPath(name), 'utf-8'));
    this.cache.set(name, content);
    return content;
  }

  async render(name: TemplateName, vars: TemplateVars): Promise<string> {
    return renderTemplate(await this.load(name), vars);
  }

  async isCustomized(name: TemplateName): Promise<boolean> {
    const current = await readFileIfExists(this.getOverridePath(name));
    if (current === null) return false;
    return current !== (await readFile(this.getDefaultPath(name), 'utf-8'));
  }

  async list(): Promise<TemplateEntry[]> {
    const entries: TemplateEntry[] = [];
    for (const name of TEMPLATE_NAMES) {
      const customized = await this.isCustomized(name);
      entries.push({
        name,
        description: DESCRIPTIONS[name],
        path: (await fileExists(this.getOverridePath(name)))
          ? this.getOverridePath(name)
          : this.getDefaultPath(name),
        customized,
      });
    }
    return entries;
  }

  /** Copy the shipped templates into the overrides directory, keeping existing copies. */
  async ensureOverrides(): Promise<string[]> {
    await mkdir(this.overridesDir, { recursive: true });
    const written: string[] = [];
    for (const name of TEMPLATE_NAMES) {
      const target = this.getOverridePath(name);
      if (!(await fileExists(target))) {
        await copyFile(this.getDefaultPath(name), target);
        written.push(target);
      }
    }
    this.cache.clear();
    return written;
  }
}
