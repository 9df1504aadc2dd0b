import { readFileSync } from 'node:fs';

import { minimatch } from 'minimatch';
import { z } from 'zod';

import type { CodeHost } from '../hosts/types.js';
import { packagePath } from '../utils/package-info.js';
import type { RepoRef } from './task-selection.js';

export const PROJECT_TYPES = ['react', 'angular', 'nodejs', 'python', 'java', 'unknown'] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

const filePatternsSchema = z.object({
  sourceFiles: z.array(z.string()),
  configFiles: z.array(z.string()),
  keyFiles: z.array(z.string()),
});

export type FilePatterns = z.infer<typeof filePatternsSchema>;

const patternTableSchema = z.object({
  react: filePatternsSchema,
  angular: filePatternsSchema,
  nodejs: filePatternsSchema,
  python: filePatternsSchema,
  java: filePatternsSchema,
  unknown: filePatternsSchema,
});

export interface ContextLimits {
  maxFiles: number;
  maxBytes: number;
}

export interface CodebaseContext {
  projectType: ProjectType;
  patterns: FilePatterns;
  /** Matched source paths, indented four spaces per directory level. */
  structure: string;
  keyFiles: Record<string, string>;
  sourceFiles: Record<string, string>;
  /** Files that matched but did not fit in the limits. */
  omitted: number;
}

type ReadFile = (path: string) => Promise<string | null>;

let patternTable: z.infer<typeof patternTableSchema> | undefined;

export function getFilePatterns(projectType: ProjectType): FilePatterns {
  if (!patternTable) {
    const raw = readFileSync(packagePath('data', 'file-patterns.json'), 'utf-8');
    patternTable = patternTableSchema.parse(JSON.parse(raw));
  }
  return patternTable[projectType];
}

const packageJsonSchema = z.object({
  dependencies: z.record(z.string(), z.unknown()).optional(),
});

// An unparseable package.json still means a Node project.
function parsePackageJson(raw: string): z.infer<typeof packageJsonSchema> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = packageJsonSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

export async function detectProjectType(files: string[], readFile: ReadFile): Promise<ProjectType> {
  const present = new Set(files);

  if (present.has('package.json')) {
    const raw = await readFile('package.json');
    const pkg = raw ? parsePackageJson(raw) : undefined;
    if (pkg) {
      const deps = pkg.dependencies ?? {};
      if (deps.react) return 'react';
      if (deps.angular || deps['@angular/core']) return 'angular';
    }
    return 'nodejs';
  }

  if (present.has('requirements.txt') || present.has('pyproject.toml') || present.has('setup.py')) {
    return 'python';
  }

  if (present.has('pom.xml') || present.has('build.gradle') || present.has('build.gradle.kts')) {
    return 'java';
  }

  return 'unknown';
}

// Dotfiles (.env and friends) never match, so they never reach a prompt.
export function matchFiles(files: string[], patterns: string[]): string[] {
  return files.filter((file) => patterns.some((pattern) => minimatch(file, pattern)));
}

export function formatStructure(paths: string[]): string {
  return paths
    .map((path) => {
      const depth = path.split('/').length - 1;
      return `${' '.repeat(4 * depth)}${path}`;
    })
    .join('\n');
}

/**
 * Snapshot of the target repository for prompting: project type, layout and
 * the contents of key and source files within `limits`. Key and config files
 * are read first, then source files in path order.
 */
export async function buildCodebaseContext(
  host: CodeHost,
  repo: RepoRef,
  ref: string,
  limits: ContextLimits,
): Promise<CodebaseContext> {
  const files = [...(await host.listFiles(repo, ref))].sort();
  const readFile: ReadFile = (path) => host.readFile(repo, path, ref);

  const projectType = await detectProjectType(files, readFile);
  const patterns = getFilePatterns(projectType);

  const sourcePaths = matchFiles(files, patterns.sourceFiles);
  const keyPaths = matchFiles(files, [...patterns.keyFiles, ...patterns.configFiles]);

  const contents = new Map<string, string>();
  let usedBytes = 0;
  let omitted = 0;

  for (const path of new Set([...keyPaths, ...sourcePaths])) {
    if (contents.size >= limits.maxFiles) {
      omitted++;
      continue;
    }
    const content = await readFile(path);
    if (content === null) continue;

    const size = Buffer.byteLength(content, 'utf-8');
    if (usedBytes + size > limits.maxBytes) {
      omitted++;
      continue;
    }
    usedBytes += size;
    contents.set(path, content);
  }

  const pickContents = (paths: string[]): Record<string, string> => {
    const picked: Record<string, string> = {};
    for (const path of paths) {
      const content = contents.get(path);
      if (content !== undefined) picked[path] = content;
    }
    return picked;
  };

  return {
    projectType,
    patterns,
    structure: formatStructure(sourcePaths),
    keyFiles: pickContents(keyPaths),
    sourceFiles: pickContents(sourcePaths),
    omitted,
  };
}
