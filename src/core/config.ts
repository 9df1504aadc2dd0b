import { join, resolve } from 'node:path';

import { parse as parseDotenv } from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { fileExists, readFileIfExists } from '../utils/fs.js';
import { ConfigError } from '../utils/errors.js';

export const CONFIG_FILENAME = 'taskbridge.yaml';

const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const DEFAULTS = {
  jiraProject: 'AIAGENTPOC',
  markerLabel: 'ai-task',
  readyStatus: 'To Do',
  inProgressStatus: 'In Progress',
  maxResults: 50,
  githubApiUrl: 'https://api.github.com',
  geminiModel: 'gemini-1.5-pro',
  geminiApiUrl: 'https://generativelanguage.googleapis.com/v1beta',
  timeoutMs: 60_000,
  maxContextFiles: 40,
  maxContextBytes: 200_000,
} as const;

// Non-secret settings only: credentials come from the environment.
const fileSchema = z
  .object({
    jira: z
      .object({
        url: z.string(),
        project: z.string(),
        markerLabel: z.string(),
        readyStatus: z.string(),
        inProgressStatus: z.string(),
        maxResults: z.number().int(),
      })
      .partial()
      .strict()
      .optional(),
    github: z
      .object({
        repo: z.string(),
        baseBranch: z.string(),
        apiUrl: z.string(),
      })
      .partial()
      .strict()
      .optional(),
    gemini: z
      .object({
        model: z.string(),
        apiUrl: z.string(),
      })
      .partial()
      .strict()
      .optional(),
    timeoutMs: z.number().int().optional(),
    context: z
      .object({
        maxFiles: z.number().int(),
        maxBytes: z.number().int(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

type FileConfig = z.infer<typeof fileSchema>;

const trimSlash = (url: string) => url.replace(/\/+$/, '');

const appConfigSchema = z.object({
  jira: z.object({
    url: z.string().url().transform(trimSlash),
    email: z.string().min(1),
    apiToken: z.string().min(1),
    project: z.string().min(1),
    markerLabel: z.string().min(1),
    readyStatus: z.string().min(1),
    inProgressStatus: z.string().min(1),
    maxResults: z.coerce.number().int().positive().max(1000),
  }),
  github: z.object({
    token: z.string().min(1),
    repo: z.string().regex(REPO_PATTERN, 'must look like owner/name').nullable(),
    baseBranch: z.string().min(1).nullable(),
    apiUrl: z.string().url().transform(trimSlash),
  }),
  gemini: z.object({
    apiKey: z.string().min(1),
    model: z.string().min(1),
    apiUrl: z.string().url().transform(trimSlash),
  }),
  timeoutMs: z.coerce.number().int().positive(),
  context: z.object({
    maxFiles: z.coerce.number().int().positive(),
    maxBytes: z.coerce.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

/** Environment variable behind each setting, used in error messages. */
const ENV_KEYS: Record<string, string> = {
  'jira.url': 'JIRA_URL',
  'jira.email': 'JIRA_EMAIL',
  'jira.apiToken': 'JIRA_API_TOKEN',
  'jira.project': 'JIRA_PROJECT',
  'jira.markerLabel': 'JIRA_MARKER_LABEL',
  'jira.readyStatus': 'JIRA_READY_STATUS',
  'jira.inProgressStatus': 'JIRA_IN_PROGRESS_STATUS',
  'jira.maxResults': 'JIRA_MAX_RESULTS',
  'github.token': 'GITHUB_TOKEN',
  'github.repo': 'GITHUB_REPO',
  'github.baseBranch': 'GITHUB_BASE_BRANCH',
  'github.apiUrl': 'GITHUB_API_URL',
  'gemini.apiKey': 'GEMINI_API_KEY',
  'gemini.model': 'GEMINI_MODEL',
  'gemini.apiUrl': 'GEMINI_API_URL',
  timeoutMs: 'TASKBRIDGE_TIMEOUT_MS',
};

export interface LoadConfigOptions {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Read `.env` from cwd into `env` first. Defaults to true. */
  dotenv?: boolean;
}

function pick<T>(...values: (T | undefined)[]): T | undefined {
  for (const value of values) {
    if (value === undefined) continue;
    if (typeof value === 'string' && value.trim() === '') continue;
    return value;
  }
  return undefined;
}

async function readConfigFile(path: string, explicit: boolean): Promise<FileConfig> {
  if (!(await fileExists(path))) {
    if (explicit) {
      throw new ConfigError([`config file not found: ${path}`]);
    }
    return {};
  }

  const raw = await readFileIfExists(path);
  let data: unknown;
  try {
    data = parseYaml(raw ?? '') ?? {};
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${path}: ${msg}`]);
  }

  const parsed = fileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${path}: ${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.dotenv !== false) {
    const dotenvRaw = await readFileIfExists(join(cwd, '.env'));
    if (dotenvRaw !== null) {
      // .env wins over the inherited environment
      Object.assign(env, parseDotenv(dotenvRaw));
    }
  }

  const configPath = options.configPath ? resolve(cwd, options.configPath) : join(cwd, CONFIG_FILENAME);
  const file = await readConfigFile(configPath, options.configPath !== undefined);

  const raw = {
    jira: {
      url: pick(env.JIRA_URL, file.jira?.url),
      email: pick(env.JIRA_EMAIL),
      apiToken: pick(env.JIRA_API_TOKEN),
      project: pick(env.JIRA_PROJECT, file.jira?.project, DEFAULTS.jiraProject),
      markerLabel: pick(env.JIRA_MARKER_LABEL, file.jira?.markerLabel, DEFAULTS.markerLabel),
      readyStatus: pick(env.JIRA_READY_STATUS, file.jira?.readyStatus, DEFAULTS.readyStatus),
      inProgressStatus: pick(
        env.JIRA_IN_PROGRESS_STATUS,
        file.jira?.inProgressStatus,
        DEFAULTS.inProgressStatus,
      ),
      maxResults: pick<string | number>(env.JIRA_MAX_RESULTS, file.jira?.maxResults, DEFAULTS.maxResults),
    },
    github: {
      token: pick(env.GITHUB_TOKEN),
      repo: pick(env.GITHUB_REPO, file.github?.repo) ?? null,
      baseBranch: pick(env.GITHUB_BASE_BRANCH, file.github?.baseBranch) ?? null,
      apiUrl: pick(env.GITHUB_API_URL, file.github?.apiUrl, DEFAULTS.githubApiUrl),
    },
    gemini: {
      apiKey: pick(env.GEMINI_API_KEY),
      model: pick(env.GEMINI_MODEL, file.gemini?.model, DEFAULTS.geminiModel),
      apiUrl: pick(env.GEMINI_API_URL, file.gemini?.apiUrl, DEFAULTS.geminiApiUrl),
    },
    timeoutMs: pick<string | number>(env.TASKBRIDGE_TIMEOUT_MS, file.timeoutMs, DEFAULTS.timeoutMs),
    context: {
      maxFiles: pick(file.context?.maxFiles, DEFAULTS.maxContextFiles),
      maxBytes: pick(file.context?.maxBytes, DEFAULTS.maxContextBytes),
    },
  };

  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join('.');
        const envKey = ENV_KEYS[key];
        return envKey ? `${key} (${envKey}): ${issue.message}` : `${key}: ${issue.message}`;
      }),
    );
  }
  return parsed.data;
}

/** Secrets are only ever shown by length. */
export function redactSecret(value: string): string {
  return `<redacted, ${value.length} chars>`;
}
