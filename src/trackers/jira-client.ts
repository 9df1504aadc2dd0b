import { z } from 'zod';

import type { AppConfig } from '../core/config.js';
import { TrackerAuthError, TrackerError, errorMessage } from '../utils/errors.js';
import type { Task, TaskTracker } from './types.js';

const API_PREFIX = '/rest/api/2';
const TASK_FIELDS = ['summary', 'description', 'status', 'labels'];
const PAGE_SIZE = 50;

const issueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().nullish(),
    description: z.string().nullish(),
    status: z.object({ name: z.string() }),
    labels: z.array(z.string()).nullish(),
  }),
});

const searchResponseSchema = z.object({
  issues: z.array(issueSchema),
  nextPageToken: z.string().nullish(),
  isLast: z.boolean().optional(),
});

const myselfSchema = z.object({
  accountId: z.string().optional(),
  displayName: z.string().optional(),
  emailAddress: z.string().optional(),
});

const transitionsSchema = z.object({
  transitions: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      to: z.object({ name: z.string() }).optional(),
    }),
  ),
});

const errorBodySchema = z.object({
  errorMessages: z.array(z.string()).optional(),
  errors: z.record(z.string()).optional(),
});

export interface JiraClientOptions {
  baseUrl: string;
  email: string;
  apiToken: string;
  timeoutMs?: number;
}

function toTask(issue: z.infer<typeof issueSchema>): Task {
  return {
    key: issue.key,
    summary: issue.fields.summary ?? '',
    description: issue.fields.description ?? '',
    status: issue.fields.status.name,
    labels: issue.fields.labels ?? [],
  };
}

function parseJsonBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (!text) return '';

  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const messages = [
        ...(parsed.data.errorMessages ?? []),
        ...Object.entries(parsed.data.errors ?? {}).map(([field, msg]) => `${field}: ${msg}`),
      ];
      if (messages.length > 0) return messages.join('; ');
    }
  } catch {
    // not JSON, fall through to the raw text
  }
  return text.length > 200 ? `${text.slice(0, 197)}...` : text;
}

/**
 * Jira Cloud/Server client over REST API v2 (plain-text descriptions).
 */
export class JiraClient implements TaskTracker {
  readonly name = 'jira';
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly timeoutMs: number;

  constructor(options: JiraClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.authHeader = `Basic ${Buffer.from(`${options.email}:${options.apiToken}`).toString('base64')}`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  static fromConfig(config: AppConfig): JiraClient {
    return new JiraClient({
      baseUrl: config.jira.url,
      email: config.jira.email,
      apiToken: config.jira.apiToken,
      timeoutMs: config.timeoutMs,
    });
  }

  async getCurrentUser(): Promise<string> {
    const me = await this.requestJson('GET', '/myself', myselfSchema);
    return me.displayName ?? me.emailAddress ?? me.accountId ?? 'unknown user';
  }

  async searchTasks(query: string, maxResults: number): Promise<Task[]> {
    const tasks: Task[] = [];
    let nextPageToken: string | undefined;

    do {
      const page = await this.requestJson('POST', '/search/jql', searchResponseSchema, {
        jql: query,
        fields: TASK_FIELDS,
        maxResults: Math.min(PAGE_SIZE, maxResults - tasks.length),
        ...(nextPageToken ? { nextPageToken } : {}),
      });
      tasks.push(...page.issues.map(toTask));
      nextPageToken = page.isLast === true ? undefined : (page.nextPageToken ?? undefined);
    } while (nextPageToken && tasks.length < maxResults);

    return tasks.slice(0, maxResults);
  }

  async getTask(key: string): Promise<Task> {
    const issue = await this.requestJson(
      'GET',
      `/issue/${encodeURIComponent(key)}?fields=${TASK_FIELDS.join(',')}`,
      issueSchema,
    );
    return toTask(issue);
  }

  async transitionTask(key: string, statusName: string): Promise<void> {
    const path = `/issue/${encodeURIComponent(key)}/transitions`;
    const { transitions } = await this.requestJson('GET', path, transitionsSchema);

    const wanted = statusName.toLowerCase();
    const match =
      transitions.find((t) => t.to?.name.toLowerCase() === wanted) ??
      transitions.find((t) => t.name.toLowerCase() === wanted);

    if (!match) {
      const available = transitions.map((t) => t.to?.name ?? t.name).join(', ') || 'none';
      throw new TrackerError(
        `No transition to "${statusName}" is available for ${key} (available: ${available})`,
      );
    }

    await this.send('POST', path, { transition: { id: match.id } });
  }

  async addComment(key: string, body: string): Promise<void> {
    await this.send('POST', `/issue/${encodeURIComponent(key)}/comment`, { body });
  }

  private async requestJson<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
  ): Promise<T> {
    const raw = await this.send(method, path, body);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new TrackerError(`Unexpected Jira response for ${method} ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /** Performs the request and returns its JSON body (null when empty or not JSON). */
  private async send(method: string, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: 'application/json',
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    // The timeout covers reading the body as well as the headers.
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      let text: string;
      try {
        response = await fetch(`${this.baseUrl}${API_PREFIX}${path}`, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });
        if (response.status === 401 || response.status === 403) {
          throw new TrackerAuthError(response.status);
        }
        if (!response.ok) {
          const detail = await readErrorDetail(response);
          throw new TrackerError(
            `Jira ${method} ${path} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
            response.status,
          );
        }
        text = await response.text();
      } catch (error) {
        if (error instanceof TrackerError) throw error;
        throw new TrackerError(`Could not reach Jira at ${this.baseUrl} (${errorMessage(error)})`);
      }

      return parseJsonBody(text);
    } finally {
      clearTimeout(timeout);
    }
  }
}
