export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class TrackerError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'TrackerError';
    this.status = status;
  }
}

export class TrackerAuthError extends TrackerError {
  constructor(status: number) {
    super(
      `Jira rejected the credentials (HTTP ${status}). Check JIRA_EMAIL and JIRA_API_TOKEN.`,
      status,
    );
    this.name = 'TrackerAuthError';
  }
}

export class CodeHostError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'CodeHostError';
    this.status = status;
  }
}

export class BranchExistsError extends CodeHostError {
  readonly branch: string;

  constructor(branch: string) {
    super(`Branch "${branch}" already exists.`, 422);
    this.name = 'BranchExistsError';
    this.branch = branch;
  }
}

export class LLMError extends Error {
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable?: boolean } = {}) {
    super(message);
    this.name = 'LLMError';
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

export class LLMResponseError extends LLMError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'LLMResponseError';
    this.raw = raw;
  }
}

export class EditConflictError extends Error {
  readonly path: string;
  readonly changeIndex: number | undefined;

  constructor(path: string, message: string, changeIndex?: number) {
    const where = changeIndex === undefined ? path : `${path} (change #${changeIndex + 1})`;
    super(`Cannot apply edit to ${where}: ${message}`);
    this.name = 'EditConflictError';
    this.path = path;
    this.changeIndex = changeIndex;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
