export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Exponential backoff with symmetric jitter: base * 2^attempt, capped at maxDelayMs.
 */
export function calculateBackoff(attempt: number, options: RetryOptions = DEFAULT_RETRY_OPTIONS): number {
  const exponential = options.baseDelayMs * Math.pow(2, attempt);
  const capped = Math.min(exponential, options.maxDelayMs);
  const jitter = capped * options.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, capped + jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown, attempt: number) => boolean,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const config = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxRetries || !shouldRetry(error, attempt)) {
        throw error;
      }
      await sleep(calculateBackoff(attempt, config));
    }
  }
}
