import { z } from 'zod';

import type { AppConfig } from '../core/config.js';
import { logger } from '../ui/logger.js';
import { LLMError, LLMResponseError, errorMessage } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import type { CompletionOptions, LLMClient } from './types.js';
import { cleanResponse } from './types.js';

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

const errorResponseSchema = z.object({
  error: z.object({ message: z.string(), status: z.string().optional() }),
});

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * Google Gemini over the `generateContent` REST endpoint.
 */
export class GeminiClient implements LLMClient {
  readonly provider = 'gemini';
  readonly model: string;
  private readonly options: Required<GeminiClientOptions>;

  constructor(options: GeminiClientOptions) {
    this.options = {
      timeoutMs: 120_000,
      maxRetries: 2,
      retryDelayMs: 500,
      ...options,
      baseUrl: options.baseUrl.replace(/\/+$/, ''),
    };
    this.model = options.model;
  }

  static fromConfig(config: AppConfig): GeminiClient {
    return new GeminiClient({
      apiKey: config.gemini.apiKey,
      model: config.gemini.model,
      baseUrl: config.gemini.apiUrl,
      timeoutMs: config.timeoutMs,
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    return withRetry(
      () => this.generate(prompt, options),
      (error, attempt) => {
        const retry = error instanceof LLMError && error.retryable;
        if (retry) {
          logger.debug(`Gemini request failed (${errorMessage(error)}), retry ${attempt + 1}`);
        }
        return retry;
      },
      { maxRetries: this.options.maxRetries, baseDelayMs: this.options.retryDelayMs },
    );
  }

  async completeJson<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const text = await this.complete(prompt, { json: true, temperature: 0.2 });

    let data: unknown;
    try {
      data = JSON.parse(cleanResponse(text));
    } catch (error) {
      throw new LLMResponseError(`Model response is not valid JSON: ${errorMessage(error)}`, text);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new LLMResponseError(`Model response does not match the expected shape: ${issues}`, text);
    }
    return parsed.data;
  }

  private async generate(prompt: string, options: CompletionOptions): Promise<string> {
    const url = `${this.options.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`;
    const generationConfig: Record<string, unknown> = {};
    if (options.json) generationConfig.responseMimeType = 'application/json';
    if (options.temperature !== undefined) generationConfig.temperature = options.temperature;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.options.apiKey,
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig,
        }),
        signal: controller.signal,
      });
    } catch (error) {
      throw new LLMError(`Could not reach Gemini (${errorMessage(error)})`, { retryable: true });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new LLMError(`Gemini returned HTTP ${response.status}: ${describeError(body)}`, {
        status: response.status,
        retryable: response.status === 429 || response.status >= 500,
      });
    }

    const parsed = generateResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new LLMError(`Unexpected Gemini response: ${parsed.error.message}`);
    }

    const candidate = parsed.data.candidates?.[0];
    if (!candidate) {
      const reason = parsed.data.promptFeedback?.blockReason;
      throw new LLMError(reason ? `Gemini blocked the prompt: ${reason}` : 'Gemini returned no candidates');
    }

    const text = (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('');
    if (!text.trim()) {
      throw new LLMError(
        `Gemini returned an empty response (finish reason: ${candidate.finishReason ?? 'unknown'})`,
      );
    }
    return text;
  }
}

function describeError(body: string): string {
  try {
    const parsed = errorResponseSchema.safeParse(JSON.parse(body));
    if (parsed.success) return parsed.data.error.message;
  } catch {
    // not JSON
  }
  return body.slice(0, 200) || 'no details';
}
