import type { z } from 'zod';

export interface CompletionOptions {
  /** Ask the model for a JSON document instead of free text. */
  json?: boolean;
  temperature?: number;
}

export interface LLMClient {
  readonly provider: string;
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
  completeJson<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
}

/**
 * Strip the markdown wrapping models like to put around JSON answers.
 * A leading fence (any language tag) wins; otherwise the first complete
 * object or array in the text; otherwise the trimmed text as-is.
 */
export function cleanResponse(text: string): string {
  const trimmed = text.trim();

  const fenceMatch = trimmed.match(/^```[\w-]*\s*\n?([\s\S]*?)\n?\s*```\s*$/);
  if (fenceMatch) {
    return fenceMatch[1].trim();
  }

  const inlineFence = trimmed.match(/```(?:json)?\s*\n([\s\S]*?)\n\s*```/);
  if (inlineFence) {
    return inlineFence[1].trim();
  }

  const start = trimmed.search(/[{[]/);
  if (start !== -1) {
    const end = findClosingBracket(trimmed, start);
    if (end !== -1) {
      return trimmed.slice(start, end + 1);
    }
  }

  return trimmed;
}

/** Index of the bracket closing the one at `start`, skipping string literals; -1 if unbalanced. */
function findClosingBracket(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      depth++;
    } else if (char === '}' || char === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
