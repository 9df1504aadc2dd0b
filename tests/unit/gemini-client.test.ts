import { z } from 'zod';

import { GeminiClient } from '../../src/llm/gemini-client.js';
import { cleanResponse } from '../../src/llm/types.js';
import { LLMError, LLMResponseError } from '../../src/utils/errors.js';
import { makeConfig } from './helpers/fakes.js';

function geminiResponse(text: string, finishReason = 'STOP'): Response {
  return new Response(
    JSON.stringify({
      candidates: [{ content: { role: 'model', parts: [{ text }] }, finishReason }],
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

function errorResponse(status: number, message: string): Response {
  return new Response(JSON.stringify({ error: { code: status, message, status: 'ERROR' } }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('GeminiClient', () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  let client: GeminiClient;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    client = new GeminiClient({
      apiKey: 'test-key',
      model: 'gemini-1.5-pro',
      baseUrl: 'https://gemini.test/v1beta/',
      retryDelayMs: 0,
    });
  });

  it('posts one user turn and joins the returned parts', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({ candidates: [{ content: { parts: [{ text: 'Hello, ' }, { text: 'world' }] } }] }),
        { status: 200 },
      ),
    );

    await expect(client.complete('Say hello')).resolves.toBe('Hello, world');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://gemini.test/v1beta/models/gemini-1.5-pro:generateContent');
    expect(init.headers).toMatchObject({ 'x-goog-api-key': 'test-key' });
    expect(JSON.parse(init.body)).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'Say hello' }] }],
      generationConfig: {},
    });
  });

  it('asks for JSON and validates it against the schema', async () => {
    fetchMock.mockResolvedValueOnce(geminiResponse('```json\n{"answer": 42}\n```'));

    const result = await client.completeJson('Answer', z.object({ answer: z.number() }));

    expect(result).toEqual({ answer: 42 });
    expect(JSON.parse(fetchMock.mock.calls[0][1].body).generationConfig).toEqual({
      responseMimeType: 'application/json',
      temperature: 0.2,
    });
  });

  it('rejects JSON of the wrong shape', async () => {
    fetchMock.mockResolvedValueOnce(geminiResponse('{"answer": "many"}'));

    const error = await client.completeJson('Answer', z.object({ answer: z.number() })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMResponseError);
    expect(error).toMatchObject({
      message: 'Model response does not match the expected shape: answer: Expected number, received string',
      raw: '{"answer": "many"}',
    });
  });

  it('rejects text that is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(geminiResponse('I cannot help with that.'));

    await expect(client.completeJson('Answer', z.object({}))).rejects.toThrow(
      /^Model response is not valid JSON: /,
    );
  });

  it('retries rate limits and server errors', async () => {
    fetchMock
      .mockResolvedValueOnce(errorResponse(429, 'Resource exhausted'))
      .mockResolvedValueOnce(errorResponse(503, 'Overloaded'))
      .mockResolvedValueOnce(geminiResponse('done'));

    await expect(client.complete('Go')).resolves.toBe('done');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up after the retry budget', async () => {
    fetchMock.mockImplementation(async () => errorResponse(500, 'Internal error'));

    await expect(client.complete('Go')).rejects.toThrow('Gemini returned HTTP 500: Internal error');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    fetchMock.mockResolvedValueOnce(errorResponse(400, 'API key not valid'));

    const error = await client.complete('Go').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({ status: 400, retryable: false, message: 'Gemini returned HTTP 400: API key not valid' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries network failures', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed')).mockResolvedValueOnce(geminiResponse('ok'));

    await expect(client.complete('Go')).resolves.toBe('ok');
  });

  it('reports a blocked prompt', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ promptFeedback: { blockReason: 'SAFETY' } }), { status: 200 }),
    );

    await expect(client.complete('Go')).rejects.toThrow('Gemini blocked the prompt: SAFETY');
  });

  it('reports an empty answer with its finish reason', async () => {
    fetchMock.mockResolvedValueOnce(geminiResponse('  ', 'MAX_TOKENS'));

    await expect(client.complete('Go')).rejects.toThrow(
      'Gemini returned an empty response (finish reason: MAX_TOKENS)',
    );
  });
});

describe('GeminiClient.fromConfig', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts a request after the configured timeout', async () => {
    vi.useFakeTimers();
    let signal: AbortSignal | null | undefined;
    const fetchMock = vi.fn((_url: string, init: RequestInit) => {
      signal = init.signal;
      return new Promise<Response>(() => {});
    });
    vi.stubGlobal('fetch', fetchMock);

    const client = GeminiClient.fromConfig(makeConfig({ timeoutMs: 5_000 }));
    void client.complete('Go');
    await vi.advanceTimersByTimeAsync(4_999);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(signal?.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);

    expect(signal?.aborted).toBe(true);
  });
});

describe('cleanResponse', () => {
  it('strips a surrounding code fence with any language tag', () => {
    expect(cleanResponse('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(cleanResponse('```\n[1, 2]\n```')).toBe('[1, 2]');
  });

  it('extracts a fenced block from surrounding prose', () => {
    expect(cleanResponse('Here you go:\n```json\n{"a": 1}\n```\nDone.')).toBe('{"a": 1}');
  });

  it('extracts the first complete object from prose', () => {
    expect(cleanResponse('Result: {"a": {"b": 2}} as requested')).toBe('{"a": {"b": 2}}');
    expect(cleanResponse('Here you go: {"a":1} and also {"b":2}')).toBe('{"a":1}');
  });

  it('stops at the end of a leading object followed by prose with braces', () => {
    const text = '{"files_to_modify": []}\n\nNote: keep the {braces} balanced.';

    expect(cleanResponse(text)).toBe('{"files_to_modify": []}');
  });

  it('ignores brackets inside string literals', () => {
    expect(cleanResponse('[{"code": "if (a) { b(\\"}\\") }"}] trailing ]')).toBe(
      '[{"code": "if (a) { b(\\"}\\") }"}]',
    );
  });

  it('returns plain JSON and plain text unchanged apart from trimming', () => {
    expect(cleanResponse('  {"a": 1}\n')).toBe('{"a": 1}');
    expect(cleanResponse('  no json here ')).toBe('no json here');
  });
});
