import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { OllamaTextGenerator } from '../ai/ollama-generator';
import { GenerationHttpError } from '../ai/text-generation';
import { AppError, ErrorCode, OperationCancelledError } from '../utils/errors';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('OllamaTextGenerator', () => {
  let originalFetch: typeof global.fetch;

  beforeEach(() => {
    vi.clearAllMocks();
    originalFetch = global.fetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('posts a non-streaming generate request and returns the response text', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce(jsonResponse({ model: 'test-model', response: 'A summary', done: true }));
    global.fetch = fetchMock;

    const generator = new OllamaTextGenerator({
      baseUrl: 'http://localhost:11434/',
      model: 'test-model',
      temperature: 0.2,
      maxTokens: 256,
    });

    await expect(generator.generate('Summarize this')).resolves.toBe('A summary');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-model',
      prompt: 'Summarize this',
      stream: false,
      options: { temperature: 0.2, top_p: 0.9, num_predict: 256 },
    });
  });

  it('maps a 4xx response to GenerationHttpError without retrying', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ error: 'model not found' }, 404));
    global.fetch = fetchMock;

    const generator = new OllamaTextGenerator({ maxRetries: 2 });
    const error = await generator.generate('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationHttpError);
    expect(error).toMatchObject({ status: 404, code: ErrorCode.DEPENDENCY_ERROR });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries a 5xx response and then succeeds', async () => {
    const fetchMock = vi.fn()
      .mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503))
      .mockResolvedValueOnce(jsonResponse({ response: 'recovered' }));
    global.fetch = fetchMock;

    const generator = new OllamaTextGenerator({ maxRetries: 1 });

    await expect(generator.generate('prompt')).resolves.toBe('recovered');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries connection failures up to maxRetries', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    global.fetch = fetchMock;

    const generator = new OllamaTextGenerator({ maxRetries: 1 });

    await expect(generator.generate('prompt')).rejects.toThrow('fetch failed');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects a response without a text field', async () => {
    global.fetch = vi.fn().mockResolvedValue(jsonResponse({ done: true }));

    const generator = new OllamaTextGenerator({ maxRetries: 0 });
    const error = await generator.generate('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: ErrorCode.VALIDATION_ERROR });
  });

  it('reports a timeout as an AppError', async () => {
    global.fetch = vi.fn().mockImplementation((_url: string, init: RequestInit) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        });
      })
    );

    const generator = new OllamaTextGenerator({ timeoutMs: 5, maxRetries: 0 });
    const error = await generator.generate('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).not.toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({ code: ErrorCode.TIMEOUT, message: 'Ollama request timed out after 5ms' });
  });

  it('turns a caller abort into OperationCancelledError', async () => {
    const controller = new AbortController();
    global.fetch = vi.fn().mockImplementation((_url: string, init: RequestInit) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        });
        controller.abort();
      })
    );

    const generator = new OllamaTextGenerator({ maxRetries: 2 });

    await expect(generator.generate('prompt', { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(global.fetch).toHaveBeenCalledTimes(1);
  });

  it('does not call the server when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchMock = vi.fn();
    global.fetch = fetchMock;

    const generator = new OllamaTextGenerator();

    await expect(generator.generate('prompt', { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
