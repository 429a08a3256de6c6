import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { OpenAiTextGenerator, type ChatCompletionClient } from '../ai/openai-generator';
import { AppError, ErrorCode, OperationCancelledError } from '../utils/errors';

const fakeClient = (complete: ChatCompletionClient['complete']) => {
  const client = { complete: vi.fn(complete) };
  return client;
};

describe('OpenAiTextGenerator', () => {
  const originalKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(() => {
    if (originalKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = originalKey;
    }
  });

  it('returns the completion text from the client', async () => {
    const client = fakeClient(async () => 'Generated summary');
    const generator = new OpenAiTextGenerator({ client });

    await expect(generator.generate('Summarize')).resolves.toBe('Generated summary');
    expect(client.complete).toHaveBeenCalledWith('Summarize', undefined);
  });

  it('passes the abort signal to the client', async () => {
    const controller = new AbortController();
    const client = fakeClient(async () => 'ok');
    const generator = new OpenAiTextGenerator({ client });

    await generator.generate('Summarize', { signal: controller.signal });

    expect(client.complete).toHaveBeenCalledWith('Summarize', controller.signal);
  });

  it('rethrows client failures unchanged', async () => {
    const failure = Object.assign(new Error('Rate limit reached'), { status: 429 });
    const generator = new OpenAiTextGenerator({ client: fakeClient(async () => Promise.reject(failure)) });

    await expect(generator.generate('Summarize')).rejects.toBe(failure);
  });

  it('maps an SDK abort to OperationCancelledError', async () => {
    const abort = Object.assign(new Error('Request was aborted.'), { name: 'APIUserAbortError' });
    const generator = new OpenAiTextGenerator({ client: fakeClient(async () => Promise.reject(abort)) });

    await expect(generator.generate('Summarize')).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('rejects before calling the client when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = fakeClient(async () => 'unused');
    const generator = new OpenAiTextGenerator({ client });

    await expect(generator.generate('Summarize', { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(client.complete).not.toHaveBeenCalled();
  });

  it('fails with a configuration error when no API key is available', async () => {
    const generator = new OpenAiTextGenerator({});
    const error = await generator.generate('Summarize').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: ErrorCode.CONFIGURATION_ERROR });
  });
});
