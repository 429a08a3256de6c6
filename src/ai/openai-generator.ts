/**
 * OpenAI Text Generator
 *
 * Chat-completions backend. The SDK is loaded on first use and applies its own
 * retry policy to transient HTTP failures.
 *
 * @module ai/openai-generator
 */

import { logger } from '../utils/logger';
import { AppError, ErrorCode, OperationCancelledError, isCancellationError, throwIfCancelled } from '../utils/errors';
import type { GenerateOptions, TextGenerator } from './text-generation';

/**
 * The one call this backend needs from the SDK.
 */
export interface ChatCompletionClient {
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface OpenAiTextGeneratorOptions {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  temperature?: number;
  maxTokens?: number;
  /** Pre-built client; skips loading the SDK */
  client?: ChatCompletionClient;
}

export class OpenAiTextGenerator implements TextGenerator {
  readonly name = 'openai';
  private readonly options: OpenAiTextGeneratorOptions;
  private readonly model: string;
  private clientPromise: Promise<ChatCompletionClient> | null = null;

  constructor(options: OpenAiTextGeneratorOptions) {
    this.options = options;
    this.model = options.model ?? 'gpt-4o-mini';
    if (options.client) {
      this.clientPromise = Promise.resolve(options.client);
    }
  }

  private loadClient(): Promise<ChatCompletionClient> {
    if (!this.clientPromise) {
      this.clientPromise = (async () => {
        const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
        if (!apiKey) {
          throw new AppError(ErrorCode.CONFIGURATION_ERROR, 'OPENAI_API_KEY is required for the OpenAI backend.');
        }

        const { OpenAI } = await import('openai');
        const client = new OpenAI({
          apiKey,
          baseURL: this.options.baseUrl,
          timeout: this.options.timeoutMs,
          maxRetries: this.options.maxRetries
        });

        return {
          complete: async (prompt: string, signal?: AbortSignal): Promise<string> => {
            const response = await client.chat.completions.create(
              {
                model: this.model,
                max_tokens: this.options.maxTokens ?? 1000,
                temperature: this.options.temperature ?? 0.3,
                top_p: 0.9,
                messages: [{ role: 'user', content: prompt }]
              },
              { signal }
            );
            return response.choices[0]?.message?.content ?? '';
          }
        };
      })();
      // Failed loads are retried on the next call.
      this.clientPromise.catch(() => {
        this.clientPromise = null;
      });
    }
    return this.clientPromise;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const { signal } = options;
    throwIfCancelled(signal);

    const startTime = Date.now();
    logger.debug('OpenAI completion request', { model: this.model, promptLength: prompt.length });

    try {
      const client = await this.loadClient();
      const text = await client.complete(prompt, signal);
      logger.info('OpenAI completion complete', {
        model: this.model,
        durationMs: Date.now() - startTime,
        responseLengthChars: text.length
      });
      return text;
    } catch (error) {
      if (signal?.aborted || isCancellationError(error)) {
        throw new OperationCancelledError('OpenAI generation was cancelled', { cause: error });
      }
      throw error;
    }
  }
}
