/**
 * Ollama Text Generator
 *
 * Calls a local Ollama server's `/api/generate` endpoint. Transient transport
 * failures (connection errors, timeouts, 5xx) are retried with backoff;
 * cancellation never is.
 *
 * @module ai/ollama-generator
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import { AppError, ErrorCode, OperationCancelledError, isCancellationError, throwIfCancelled } from '../utils/errors';
import { withRetry } from '../utils/retry';
import { GenerationHttpError, type GenerateOptions, type TextGenerator } from './text-generation';

interface OllamaRequest {
  model: string;
  prompt: string;
  stream: boolean;
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
  };
}

const ollamaResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional()
});

export interface OllamaTextGeneratorOptions {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  temperature?: number;
  maxTokens?: number;
}

export class OllamaTextGenerator implements TextGenerator {
  readonly name = 'ollama';
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OllamaTextGeneratorOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'http://127.0.0.1:11434').replace(/\/+$/, '');
    this.model = options.model ?? 'llama3.2:3b-instruct-q8_0';
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.maxRetries = options.maxRetries ?? 2;
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const { signal } = options;
    throwIfCancelled(signal);

    try {
      return await withRetry(() => this.request(prompt, signal), {
        maxRetries: this.maxRetries,
        signal
      });
    } catch (error) {
      if (signal?.aborted || isCancellationError(error)) {
        throw new OperationCancelledError('Ollama generation was cancelled', { cause: error });
      }
      throw error;
    }
  }

  private async request(prompt: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const startTime = Date.now();
    const body: OllamaRequest = {
      model: this.model,
      prompt,
      stream: false,
      options: {
        temperature: this.temperature,
        top_p: 0.9,
        num_predict: this.maxTokens
      }
    };

    logger.debug('Ollama generate request', { model: this.model, promptLength: prompt.length });

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(body),
        signal: controller.signal
      });

      if (!response.ok) {
        throw new GenerationHttpError(
          response.status,
          `Ollama request failed with status ${response.status}`,
          { model: this.model }
        );
      }

      const parsed = ollamaResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new AppError(ErrorCode.VALIDATION_ERROR, 'Unexpected Ollama response shape', parsed.error.flatten());
      }

      logger.info('Ollama generation complete', {
        model: parsed.data.model ?? this.model,
        durationMs: Date.now() - startTime,
        responseLengthChars: parsed.data.response.length
      });

      return parsed.data.response;
    } catch (error) {
      if (controller.signal.aborted && !signal?.aborted) {
        throw new AppError(ErrorCode.TIMEOUT, `Ollama request timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
