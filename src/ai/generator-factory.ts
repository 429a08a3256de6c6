import { logger } from '../utils/logger';
import { AppError, ErrorCode } from '../utils/errors';
import type { AppConfig } from '../config/env';
import type { TextGenerator } from './text-generation';
import { OllamaTextGenerator } from './ollama-generator';
import { OpenAiTextGenerator } from './openai-generator';

/**
 * Build the configured backend. Returns `undefined` when generation is turned
 * off or cannot work (no API key), which the summarizer reports as
 * "summarization unavailable".
 */
export function createTextGenerator(ai: AppConfig['ai']): TextGenerator | undefined {
  switch (ai.provider) {
    case 'none':
      logger.info('AI provider disabled, summaries will be skipped');
      return undefined;

    case 'openai':
      if (!ai.apiKey) {
        logger.warn('OPENAI_API_KEY is not set, summaries will be skipped');
        return undefined;
      }
      return new OpenAiTextGenerator({
        apiKey: ai.apiKey,
        model: ai.model,
        baseUrl: ai.baseUrl,
        timeoutMs: ai.timeoutMs,
        maxRetries: ai.maxRetries,
        temperature: ai.temperature,
        maxTokens: ai.maxTokens
      });

    case 'ollama':
      return new OllamaTextGenerator({
        baseUrl: ai.baseUrl,
        model: ai.model,
        timeoutMs: ai.timeoutMs,
        maxRetries: ai.maxRetries,
        temperature: ai.temperature,
        maxTokens: ai.maxTokens
      });

    default: {
      const unsupported: never = ai.provider;
      throw new AppError(ErrorCode.CONFIGURATION_ERROR, `Unsupported AI provider: ${String(unsupported)}`);
    }
  }
}
