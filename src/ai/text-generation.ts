/**
 * Text generation capability consumed by the summarizer.
 *
 * @module ai/text-generation
 */

import { AppError, ErrorCode } from '../utils/errors';

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Anything that turns a prompt into text: a hosted API, a local model server,
 * a scripted fake. Single-shot, non-streaming.
 */
export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/**
 * A backend answered with a non-success HTTP status.
 */
export class GenerationHttpError extends AppError {
  constructor(
    public readonly status: number,
    message: string,
    details?: unknown
  ) {
    super(ErrorCode.DEPENDENCY_ERROR, message, details);
    this.name = 'GenerationHttpError';
  }
}
