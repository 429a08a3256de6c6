/**
 * AI Summarizer
 *
 * Orchestrates one summarization call: validates the input, picks the direct
 * or the chunked path, fills prompt templates and calls the text generator.
 *
 * Result contract of `summarizeWithVariables`:
 * - `null`  no generator is configured ("summarization unavailable")
 * - `''`    nothing to summarize, or the generator failed
 * - text    the generator's answer, trimmed
 * Cancellation always rejects with OperationCancelledError.
 *
 * @module ai/summarizer
 */

import { logger, preview } from '../utils/logger';
import {
  ArgumentError,
  ArgumentOutOfRangeError,
  OperationCancelledError,
  errorMessage,
  isCancellationError,
  throwIfCancelled
} from '../utils/errors';
import { DefaultTextChunkingService, type TextChunkingService } from '../core/text-chunking';
import {
  CHUNK_SUMMARY_PROMPT,
  DEFAULT_CHUNK_PROMPT,
  DEFAULT_FINAL_PROMPT,
  FINAL_SUMMARY_PROMPT,
  hasPlaceholder,
  type PromptService,
  type PromptVariables
} from './prompt-template-service';
import type { TextGenerator } from './text-generation';

export type EmptyReason = 'no-content' | 'failed' | 'no-output';

export type SummaryOutcome =
  | { kind: 'summary'; text: string }
  | { kind: 'empty'; reason: EmptyReason }
  | { kind: 'unavailable' };

export interface SummarizeRequest {
  inputText: string | null | undefined;
  variables?: PromptVariables;
  /** Template name without extension; defaults to `final_summary_prompt` */
  promptFileName?: string;
  signal?: AbortSignal;
}

export interface AISummarizerOptions {
  promptService?: PromptService;
  textGenerator?: TextGenerator;
  chunkingService?: TextChunkingService;
  /** Characters per chunk on the chunked path (default 8000) */
  chunkSize?: number;
  /** Characters shared by consecutive chunks (default 500) */
  overlap?: number;
  /** Chunking starts above `maxChunkTokens * 1.5` estimated tokens (default 3000) */
  maxChunkTokens?: number;
}

const empty = (reason: EmptyReason): SummaryOutcome => ({ kind: 'empty', reason });

/**
 * Map the tagged outcome onto the `string | null` contract.
 */
export function outcomeToText(outcome: SummaryOutcome): string | null {
  switch (outcome.kind) {
    case 'summary':
      return outcome.text;
    case 'empty':
      return '';
    case 'unavailable':
      return null;
  }
}

function chunkContext(index: number, total: number): string {
  if (total <= 1) {
    return '';
  }
  const position = index === 0
    ? 'This is the beginning of the document. '
    : index === total - 1
      ? 'This is the end of the document. '
      : 'This is a middle section of the document. ';
  return `This is part ${index + 1} of ${total}. ${position}`;
}

export class AISummarizer {
  private readonly promptService?: PromptService;
  private readonly textGenerator?: TextGenerator;
  private readonly chunker: TextChunkingService;
  private readonly chunkSize: number;
  private readonly overlap: number;
  private readonly maxChunkTokens: number;

  constructor(options: AISummarizerOptions = {}) {
    this.promptService = options.promptService;
    this.textGenerator = options.textGenerator;
    this.chunker = options.chunkingService ?? new DefaultTextChunkingService();
    this.chunkSize = options.chunkSize ?? 8000;
    this.overlap = options.overlap ?? 500;
    this.maxChunkTokens = options.maxChunkTokens ?? 3000;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new ArgumentOutOfRangeError('chunkSize', 'Chunk size must be a positive integer');
    }
    if (!Number.isInteger(this.overlap) || this.overlap < 0) {
      throw new ArgumentOutOfRangeError('overlap', 'Overlap must be a non-negative integer');
    }
    if (this.overlap >= this.chunkSize) {
      throw new ArgumentError('Overlap must be less than chunk size', 'overlap');
    }
    if (!(this.maxChunkTokens > 0)) {
      throw new ArgumentOutOfRangeError('maxChunkTokens', 'Max chunk tokens must be positive');
    }
  }

  get chunkingService(): TextChunkingService {
    return this.chunker;
  }

  /** False when no generator is configured; every call then yields `null`. */
  get isAvailable(): boolean {
    return this.textGenerator !== undefined;
  }

  async summarizeWithVariables(
    inputText: string | null | undefined,
    variables?: PromptVariables,
    promptFileName?: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    return outcomeToText(await this.summarize({ inputText, variables, promptFileName, signal }));
  }

  async summarizeText(inputText: string, promptFileName?: string, signal?: AbortSignal): Promise<string | null> {
    return this.summarizeWithVariables(inputText, undefined, promptFileName, signal);
  }

  async summarize(request: SummarizeRequest): Promise<SummaryOutcome> {
    const { inputText, variables = {}, signal } = request;

    if (inputText === null || inputText === undefined) {
      logger.warn('No input text provided to summarizer');
      return empty('no-content');
    }

    const content = Object.prototype.hasOwnProperty.call(variables, 'content') ? variables.content : inputText;
    if (content.trim().length === 0) {
      logger.warn('Input text is empty or whitespace, nothing to summarize');
      return empty('no-content');
    }

    throwIfCancelled(signal);

    const generator = this.textGenerator;
    if (!generator) {
      logger.error('No text generation backend is configured. Set AI_PROVIDER and its credentials to enable summaries.');
      return { kind: 'unavailable' };
    }

    const promptName = request.promptFileName || FINAL_SUMMARY_PROMPT;
    if (!request.promptFileName) {
      logger.debug('No prompt name provided, using default', { promptName });
    }

    if (this.needsChunking(content)) {
      logger.info('Input text is large, using chunked summarization', {
        length: content.length,
        estimatedTokens: this.chunker.estimateTokenCount(content)
      });
      return this.summarizeChunked(generator, content, variables, promptName, signal);
    }

    return this.summarizeDirect(generator, content, variables, promptName, signal);
  }

  private needsChunking(content: string): boolean {
    return this.chunker.estimateTokenCount(content) > this.maxChunkTokens * 1.5;
  }

  private async summarizeDirect(
    generator: TextGenerator,
    content: string,
    variables: PromptVariables,
    promptName: string,
    signal?: AbortSignal
  ): Promise<SummaryOutcome> {
    const template = await this.loadTemplate(promptName, signal);
    const prompt = this.fill(template, { ...variables, content }, content);

    try {
      logger.info('Generating summary', { backend: generator.name, promptName, promptLength: prompt.length });
      const text = await this.invoke(generator, prompt, signal);
      return text.length > 0 ? { kind: 'summary', text } : empty('no-output');
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      logger.error('Failed to generate summary', { backend: generator.name, error: errorMessage(error) });
      return empty('failed');
    }
  }

  /**
   * Summarize each chunk in order, then consolidate the chunk summaries with
   * one more call. Any failure other than cancellation abandons the whole
   * chunked run and yields an empty result.
   */
  private async summarizeChunked(
    generator: TextGenerator,
    content: string,
    variables: PromptVariables,
    promptName: string,
    signal?: AbortSignal
  ): Promise<SummaryOutcome> {
    try {
      const chunks = this.chunker.splitIntoChunks(content, this.chunkSize, this.overlap);
      logger.info('Text split into chunks', { chunkCount: chunks.length, chunkSize: this.chunkSize, overlap: this.overlap });

      const chunkTemplate = await this.loadTemplate(CHUNK_SUMMARY_PROMPT, signal);
      const finalTemplate = await this.loadTemplate(promptName, signal);

      const chunkSummaries: string[] = [];
      for (let i = 0; i < chunks.length; i++) {
        const chunk = chunks[i];
        if (chunk.trim().length === 0) {
          logger.debug('Skipping blank chunk', { chunk: i + 1 });
          continue;
        }

        logger.info('Processing chunk', { chunk: i + 1, totalChunks: chunks.length });
        const prompt = this.fill(chunkTemplate, {
          ...variables,
          content: chunk,
          chunk_context: chunkContext(i, chunks.length),
          chunk_num: String(i + 1),
          total_chunks: String(chunks.length)
        }, chunk);

        const summary = await this.invoke(generator, prompt, signal);
        if (summary.length > 0) {
          chunkSummaries.push(summary);
        }
      }

      if (chunkSummaries.length === 0) {
        logger.warn('No chunk summaries were generated');
        return empty('no-output');
      }

      const consolidation = chunkSummaries
        .map((summary, i) => `--- CHUNK ${i + 1}/${chunkSummaries.length} SUMMARY ---\n${summary}`)
        .join('\n\n');
      const finalPrompt = this.fill(finalTemplate, { ...variables, content: consolidation }, consolidation);

      logger.info('Generating consolidated summary', { chunkSummaries: chunkSummaries.length, promptName });
      const finalSummary = await this.invoke(generator, finalPrompt, signal);

      if (finalSummary.length === 0) {
        logger.warn('Consolidation returned an empty summary, falling back to joined chunk summaries');
        return { kind: 'summary', text: chunkSummaries.join('\n\n') };
      }
      return { kind: 'summary', text: finalSummary };
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      logger.error('Chunked summarization failed', { backend: generator.name, error: errorMessage(error) });
      return empty('failed');
    }
  }

  /**
   * Template text for `name`, or `undefined` without a prompt service. A
   * failing service degrades to the built-in default for that name.
   */
  private async loadTemplate(name: string, signal?: AbortSignal): Promise<string | undefined> {
    if (!this.promptService) {
      return undefined;
    }

    let template: string;
    try {
      template = await this.promptService.loadTemplate(name);
    } catch (error) {
      if (isCancellationError(error)) {
        throw new OperationCancelledError(undefined, { cause: error });
      }
      logger.warn('Prompt template could not be loaded, using built-in default', {
        templateName: name,
        error: errorMessage(error)
      });
      template = name === CHUNK_SUMMARY_PROMPT ? DEFAULT_CHUNK_PROMPT : DEFAULT_FINAL_PROMPT;
    }

    throwIfCancelled(signal);
    logger.debug('Loaded prompt template', { templateName: name, preview: preview(template) });
    return template;
  }

  /**
   * Substitute `variables` into `template`. Without a usable template the
   * bare content is the prompt; a template that never mentions `{{content}}`
   * gets the content appended.
   */
  private fill(template: string | undefined, variables: PromptVariables, content: string): string {
    if (!this.promptService || template === undefined || template.trim().length === 0) {
      return content;
    }

    const filled = this.promptService.substituteVariables(template, variables);
    return hasPlaceholder(template, 'content') ? filled : `${filled}\n\n${content}`;
  }

  private async invoke(generator: TextGenerator, prompt: string, signal?: AbortSignal): Promise<string> {
    throwIfCancelled(signal);
    try {
      const text = await generator.generate(prompt, { signal });
      throwIfCancelled(signal);
      return text.trim();
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      if (signal?.aborted || isCancellationError(error)) {
        throw new OperationCancelledError(undefined, { cause: error });
      }
      throw error;
    }
  }
}
