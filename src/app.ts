/**
 * Service factory.
 *
 * Wires the summarization pipeline and the document processors from an
 * AppConfig. The CLI and library consumers build everything through here;
 * tests can substitute any collaborator.
 */

import { logger } from './utils/logger';
import type { AppConfig } from './config/env';
import { DefaultTextChunkingService, type TextChunkingService } from './core/text-chunking';
import { PromptTemplateService, type PromptService } from './ai/prompt-template-service';
import { AISummarizer } from './ai/summarizer';
import type { TextGenerator } from './ai/text-generation';
import { createTextGenerator } from './ai/generator-factory';
import type { DocumentNoteProcessor } from './services/processors/document-note-processor';
import { PdfNoteProcessor, type PdfTextExtractor } from './services/processors/pdf-note-processor';
import { VideoNoteProcessor } from './services/processors/video-note-processor';
import { MarkdownNoteProcessor } from './services/processors/markdown-note-processor';
import { DocumentNoteBatchProcessor } from './services/batch-processor';

export type DocumentKind = 'pdf' | 'video' | 'markdown';

export interface ServiceOverrides {
  /** `null` forces "no backend"; `undefined` builds one from config */
  textGenerator?: TextGenerator | null;
  promptService?: PromptService;
  chunkingService?: TextChunkingService;
  pdfExtractor?: PdfTextExtractor;
}

export interface NotebookServices {
  config: AppConfig;
  summarizer: AISummarizer;
  createProcessor(kind: DocumentKind, options?: { course?: string }): DocumentNoteProcessor;
  createBatchProcessor(kind: DocumentKind, options?: { course?: string }): DocumentNoteBatchProcessor;
}

export function createSummarizer(config: AppConfig, overrides: ServiceOverrides = {}): AISummarizer {
  const textGenerator = overrides.textGenerator === null
    ? undefined
    : overrides.textGenerator ?? createTextGenerator(config.ai);

  return new AISummarizer({
    promptService: overrides.promptService ?? new PromptTemplateService({ promptsDirectory: config.paths.promptsDir }),
    textGenerator,
    chunkingService: overrides.chunkingService ?? new DefaultTextChunkingService(),
    chunkSize: config.summarizer.chunkSize,
    overlap: config.summarizer.chunkOverlap,
    maxChunkTokens: config.summarizer.maxChunkTokens
  });
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): NotebookServices {
  const summarizer = createSummarizer(config, overrides);
  logger.debug('Services created', {
    provider: config.ai.provider,
    model: config.ai.model,
    summarizationAvailable: summarizer.isAvailable
  });

  const createProcessor = (kind: DocumentKind, options: { course?: string } = {}): DocumentNoteProcessor => {
    const shared = { resourcesRoot: config.paths.resourcesRoot, course: options.course };
    switch (kind) {
      case 'pdf':
        return new PdfNoteProcessor(summarizer, { ...shared, extractor: overrides.pdfExtractor });
      case 'video':
        return new VideoNoteProcessor(summarizer, { ...shared, extensions: config.extensions.video });
      case 'markdown':
        return new MarkdownNoteProcessor(summarizer, shared);
    }
  };

  return {
    config,
    summarizer,
    createProcessor,
    createBatchProcessor: (kind, options) => new DocumentNoteBatchProcessor(createProcessor(kind, options))
  };
}
