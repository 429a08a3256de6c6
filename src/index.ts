export { AISummarizer, outcomeToText } from './ai/summarizer';
export type { AISummarizerOptions, SummarizeRequest, SummaryOutcome, EmptyReason } from './ai/summarizer';
export {
  PromptTemplateService,
  CHUNK_SUMMARY_PROMPT,
  FINAL_SUMMARY_PROMPT,
  VIDEO_SUMMARY_PROMPT,
  DEFAULT_CHUNK_PROMPT,
  DEFAULT_FINAL_PROMPT,
  DEFAULT_VIDEO_FINAL_PROMPT
} from './ai/prompt-template-service';
export type { PromptService, PromptVariables, PromptTemplateServiceOptions } from './ai/prompt-template-service';
export { GenerationHttpError } from './ai/text-generation';
export type { TextGenerator, GenerateOptions } from './ai/text-generation';
export { OllamaTextGenerator } from './ai/ollama-generator';
export { OpenAiTextGenerator } from './ai/openai-generator';
export type { ChatCompletionClient } from './ai/openai-generator';
export { createTextGenerator } from './ai/generator-factory';
export { DefaultTextChunkingService, CHARS_PER_TOKEN } from './core/text-chunking';
export type { TextChunkingService } from './core/text-chunking';
export { MarkdownNoteBuilder } from './core/markdown-note-builder';
export { DocumentNoteProcessor } from './services/processors/document-note-processor';
export type { ExtractedDocument, DocumentNoteProcessorOptions } from './services/processors/document-note-processor';
export { PdfNoteProcessor, PdfParseTextExtractor } from './services/processors/pdf-note-processor';
export type { PdfTextExtractor, PdfContent, PdfInfo } from './services/processors/pdf-note-processor';
export { VideoNoteProcessor } from './services/processors/video-note-processor';
export { MarkdownNoteProcessor, htmlToText } from './services/processors/markdown-note-processor';
export { DocumentNoteBatchProcessor } from './services/batch-processor';
export type { BatchProcessOptions, BatchProcessResult } from './services/batch-processor';
export { createServices, createSummarizer } from './app';
export type { DocumentKind, NotebookServices, ServiceOverrides } from './app';
export { buildConfigFromEnv, config } from './config/env';
export type { AppConfig, AiProvider } from './config/env';
export { loadConfig } from './config/config-file';
export {
  AppError,
  ErrorCode,
  ArgumentError,
  ArgumentNullError,
  ArgumentOutOfRangeError,
  OperationCancelledError,
  describeError
} from './utils/errors';
export { logger } from './utils/logger';
