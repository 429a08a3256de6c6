/**
 * Document Note Processor
 *
 * Shared behaviour for turning one source document into a Markdown note:
 * extraction is left to the concrete processor, while prompt variables, the
 * summary call and the note layout live here.
 *
 * @module services/processors/document-note-processor
 */

import path from 'path';
import { logger } from '../../utils/logger';
import { serializeFrontmatter, type Frontmatter, type FrontmatterValue } from '../../utils/frontmatter';
import { friendlyTitleFromFileName } from '../../utils/friendly-title';
import { MarkdownNoteBuilder } from '../../core/markdown-note-builder';
import type { AISummarizer } from '../../ai/summarizer';
import type { PromptVariables } from '../../ai/prompt-template-service';

export interface ExtractedDocument {
  text: string;
  metadata: Frontmatter;
}

export interface DocumentNoteProcessorOptions {
  /** Source files live under this directory; used for `onedrive_path` */
  resourcesRoot?: string;
  /** Course name recorded in the note and passed to prompts */
  course?: string;
  noteBuilder?: MarkdownNoteBuilder;
}

export interface MarkdownNoteOptions {
  /** Emit the frontmatter block only */
  suppressBody?: boolean;
}

const asText = (value: FrontmatterValue | undefined): string => {
  if (value === undefined) {
    return '';
  }
  return Array.isArray(value) ? value.join(', ') : String(value);
};

export abstract class DocumentNoteProcessor {
  /** Value of the `type` frontmatter field */
  abstract readonly noteType: string;
  /** Prompt template used for the summary; the summarizer default when unset */
  readonly promptFileName?: string;

  protected readonly resourcesRoot?: string;
  protected readonly course?: string;
  protected readonly noteBuilder: MarkdownNoteBuilder;

  constructor(
    protected readonly summarizer: AISummarizer,
    options: DocumentNoteProcessorOptions = {}
  ) {
    this.resourcesRoot = options.resourcesRoot;
    this.course = options.course;
    this.noteBuilder = options.noteBuilder ?? new MarkdownNoteBuilder();
  }

  /** File extensions this processor reads, lower-case with a leading dot */
  abstract get supportedExtensions(): readonly string[];

  abstract extractTextAndMetadata(filePath: string, signal?: AbortSignal): Promise<ExtractedDocument>;

  /** Token estimate used for batch statistics. */
  estimateTokenCount(text: string): number {
    return this.summarizer.chunkingService.estimateTokenCount(text);
  }

  /**
   * Metadata every note carries: file name, source path, title, type, and
   * course and `onedrive_path` when known.
   */
  protected baseMetadata(filePath: string): Frontmatter {
    const metadata: Frontmatter = {
      title: friendlyTitleFromFileName(filePath),
      type: this.noteType,
      file_name: path.basename(filePath),
      source_file: path.resolve(filePath)
    };

    if (this.course) {
      metadata.course = this.course;
    }

    const relative = this.relativeToResourcesRoot(filePath);
    if (relative !== undefined) {
      metadata.onedrive_path = relative;
    }

    return metadata;
  }

  /**
   * Forward-slash path of `filePath` under the resources root, or undefined
   * when no root is configured or the file lies outside it.
   */
  protected relativeToResourcesRoot(filePath: string): string | undefined {
    if (!this.resourcesRoot) {
      return undefined;
    }
    const relative = path.relative(path.resolve(this.resourcesRoot), path.resolve(filePath));
    if (relative.length === 0 || relative.startsWith('..') || path.isAbsolute(relative)) {
      return undefined;
    }
    return relative.split(path.sep).join('/');
  }

  buildSummaryVariables(text: string, metadata: Frontmatter): PromptVariables {
    return {
      content: text,
      course: asText(metadata.course) || (this.course ?? ''),
      type: asText(metadata.type) || this.noteType,
      title: asText(metadata.title),
      onedrivePath: asText(metadata.onedrive_path),
      yamlfrontmatter: serializeFrontmatter(metadata)
    };
  }

  /**
   * Summary text, or null when summarization is unavailable or produced
   * nothing. Cancellation propagates.
   */
  async generateAiSummary(
    text: string,
    variables?: PromptVariables,
    signal?: AbortSignal,
    promptFileName: string | undefined = this.promptFileName
  ): Promise<string | null> {
    logger.info('Starting AI summary generation', {
      noteType: this.noteType,
      characters: text.length,
      estimatedTokens: this.estimateTokenCount(text),
      promptFileName: promptFileName ?? 'default'
    });

    const summary = await this.summarizer.summarizeWithVariables(text, variables, promptFileName, signal);

    if (summary === null) {
      logger.warn('AI summarization is unavailable, note will have no summary', { noteType: this.noteType });
      return null;
    }
    if (summary.trim().length === 0) {
      logger.warn('AI summarizer returned an empty summary', { noteType: this.noteType });
      return null;
    }

    logger.info('Generated AI summary', {
      characters: summary.length,
      estimatedTokens: this.estimateTokenCount(summary)
    });
    return summary;
  }

  /**
   * Frontmatter, a `# <title>` heading, then the summary when there is one.
   */
  generateMarkdownNote(summary: string | null, metadata: Frontmatter, options: MarkdownNoteOptions = {}): string {
    if (options.suppressBody) {
      return this.noteBuilder.createMarkdownWithFrontmatter(metadata);
    }

    const title = asText(metadata.title) || this.noteType;
    const body = summary && summary.trim().length > 0 ? `# ${title}\n\n${summary.trim()}` : `# ${title}`;
    return this.noteBuilder.buildNote(metadata, body);
  }
}
