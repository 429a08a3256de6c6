/**
 * PDF Note Processor
 *
 * @module services/processors/pdf-note-processor
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { throwIfCancelled } from '../../utils/errors';
import type { Frontmatter } from '../../utils/frontmatter';
import type { AISummarizer } from '../../ai/summarizer';
import { DocumentNoteProcessor, type DocumentNoteProcessorOptions, type ExtractedDocument } from './document-note-processor';

export interface PdfInfo {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
}

export interface PdfContent {
  text: string;
  pageCount: number;
  info: PdfInfo;
}

export interface PdfTextExtractor {
  extract(filePath: string): Promise<PdfContent>;
}

const pdfInfoSchema = z
  .object({
    Title: z.string().optional(),
    Author: z.string().optional(),
    Subject: z.string().optional(),
    Keywords: z.string().optional()
  })
  .passthrough();

/**
 * Extracts text with pdf-parse, loaded on first use.
 */
export class PdfParseTextExtractor implements PdfTextExtractor {
  async extract(filePath: string): Promise<PdfContent> {
    const { default: pdfParse } = await import('pdf-parse');
    const data = await pdfParse(await readFile(filePath));

    const info = pdfInfoSchema.safeParse(data.info);
    if (!info.success) {
      logger.debug('PDF info dictionary has an unexpected shape', { filePath });
    }
    const fields = info.success ? info.data : {};

    return {
      text: data.text,
      pageCount: data.numpages,
      info: {
        title: fields.Title?.trim() || undefined,
        author: fields.Author?.trim() || undefined,
        subject: fields.Subject?.trim() || undefined,
        keywords: fields.Keywords?.trim() || undefined
      }
    };
  }
}

export interface PdfNoteProcessorOptions extends DocumentNoteProcessorOptions {
  extractor?: PdfTextExtractor;
}

export class PdfNoteProcessor extends DocumentNoteProcessor {
  readonly noteType = 'pdf-reference';
  private readonly extractor: PdfTextExtractor;

  constructor(summarizer: AISummarizer, options: PdfNoteProcessorOptions = {}) {
    super(summarizer, options);
    this.extractor = options.extractor ?? new PdfParseTextExtractor();
  }

  get supportedExtensions(): readonly string[] {
    return ['.pdf'];
  }

  async extractTextAndMetadata(filePath: string, signal?: AbortSignal): Promise<ExtractedDocument> {
    throwIfCancelled(signal);
    logger.info('Extracting PDF text', { filePath });

    const content = await this.extractor.extract(filePath);
    throwIfCancelled(signal);

    const metadata: Frontmatter = {
      ...this.baseMetadata(filePath),
      page_count: content.pageCount
    };
    if (content.info.title) {
      metadata.title = content.info.title;
    }
    if (content.info.author) {
      metadata.author = content.info.author;
    }
    if (content.info.subject) {
      metadata.subject = content.info.subject;
    }
    if (content.info.keywords) {
      metadata.keywords = content.info.keywords
        .split(/[,;]/)
        .map((keyword) => keyword.trim())
        .filter(Boolean);
    }

    logger.debug('Extracted PDF text', { filePath, pages: content.pageCount, characters: content.text.length });
    return { text: content.text, metadata };
  }
}
