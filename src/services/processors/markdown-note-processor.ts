/**
 * Markdown Note Processor
 *
 * Plain-text and HTML sources. HTML is reduced to its readable text.
 *
 * @module services/processors/markdown-note-processor
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { JSDOM } from 'jsdom';
import { logger } from '../../utils/logger';
import { AppError, ErrorCode, throwIfCancelled } from '../../utils/errors';
import type { Frontmatter } from '../../utils/frontmatter';
import { DocumentNoteProcessor, type ExtractedDocument } from './document-note-processor';

const TEXT_EXTENSIONS = ['.txt'];
const HTML_EXTENSIONS = ['.html', '.htm'];
const SUPPORTED_EXTENSIONS = [...TEXT_EXTENSIONS, ...HTML_EXTENSIONS];
const BLOCK_ELEMENTS = 'p, div, br, li, h1, h2, h3, h4, h5, h6, tr, section, article, blockquote, pre';

export interface HtmlText {
  title?: string;
  text: string;
}

/**
 * Visible text of an HTML document, one line per block element, plus its
 * `<title>` when present.
 */
export function htmlToText(html: string): HtmlText {
  const dom = new JSDOM(html);
  const document = dom.window.document;

  document.querySelectorAll('script, style, noscript, template').forEach((el) => el.remove());

  // Source line breaks are plain whitespace; only block boundaries end a line.
  const walker = document.createTreeWalker(document.body, dom.window.NodeFilter.SHOW_TEXT);
  for (let node = walker.nextNode(); node !== null; node = walker.nextNode()) {
    node.textContent = (node.textContent ?? '').replace(/\s+/g, ' ');
  }

  document.querySelectorAll(BLOCK_ELEMENTS).forEach((el) => el.append(document.createTextNode('\n')));

  const raw = document.body?.textContent ?? '';
  const text = raw
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');

  const title = document.title.trim();
  dom.window.close();

  return { title: title || undefined, text };
}

export class MarkdownNoteProcessor extends DocumentNoteProcessor {
  readonly noteType = 'note';

  get supportedExtensions(): readonly string[] {
    return SUPPORTED_EXTENSIONS;
  }

  async extractTextAndMetadata(filePath: string, signal?: AbortSignal): Promise<ExtractedDocument> {
    throwIfCancelled(signal);

    const extension = path.extname(filePath).toLowerCase();
    const metadata: Frontmatter = this.baseMetadata(filePath);

    if (TEXT_EXTENSIONS.includes(extension)) {
      const text = await readFile(filePath, 'utf-8');
      return { text, metadata };
    }

    if (HTML_EXTENSIONS.includes(extension)) {
      const html = await readFile(filePath, 'utf-8');
      throwIfCancelled(signal);
      const converted = htmlToText(html);
      if (converted.title) {
        metadata.title = converted.title;
      }
      logger.debug('Converted HTML to text', { filePath, characters: converted.text.length });
      return { text: converted.text, metadata };
    }

    throw new AppError(ErrorCode.UNSUPPORTED_FILE, `Unsupported file type: ${extension || '(none)'}`, { filePath });
  }
}
