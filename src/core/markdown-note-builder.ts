/**
 * Assembles Markdown notes: a YAML frontmatter block followed by the body.
 *
 * @module core/markdown-note-builder
 */

import { serializeFrontmatter, type Frontmatter } from '../utils/frontmatter';

export class MarkdownNoteBuilder {
  /**
   * `---`, the frontmatter YAML, `---`, a blank line, then the body.
   */
  buildNote(frontmatter: Frontmatter, body: string): string {
    const trimmedBody = body.replace(/\s+$/, '');
    const header = this.createMarkdownWithFrontmatter(frontmatter);
    return trimmedBody.length > 0 ? `${header}\n${trimmedBody}\n` : header;
  }

  /**
   * Frontmatter-only note.
   */
  createMarkdownWithFrontmatter(frontmatter: Frontmatter): string {
    if (Object.keys(frontmatter).length === 0) {
      return '---\n---\n';
    }
    return `---\n${serializeFrontmatter(frontmatter)}---\n`;
  }
}
