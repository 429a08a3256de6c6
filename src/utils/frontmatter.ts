/**
 * YAML frontmatter helpers for prompt templates and generated notes.
 *
 * A frontmatter block is a `---` line at the very start of a document, YAML,
 * and a closing `---` line.
 */

import * as yaml from 'js-yaml';

const FRONTMATTER_PATTERN = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

export type FrontmatterValue = string | number | boolean | string[];
export type Frontmatter = Record<string, FrontmatterValue>;

export function hasFrontmatter(content: string): boolean {
  return FRONTMATTER_PATTERN.test(content);
}

/**
 * Drop a leading frontmatter block and the blank lines after it. Content
 * without one is returned untouched.
 */
export function removeFrontmatter(content: string): string {
  const match = FRONTMATTER_PATTERN.exec(content);
  if (!match) {
    return content;
  }
  return content.slice(match[0].length).replace(/^(?:[ \t]*\r?\n)+/, '');
}

/**
 * Parse the frontmatter block into a plain object. Returns `{}` when there is
 * no block or it does not hold a mapping.
 */
export function parseFrontmatter(content: string): Record<string, unknown> {
  const match = FRONTMATTER_PATTERN.exec(content);
  if (!match) {
    return {};
  }

  const parsed: unknown = yaml.load(match[1]);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

/**
 * YAML text for `data`, without delimiters. Always ends with a newline.
 */
export function serializeFrontmatter(data: Frontmatter): string {
  return yaml.dump(data, { lineWidth: -1, noRefs: true });
}
