import path from 'path';

const STRUCTURAL_WORDS = new Set(['lesson', 'lessons', 'module', 'modules', 'course', 'courses', 'and', 'to', 'of']);
const ROMAN_NUMERAL = /^(?:i{1,3}|iv|vi{0,3}|ix|x)$/i;
const FILE_EXTENSION = /^\.[A-Za-z0-9]{1,5}$/;
const ORDERING_PREFIX = /^(?:\d+[_\-\s]+)+/;
const MIN_TITLE_LENGTH = 3;

/**
 * Human-readable title from a file name.
 *
 * Ordering prefixes (`01_`, `1_1_`) and structural words (lesson, module,
 * course, and, to, of) are dropped, separators become spaces, lower-case
 * words are capitalized and roman numerals upper-cased. Words that already
 * carry capitals (acronyms) are kept. Blank input gives `Title`; anything
 * shorter than three characters after cleanup gives `Content`.
 *
 * @example
 * friendlyTitleFromFileName('01_Introduction_to_Finance.pdf') // 'Introduction Finance'
 */
export function friendlyTitleFromFileName(fileName: string): string {
  if (fileName.trim().length === 0) {
    return 'Title';
  }

  let base = path.basename(fileName);
  const extension = path.extname(base);
  if (FILE_EXTENSION.test(extension)) {
    base = base.slice(0, -extension.length);
  }

  const title = base
    .replace(ORDERING_PREFIX, '')
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0 && !STRUCTURAL_WORDS.has(word.toLowerCase()))
    .map((word) => {
      if (ROMAN_NUMERAL.test(word)) {
        return word.toUpperCase();
      }
      if (word !== word.toLowerCase()) {
        return word;
      }
      return word.charAt(0).toUpperCase() + word.slice(1);
    })
    .join(' ');

  return title.length < MIN_TITLE_LENGTH ? 'Content' : title;
}
