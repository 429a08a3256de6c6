import { describe, it, expect } from 'vitest';
import { hasFrontmatter, parseFrontmatter, removeFrontmatter, serializeFrontmatter } from '../utils/frontmatter';

describe('frontmatter helpers', () => {
  it('detects a leading frontmatter block', () => {
    expect(hasFrontmatter('---\ntitle: A\n---\nBody')).toBe(true);
    expect(hasFrontmatter('Body\n---\ntitle: A\n---')).toBe(false);
    expect(hasFrontmatter('no block here')).toBe(false);
  });

  it('removes the block and the blank lines after it', () => {
    expect(removeFrontmatter('---\ntitle: A\n---\n\n\nBody text')).toBe('Body text');
  });

  it('handles CRLF line endings', () => {
    expect(removeFrontmatter('---\r\ntitle: A\r\n---\r\nBody')).toBe('Body');
  });

  it('returns content without a block untouched', () => {
    expect(removeFrontmatter('  Body with --- inside')).toBe('  Body with --- inside');
  });

  it('returns an empty string when only frontmatter is present', () => {
    expect(removeFrontmatter('---\ntitle: A\n---')).toBe('');
  });

  it('parses the block into an object', () => {
    expect(parseFrontmatter('---\ntitle: Intro\ntags:\n  - a\n  - b\n---\nBody')).toEqual({
      title: 'Intro',
      tags: ['a', 'b'],
    });
  });

  it('parses to an empty object when the block is not a mapping', () => {
    expect(parseFrontmatter('---\n- just\n- a list\n---\nBody')).toEqual({});
    expect(parseFrontmatter('Body only')).toEqual({});
  });

  it('serializes values as YAML ending with a newline', () => {
    expect(serializeFrontmatter({ title: 'Intro', page_count: 3, tags: ['a', 'b'] })).toBe(
      'title: Intro\npage_count: 3\ntags:\n  - a\n  - b\n'
    );
  });

  it('quotes values that YAML would misread', () => {
    expect(serializeFrontmatter({ title: 'Part: One' })).toBe("title: 'Part: One'\n");
  });
});
