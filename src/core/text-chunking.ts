/**
 * Character-window text chunking used to keep prompts inside model context limits.
 *
 * @module core/text-chunking
 */

import { ArgumentError, ArgumentNullError, ArgumentOutOfRangeError } from '../utils/errors';

/** Characters per token assumed by the estimate. */
export const CHARS_PER_TOKEN = 4;

export interface TextChunkingService {
  /**
   * Split `text` into windows of at most `chunkSize` characters, each starting
   * `chunkSize - overlap` characters after the previous one.
   */
  splitIntoChunks(text: string, chunkSize: number, overlap: number): string[];

  /**
   * Rough token count: `ceil(length / 4)`, or 0 for blank text.
   */
  estimateTokenCount(text: string | null | undefined): number;
}

export class DefaultTextChunkingService implements TextChunkingService {
  splitIntoChunks(text: string | null | undefined, chunkSize: number, overlap: number): string[] {
    if (text === null || text === undefined) {
      throw new ArgumentNullError('text');
    }
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ArgumentOutOfRangeError('chunkSize', 'Chunk size must be a positive integer');
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new ArgumentOutOfRangeError('overlap', 'Overlap must be a non-negative integer');
    }
    if (overlap >= chunkSize) {
      throw new ArgumentError('Overlap must be less than chunk size', 'overlap');
    }

    if (text.length === 0) {
      return [];
    }
    if (text.length <= chunkSize) {
      return [text];
    }

    const step = chunkSize - overlap;
    const chunks: string[] = [];
    for (let start = 0; ; start += step) {
      const end = Math.min(start + chunkSize, text.length);
      chunks.push(text.slice(start, end));
      if (end === text.length) {
        break;
      }
    }

    return chunks;
  }

  estimateTokenCount(text: string | null | undefined): number {
    if (!text || text.trim().length === 0) {
      return 0;
    }
    return Math.ceil(text.length / CHARS_PER_TOKEN);
  }
}
