/**
 * Video Note Processor
 *
 * Videos are summarized from a transcript found next to them; without one,
 * the note is built from file-system metadata alone.
 *
 * @module services/processors/video-note-processor
 */

import { readFile, stat } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { logger } from '../../utils/logger';
import { throwIfCancelled } from '../../utils/errors';
import { removeFrontmatter, type Frontmatter } from '../../utils/frontmatter';
import { DEFAULT_VIDEO_EXTENSIONS } from '../../config/env';
import { VIDEO_SUMMARY_PROMPT } from '../../ai/prompt-template-service';
import type { AISummarizer } from '../../ai/summarizer';
import { DocumentNoteProcessor, type DocumentNoteProcessorOptions, type ExtractedDocument } from './document-note-processor';

const TRANSCRIPT_EXTENSIONS = ['.txt', '.md'];
const TRANSCRIPTS_FOLDER = 'Transcripts';

export interface VideoNoteProcessorOptions extends DocumentNoteProcessorOptions {
  extensions?: readonly string[];
}

export class VideoNoteProcessor extends DocumentNoteProcessor {
  readonly noteType = 'video-reference';
  readonly promptFileName = VIDEO_SUMMARY_PROMPT;
  private readonly extensions: readonly string[];

  constructor(summarizer: AISummarizer, options: VideoNoteProcessorOptions = {}) {
    super(summarizer, options);
    this.extensions = options.extensions ?? DEFAULT_VIDEO_EXTENSIONS;
  }

  get supportedExtensions(): readonly string[] {
    return this.extensions;
  }

  /**
   * Transcript candidates in lookup order: `<base>.txt`, `<base>.md` beside
   * the video, then the same names in a `Transcripts/` folder beside it.
   */
  transcriptCandidates(videoPath: string): string[] {
    const dir = path.dirname(videoPath);
    const base = path.basename(videoPath, path.extname(videoPath));
    return [dir, path.join(dir, TRANSCRIPTS_FOLDER)].flatMap((folder) =>
      TRANSCRIPT_EXTENSIONS.map((ext) => path.join(folder, `${base}${ext}`))
    );
  }

  findTranscript(videoPath: string): string | undefined {
    const found = this.transcriptCandidates(videoPath).find((candidate) => existsSync(candidate));
    if (found) {
      logger.info('Found transcript for video', { videoPath, transcriptPath: found });
    } else {
      logger.info('No transcript found for video', { videoPath });
    }
    return found;
  }

  async extractTextAndMetadata(filePath: string, signal?: AbortSignal): Promise<ExtractedDocument> {
    throwIfCancelled(signal);

    const info = await stat(filePath);
    const metadata: Frontmatter = {
      ...this.baseMetadata(filePath),
      file_extension: path.extname(filePath).toLowerCase(),
      size_bytes: info.size,
      last_modified: info.mtime.toISOString()
    };

    const transcriptPath = this.findTranscript(filePath);
    if (transcriptPath) {
      const transcript = removeFrontmatter(await readFile(transcriptPath, 'utf-8'));
      metadata.transcript = path.basename(transcriptPath);
      throwIfCancelled(signal);
      return { text: transcript, metadata };
    }

    const placeholder = `Video file: ${path.basename(filePath)}\n(No transcript available. Using metadata only.)`;
    return { text: placeholder, metadata };
  }
}
