/**
 * Document Note Batch Processor
 *
 * Runs one document processor over a file or a directory tree and writes a
 * Markdown note per source file. Per-file failures are logged, counted and
 * listed in the failed-files list so a later run can retry only those.
 *
 * @module services/batch-processor
 */

import { existsSync, statSync } from 'fs';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import path from 'path';
import { logger, runWithContext } from '../utils/logger';
import { errorMessage, isCancellationError, throwIfCancelled } from '../utils/errors';
import type { DocumentNoteProcessor } from './processors/document-note-processor';

export const NO_SUMMARY_PLACEHOLDER = '[Summary generation disabled by --no-summary flag.]';

export interface BatchProcessOptions {
  input: string;
  /** Output directory; defaults to `Generated` */
  output?: string;
  /** Extensions to pick up; defaults to the processor's own */
  extensions?: readonly string[];
  dryRun?: boolean;
  noSummary?: boolean;
  forceOverwrite?: boolean;
  retryFailed?: boolean;
  resourcesRoot?: string;
  failedFilesListName?: string;
  signal?: AbortSignal;
}

export interface BatchProcessResult {
  processed: number;
  failed: number;
  skipped: number;
  failedFiles: string[];
  /** Human-readable report for the CLI */
  summary: string;
  totalBatchTimeMs: number;
  totalSummaryTimeMs: number;
  totalTokens: number;
  averageFileTimeMs: number;
  averageSummaryTimeMs: number;
  averageTokens: number;
}

const failedResult = (summary: string): BatchProcessResult => ({
  processed: 0,
  failed: 1,
  skipped: 0,
  failedFiles: [],
  summary,
  totalBatchTimeMs: 0,
  totalSummaryTimeMs: 0,
  totalTokens: 0,
  averageFileTimeMs: 0,
  averageSummaryTimeMs: 0,
  averageTokens: 0
});

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const millis = Math.floor(ms % 1000);

  if (hours >= 1) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes >= 1) {
    return `${minutes}m ${seconds}s`;
  }
  if (seconds >= 1) {
    return `${seconds}s ${millis}ms`;
  }
  return `${millis}ms`;
}

export function formatAverage(ms: number): string {
  if (ms >= 60000) {
    const totalSeconds = Math.floor(ms / 1000);
    return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
  }
  if (ms >= 1000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  return `${ms.toFixed(0)}ms`;
}

export function formatBatchSummary(stats: Omit<BatchProcessResult, 'summary' | 'failedFiles'>): string {
  return [
    '',
    '================ Batch Processing Summary ================',
    `Files processed: ${stats.processed}`,
    `Files failed: ${stats.failed}`,
    `Files skipped: ${stats.skipped}`,
    `Total batch time: ${formatDuration(stats.totalBatchTimeMs)}`,
    `Average time per file: ${formatAverage(stats.averageFileTimeMs)}`,
    `Total summary time: ${formatDuration(stats.totalSummaryTimeMs)}`,
    `Average summary time per file: ${formatAverage(stats.averageSummaryTimeMs)}`,
    `Total tokens for all summaries: ${stats.totalTokens}`,
    `Average tokens per summary: ${stats.averageTokens.toFixed(2)}`,
    '==========================================================',
    ''
  ].join('\n');
}

const matchesExtension = (filePath: string, extensions: readonly string[]): boolean => {
  const lower = filePath.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
};

async function walk(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        return walk(full);
      }
      return entry.isFile() ? [full] : [];
    })
  );
  return nested.flat();
}

export class DocumentNoteBatchProcessor {
  constructor(private readonly processor: DocumentNoteProcessor) {}

  /**
   * Source files for `input`: every matching file under a directory, sorted,
   * or the input itself when it is a matching file. Undefined when the input
   * is neither.
   */
  async collectFiles(input: string, extensions: readonly string[]): Promise<string[] | undefined> {
    if (!existsSync(input)) {
      return undefined;
    }

    if (statSync(input).isDirectory()) {
      const files = (await walk(input)).filter((file) => matchesExtension(file, extensions)).sort();
      logger.info('Found files in directory', { count: files.length, dir: input });
      return files;
    }

    return matchesExtension(input, extensions) ? [input] : undefined;
  }

  async processDocuments(options: BatchProcessOptions): Promise<BatchProcessResult> {
    const {
      input,
      output = 'Generated',
      extensions = this.processor.supportedExtensions,
      dryRun = false,
      noSummary = false,
      forceOverwrite = false,
      retryFailed = false,
      resourcesRoot,
      failedFilesListName = 'failed_files.txt',
      signal
    } = options;

    if (!input || input.trim().length === 0) {
      logger.error('Input path is required');
      return failedResult('Error: Input path is required.');
    }

    let files = await this.collectFiles(input, extensions);
    if (!files) {
      logger.error('Input must be a file or directory containing valid files', { input, extensions });
      return failedResult('Error: Input must be a file or directory containing valid files.');
    }

    const failedListPath = path.join(output, failedFilesListName);
    if (retryFailed) {
      if (existsSync(failedListPath)) {
        const previous = new Set(
          (await readFile(failedListPath, 'utf-8'))
            .split(/\r?\n/)
            .map((line) => line.trim())
            .filter(Boolean)
        );
        files = files.filter((file) => previous.has(file));
        logger.info('Retrying previously failed files', { count: files.length });
      } else {
        logger.warn('No failed files list found for retry, processing all files', { failedListPath });
      }
    }

    const failedFiles: string[] = [];
    let processed = 0;
    let skipped = 0;
    let totalSummaryTimeMs = 0;
    let totalTokens = 0;
    const batchStart = Date.now();

    for (const filePath of files) {
      throwIfCancelled(signal);
      const fileStart = Date.now();

      try {
        const outcome = await runWithContext({ file: filePath }, async () => {
          const outputPath = path.join(output, `${path.basename(filePath, path.extname(filePath))}.md`);
          if (!forceOverwrite && existsSync(outputPath)) {
            logger.info('Skipping file, output already exists', { outputPath });
            return 'skipped' as const;
          }

          const { text, metadata } = await this.processor.extractTextAndMetadata(filePath, signal);
          if (resourcesRoot) {
            metadata.resources_root = resourcesRoot;
          }

          const summaryStart = Date.now();
          let summaryText: string | null;
          if (noSummary) {
            summaryText = NO_SUMMARY_PLACEHOLDER;
          } else {
            const variables = this.processor.buildSummaryVariables(text, metadata);
            summaryText = await this.processor.generateAiSummary(text, variables, signal);
            if (summaryText) {
              totalTokens += this.processor.estimateTokenCount(summaryText);
            }
          }
          totalSummaryTimeMs += Date.now() - summaryStart;

          const markdown = this.processor.generateMarkdownNote(summaryText, metadata);
          if (dryRun) {
            logger.info('Dry run, note not written', { outputPath });
          } else {
            await mkdir(output, { recursive: true });
            await writeFile(outputPath, markdown, 'utf-8');
            logger.info('Markdown note saved', { outputPath });
          }
          return 'processed' as const;
        });

        if (outcome === 'skipped') {
          skipped++;
        } else {
          processed++;
        }
      } catch (error) {
        if (isCancellationError(error)) {
          logger.warn('Batch processing cancelled', { filePath, processed });
          throw error;
        }
        logger.error('Failed to process file', { filePath, error: errorMessage(error) });
        failedFiles.push(filePath);
      }

      logger.debug('File processing finished', { filePath, durationMs: Date.now() - fileStart });
    }

    if (failedFiles.length > 0 && !dryRun) {
      await mkdir(output, { recursive: true });
      await writeFile(failedListPath, `${failedFiles.join('\n')}\n`, 'utf-8');
      logger.info('Wrote failed file list', { failedListPath });
    }

    const totalBatchTimeMs = Date.now() - batchStart;
    const stats = {
      processed,
      failed: failedFiles.length,
      skipped,
      totalBatchTimeMs,
      totalSummaryTimeMs,
      totalTokens,
      averageFileTimeMs: processed > 0 ? totalBatchTimeMs / processed : 0,
      averageSummaryTimeMs: processed > 0 ? totalSummaryTimeMs / processed : 0,
      averageTokens: processed > 0 ? totalTokens / processed : 0
    };

    logger.info('Document processing completed', {
      processed,
      failed: stats.failed,
      skipped,
      totalBatchTimeMs,
      totalTokens
    });

    return { ...stats, failedFiles, summary: formatBatchSummary(stats) };
  }
}
