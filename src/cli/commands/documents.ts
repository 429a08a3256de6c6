import { Command } from 'commander';
import { createServices, type DocumentKind } from '../../app';
import { AppError, ErrorCode } from '../../utils/errors';
import { resolveConfig, runCommand } from '../context';

interface DocumentCommandOptions {
  output?: string;
  dryRun?: boolean;
  summary: boolean;
  force?: boolean;
  retryFailed?: boolean;
  resourcesRoot?: string;
  course?: string;
}

/**
 * Batch command for one document kind: `pdf-notes`, `video-notes`, `markdown`.
 */
export function createDocumentCommand(name: string, kind: DocumentKind, description: string): Command {
  return new Command(name)
    .description(description)
    .argument('<input>', 'Source file or directory (searched recursively)')
    .option('-o, --output <dir>', 'Output directory for generated notes (defaults to the vault root)')
    .option('--dry-run', 'Process files without writing notes')
    .option('--no-summary', 'Skip AI summaries')
    .option('-f, --force', 'Overwrite notes that already exist')
    .option('--retry-failed', 'Only process files listed in the previous run\'s failed files list')
    .option('--resources-root <dir>', 'Root directory of the source files')
    .option('--course <name>', 'Course name recorded in each note')
    .action(async (input: string, options: DocumentCommandOptions, command: Command) => {
      await runCommand(async (signal) => {
        const appConfig = await resolveConfig(command);
        const resourcesRoot = options.resourcesRoot ?? appConfig.paths.resourcesRoot;
        const services = createServices({
          ...appConfig,
          paths: { ...appConfig.paths, resourcesRoot }
        });

        const batch = services.createBatchProcessor(kind, { course: options.course });
        const result = await batch.processDocuments({
          input,
          output: options.output ?? appConfig.paths.notebookVaultRoot,
          dryRun: options.dryRun ?? false,
          noSummary: !options.summary,
          forceOverwrite: options.force ?? false,
          retryFailed: options.retryFailed ?? false,
          resourcesRoot,
          failedFilesListName: appConfig.paths.failedFilesListName,
          signal
        });

        console.log(result.summary);
        if (result.failed > 0) {
          throw new AppError(ErrorCode.INTERNAL_ERROR, `${result.failed} file(s) failed`, { failedFiles: result.failedFiles });
        }
      });
    });
}

export const pdfNotesCommand = createDocumentCommand('pdf-notes', 'pdf', 'Generate Markdown notes from PDF files');
export const videoNotesCommand = createDocumentCommand('video-notes', 'video', 'Generate Markdown notes from videos and their transcripts');
export const markdownCommand = createDocumentCommand('markdown', 'markdown', 'Generate Markdown notes from text and HTML files');
