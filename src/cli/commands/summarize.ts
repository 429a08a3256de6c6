import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { AppError, ErrorCode } from '../../utils/errors';
import { removeFrontmatter } from '../../utils/frontmatter';
import { friendlyTitleFromFileName } from '../../utils/friendly-title';
import { createSummarizer } from '../../app';
import { resolveConfig, runCommand } from '../context';

interface SummarizeOptions {
  prompt?: string;
  course?: string;
  title?: string;
  output?: string;
}

export const summarizeCommand = new Command('summarize')
  .description('Summarize a text or Markdown file and print the result')
  .argument('<file>', 'File to summarize')
  .option('-p, --prompt <name>', 'Prompt template name (without .md)')
  .option('--course <name>', 'Course name passed to the prompt')
  .option('--title <title>', 'Title passed to the prompt (defaults to one derived from the file name)')
  .option('-o, --output <path>', 'Write the summary to a file instead of stdout')
  .action(async (file: string, options: SummarizeOptions, command: Command) => {
    await runCommand(async (signal) => {
      const appConfig = await resolveConfig(command);
      const summarizer = createSummarizer(appConfig);

      const text = removeFrontmatter(await readFile(file, 'utf-8'));
      const summary = await summarizer.summarizeWithVariables(
        text,
        {
          content: text,
          title: options.title ?? friendlyTitleFromFileName(file),
          course: options.course ?? '',
          type: 'note'
        },
        options.prompt,
        signal
      );

      if (summary === null) {
        throw new AppError(
          ErrorCode.CONFIGURATION_ERROR,
          'Summarization is unavailable: configure AI_PROVIDER (and OPENAI_API_KEY for openai).'
        );
      }
      if (summary.length === 0) {
        throw new AppError(ErrorCode.DEPENDENCY_ERROR, `No summary was produced for ${path.basename(file)}`);
      }

      if (options.output) {
        await writeFile(options.output, `${summary}\n`, 'utf-8');
        console.log(`Summary written to ${options.output}`);
      } else {
        console.log(summary);
      }
    });
  });
