#!/usr/bin/env node
/**
 * notebook-automation CLI: turns course material into Markdown notes with AI summaries.
 */

import { Command } from 'commander';
import { summarizeCommand } from './commands/summarize';
import { markdownCommand, pdfNotesCommand, videoNotesCommand } from './commands/documents';
import { configCommand } from './commands/config';
import { readPackageVersion } from './context';

const program = new Command();

program
  .name('notebook-automation')
  .description('Generate Markdown study notes with AI summaries')
  .version(readPackageVersion())
  .option('-c, --config <path>', 'Path to a YAML or JSON config file')
  .option('-v, --verbose', 'Enable debug logging');

program.addCommand(summarizeCommand);
program.addCommand(pdfNotesCommand);
program.addCommand(videoNotesCommand);
program.addCommand(markdownCommand);
program.addCommand(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
