import { Command } from 'commander';
import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger, runWithContext, generateBatchId, setLogLevel } from '../utils/logger';
import { describeError, isCancellationError } from '../utils/errors';
import { loadConfig } from '../config/config-file';
import type { AppConfig } from '../config/env';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

const packageSchema = z.object({ version: z.string() });

export function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(path.resolve(__dirname, '..', '..', 'package.json'), 'utf-8'));
    const parsed = packageSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Effective configuration for a command: the config file (from --config or
 * the usual locations) over the environment, with --verbose forcing debug logs.
 */
export async function resolveConfig(command: Command): Promise<AppConfig> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const resolved = await loadConfig(globals.config);
  setLogLevel(globals.verbose ? 'debug' : resolved.logging.level);
  return resolved;
}

/**
 * Run a command body with an AbortSignal tied to SIGINT. Errors are printed
 * and turned into the exit code; a cancelled run exits with 130.
 */
export async function runCommand(action: (signal: AbortSignal) => Promise<void>): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CANCELLED);
    }
    console.error('Cancelling... press Ctrl+C again to force quit.');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    await runWithContext({ batchId: generateBatchId() }, () => action(controller.signal));
  } catch (error) {
    if (isCancellationError(error)) {
      logger.warn('Operation cancelled');
      console.error('Operation cancelled.');
      process.exitCode = EXIT_CANCELLED;
      return;
    }
    const described = describeError(error);
    logger.error('Command failed', { error: described.error, message: described.message });
    console.error(`Error: ${described.message}`);
    if (described.details !== undefined) {
      console.error(JSON.stringify(described.details, null, 2));
    }
    process.exitCode = EXIT_FAILURE;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
