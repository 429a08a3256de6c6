/**
 * Config File Loader
 *
 * Reads an optional YAML (or JSON) config file, validates it and merges it
 * over the environment-derived configuration.
 *
 * @module config/config-file
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { AppError, ErrorCode, errorMessage } from '../utils/errors';
import { config as envConfig, type AppConfig } from './env';

const extensionList = z
  .array(z.string().min(1))
  .transform(list => list.map(ext => {
    const lower = ext.toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
  }));

/**
 * Every field is optional: the file only overrides what it names.
 */
export const configFileSchema = z.object({
  paths: z.object({
    prompts_dir: z.string().optional(),
    notebook_vault_root: z.string().optional(),
    resources_root: z.string().optional(),
    failed_files_list: z.string().optional()
  }).strict().optional(),
  ai: z.object({
    provider: z.enum(['openai', 'ollama', 'none']).optional(),
    model: z.string().optional(),
    base_url: z.string().url().optional(),
    timeout_ms: z.number().int().positive().optional(),
    max_retries: z.number().int().min(0).optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional()
  }).strict().optional(),
  summarizer: z.object({
    chunk_size: z.number().int().positive().optional(),
    chunk_overlap: z.number().int().min(0).optional(),
    max_chunk_tokens: z.number().int().positive().optional()
  }).strict().optional(),
  extensions: z.object({
    video: extensionList.optional()
  }).strict().optional(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional()
  }).strict().optional()
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export const CONFIG_FILE_NAMES = ['config.yaml', 'config.yml', 'config.json'];

/**
 * Look for a config file in the usual places: the working directory, its
 * `config/` folder, then `~/.notebook-automation/`.
 */
export function findConfigFile(cwd: string = process.cwd(), home: string = os.homedir()): string | undefined {
  const dirs = [cwd, path.join(cwd, 'config'), path.join(home, '.notebook-automation')];

  for (const dir of dirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
  }

  return undefined;
}

/**
 * Merge a validated config file over `base`. Relative paths in the file are
 * resolved against the file's own directory.
 */
export function mergeConfig(base: AppConfig, file: ConfigFile, fileDir: string): AppConfig {
  const resolvePath = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(fileDir, value);

  const provider = file.ai?.provider ?? base.ai.provider;

  return {
    paths: {
      promptsDir: resolvePath(file.paths?.prompts_dir) ?? base.paths.promptsDir,
      notebookVaultRoot: resolvePath(file.paths?.notebook_vault_root) ?? base.paths.notebookVaultRoot,
      resourcesRoot: resolvePath(file.paths?.resources_root) ?? base.paths.resourcesRoot,
      failedFilesListName: file.paths?.failed_files_list ?? base.paths.failedFilesListName
    },
    ai: {
      provider,
      model: file.ai?.model ?? base.ai.model,
      baseUrl: file.ai?.base_url ?? base.ai.baseUrl,
      // Keys stay in the environment, never in the file.
      apiKey: base.ai.apiKey,
      timeoutMs: file.ai?.timeout_ms ?? base.ai.timeoutMs,
      maxRetries: file.ai?.max_retries ?? base.ai.maxRetries,
      temperature: file.ai?.temperature ?? base.ai.temperature,
      maxTokens: file.ai?.max_tokens ?? base.ai.maxTokens
    },
    summarizer: {
      chunkSize: file.summarizer?.chunk_size ?? base.summarizer.chunkSize,
      chunkOverlap: file.summarizer?.chunk_overlap ?? base.summarizer.chunkOverlap,
      maxChunkTokens: file.summarizer?.max_chunk_tokens ?? base.summarizer.maxChunkTokens
    },
    extensions: {
      video: file.extensions?.video ?? base.extensions.video
    },
    logging: {
      level: file.logging?.level ?? base.logging.level
    }
  };
}

/**
 * Cross-field checks the schema cannot express. Applies to the merged result,
 * so values coming from the environment are covered too.
 */
export function validateConfig(appConfig: AppConfig, source: string): void {
  const { chunkSize, chunkOverlap, maxChunkTokens } = appConfig.summarizer;
  const problems: string[] = [];

  if (chunkSize <= 0) {
    problems.push('summarizer chunk size must be positive');
  }
  if (chunkOverlap < 0) {
    problems.push('summarizer chunk overlap must not be negative');
  }
  if (chunkSize > 0 && chunkOverlap >= chunkSize) {
    problems.push('summarizer chunk overlap must be smaller than the chunk size');
  }
  if (maxChunkTokens <= 0) {
    problems.push('summarizer max chunk tokens must be positive');
  }

  if (problems.length > 0) {
    throw new AppError(ErrorCode.CONFIGURATION_ERROR, `Invalid configuration (${source}): ${problems.join('; ')}`, {
      summarizer: appConfig.summarizer
    });
  }
}

/**
 * Load the effective configuration. With no explicit path, NOTEBOOK_CONFIG and
 * then the standard locations are tried; finding nothing is not an error.
 */
export async function loadConfig(
  configPath?: string,
  base: AppConfig = envConfig
): Promise<AppConfig> {
  const explicit = configPath ?? process.env.NOTEBOOK_CONFIG;
  const resolved = explicit ?? findConfigFile();

  if (!resolved) {
    logger.debug('No config file found, using environment configuration');
    validateConfig(base, 'environment');
    return base;
  }

  if (explicit && !existsSync(explicit)) {
    throw new AppError(ErrorCode.CONFIGURATION_ERROR, `Configuration file not found: ${explicit}`);
  }

  let raw: unknown;
  try {
    const content = await readFile(resolved, 'utf-8');
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `Failed to read configuration file ${resolved}: ${errorMessage(error)}`
    );
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `Invalid configuration file ${resolved}`,
      parsed.error.flatten()
    );
  }

  const merged = mergeConfig(base, parsed.data, path.dirname(path.resolve(resolved)));
  validateConfig(merged, resolved);

  logger.info('Loaded configuration file', { configPath: resolved, provider: merged.ai.provider });
  return merged;
}
