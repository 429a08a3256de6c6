import type { LogLevel } from '../utils/logger';

export type AiProvider = 'openai' | 'ollama' | 'none';

export interface AppConfig {
  paths: {
    /** Directory holding `<template>.md` prompt files */
    promptsDir?: string;
    /** Default output directory for generated notes */
    notebookVaultRoot: string;
    /** Root the source files live under; used for relative note paths */
    resourcesRoot?: string;
    /** File (inside the output directory) listing failed sources for --retry-failed */
    failedFilesListName: string;
  };
  ai: {
    provider: AiProvider;
    model: string;
    baseUrl?: string;
    apiKey?: string;
    timeoutMs: number;
    maxRetries: number;
    temperature: number;
    maxTokens: number;
  };
  summarizer: {
    chunkSize: number;
    chunkOverlap: number;
    maxChunkTokens: number;
  };
  extensions: {
    video: string[];
  };
  logging: {
    level: LogLevel;
  };
}

export type Env = Record<string, string | undefined>;

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const floatFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }

  if (value.toLowerCase() === 'true') {
    return true;
  }

  if (value.toLowerCase() === 'false') {
    return false;
  }

  return fallback;
};

/**
 * Comma-separated extension list. Entries are lower-cased and get a leading dot.
 */
export const extensionsFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) {
    return fallback;
  }

  const parsed = value
    .split(',')
    .map(s => s.trim().toLowerCase())
    .filter(Boolean)
    .map(s => (s.startsWith('.') ? s : `.${s}`));

  return parsed.length > 0 ? parsed : fallback;
};

const providerFromEnv = (value: string | undefined, fallback: AiProvider): AiProvider => {
  if (!value) {
    return fallback;
  }

  const normalized = value.toLowerCase();
  if (normalized === 'openai' || normalized === 'ollama' || normalized === 'none') {
    return normalized;
  }

  return fallback;
};

const logLevelFromEnv = (value: string | undefined, fallback: LogLevel): LogLevel => {
  if (!value) {
    return fallback;
  }

  const normalized = value.toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }

  return fallback;
};

export const DEFAULT_VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.webm', '.wmv', '.mpg', '.mpeg', '.m4v'];

const defaultModel = (provider: AiProvider): string =>
  provider === 'ollama' ? 'llama3.2:3b-instruct-q8_0' : 'gpt-4o-mini';

/**
 * Build the configuration from an environment map. Exposed so tests can pass
 * their own map instead of mutating process.env.
 */
export function buildConfigFromEnv(env: Env): AppConfig {
  const provider = providerFromEnv(env.AI_PROVIDER, env.OPENAI_API_KEY ? 'openai' : 'none');

  return {
    paths: {
      promptsDir: env.PROMPTS_DIR || undefined,
      notebookVaultRoot: env.NOTEBOOK_VAULT_ROOT ?? 'Generated',
      resourcesRoot: env.RESOURCES_ROOT || undefined,
      failedFilesListName: env.FAILED_FILES_LIST ?? 'failed_files.txt'
    },
    ai: {
      provider,
      model: env.AI_MODEL ?? defaultModel(provider),
      baseUrl: env.AI_BASE_URL || (provider === 'ollama' ? env.OLLAMA_BASE_URL || 'http://127.0.0.1:11434' : undefined),
      apiKey: env.OPENAI_API_KEY || undefined,
      timeoutMs: numberFromEnv(env.AI_TIMEOUT_MS, 120000),
      maxRetries: numberFromEnv(env.AI_MAX_RETRIES, 2),
      temperature: floatFromEnv(env.AI_TEMPERATURE, 0.3),
      maxTokens: numberFromEnv(env.AI_MAX_TOKENS, 1000)
    },
    summarizer: {
      chunkSize: numberFromEnv(env.SUMMARY_CHUNK_SIZE, 8000),
      chunkOverlap: numberFromEnv(env.SUMMARY_CHUNK_OVERLAP, 500),
      maxChunkTokens: numberFromEnv(env.SUMMARY_MAX_CHUNK_TOKENS, 3000)
    },
    extensions: {
      video: extensionsFromEnv(env.VIDEO_EXTENSIONS, DEFAULT_VIDEO_EXTENSIONS)
    },
    logging: {
      level: logLevelFromEnv(env.LOG_LEVEL, 'info')
    }
  };
}

export const config: AppConfig = buildConfigFromEnv(process.env);
