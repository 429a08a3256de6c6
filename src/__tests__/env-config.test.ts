/**
 * Tests for src/config/env.ts: parsing helpers and the config built from an
 * environment map.
 */

import { describe, it, expect } from 'vitest';
import {
  booleanFromEnv,
  buildConfigFromEnv,
  DEFAULT_VIDEO_EXTENSIONS,
  extensionsFromEnv,
  floatFromEnv,
  numberFromEnv,
} from '../config/env';

describe('env parsing helpers', () => {
  it('numberFromEnv parses integers and falls back on bad input', () => {
    expect(numberFromEnv('42', 1)).toBe(42);
    expect(numberFromEnv(undefined, 1)).toBe(1);
    expect(numberFromEnv('', 1)).toBe(1);
    expect(numberFromEnv('abc', 1)).toBe(1);
  });

  it('floatFromEnv parses decimals', () => {
    expect(floatFromEnv('0.7', 0.3)).toBe(0.7);
    expect(floatFromEnv('warm', 0.3)).toBe(0.3);
  });

  it('booleanFromEnv accepts true/false case-insensitively', () => {
    expect(booleanFromEnv('TRUE', false)).toBe(true);
    expect(booleanFromEnv('false', true)).toBe(false);
    expect(booleanFromEnv('yes', true)).toBe(true);
    expect(booleanFromEnv(undefined, false)).toBe(false);
  });

  it('extensionsFromEnv normalizes case and leading dots', () => {
    expect(extensionsFromEnv('MP4, .mov ,webm', [])).toEqual(['.mp4', '.mov', '.webm']);
    expect(extensionsFromEnv(' , ', ['.pdf'])).toEqual(['.pdf']);
    expect(extensionsFromEnv(undefined, ['.pdf'])).toEqual(['.pdf']);
  });
});

describe('buildConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    const appConfig = buildConfigFromEnv({});

    expect(appConfig).toEqual({
      paths: {
        promptsDir: undefined,
        notebookVaultRoot: 'Generated',
        resourcesRoot: undefined,
        failedFilesListName: 'failed_files.txt',
      },
      ai: {
        provider: 'none',
        model: 'gpt-4o-mini',
        baseUrl: undefined,
        apiKey: undefined,
        timeoutMs: 120000,
        maxRetries: 2,
        temperature: 0.3,
        maxTokens: 1000,
      },
      summarizer: { chunkSize: 8000, chunkOverlap: 500, maxChunkTokens: 3000 },
      extensions: { video: DEFAULT_VIDEO_EXTENSIONS },
      logging: { level: 'info' },
    });
  });

  it('selects openai when an API key is present', () => {
    const appConfig = buildConfigFromEnv({ OPENAI_API_KEY: 'test-secret' });

    expect(appConfig.ai.provider).toBe('openai');
    expect(appConfig.ai.apiKey).toBe('test-secret');
  });

  it('defaults the Ollama model and base URL', () => {
    const appConfig = buildConfigFromEnv({ AI_PROVIDER: 'Ollama' });

    expect(appConfig.ai.provider).toBe('ollama');
    expect(appConfig.ai.model).toBe('llama3.2:3b-instruct-q8_0');
    expect(appConfig.ai.baseUrl).toBe('http://127.0.0.1:11434');
  });

  it('applies explicit overrides', () => {
    const appConfig = buildConfigFromEnv({
      AI_PROVIDER: 'ollama',
      AI_MODEL: 'mistral',
      AI_BASE_URL: 'http://gpu-box:11434',
      AI_TIMEOUT_MS: '30000',
      AI_MAX_RETRIES: '0',
      AI_TEMPERATURE: '0.1',
      AI_MAX_TOKENS: '2048',
      PROMPTS_DIR: '/srv/prompts',
      NOTEBOOK_VAULT_ROOT: '/vault',
      RESOURCES_ROOT: '/resources',
      SUMMARY_CHUNK_SIZE: '4000',
      SUMMARY_CHUNK_OVERLAP: '200',
      SUMMARY_MAX_CHUNK_TOKENS: '1500',
      VIDEO_EXTENSIONS: 'mp4',
      LOG_LEVEL: 'DEBUG',
    });

    expect(appConfig.ai).toMatchObject({
      model: 'mistral',
      baseUrl: 'http://gpu-box:11434',
      timeoutMs: 30000,
      maxRetries: 0,
      temperature: 0.1,
      maxTokens: 2048,
    });
    expect(appConfig.paths).toMatchObject({
      promptsDir: '/srv/prompts',
      notebookVaultRoot: '/vault',
      resourcesRoot: '/resources',
    });
    expect(appConfig.summarizer).toEqual({ chunkSize: 4000, chunkOverlap: 200, maxChunkTokens: 1500 });
    expect(appConfig.extensions.video).toEqual(['.mp4']);
    expect(appConfig.logging.level).toBe('debug');
  });

  it('ignores unknown provider and log level values', () => {
    const appConfig = buildConfigFromEnv({ AI_PROVIDER: 'mystery', LOG_LEVEL: 'loud' });

    expect(appConfig.ai.provider).toBe('none');
    expect(appConfig.logging.level).toBe('info');
  });
});
