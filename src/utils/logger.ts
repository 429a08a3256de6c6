/*
 * Structured JSON logger with per-file context correlation.
 *
 * Lines go to stderr so that commands printing notes or summaries keep stdout clean.
 */
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  batchId?: string;
  file?: string;
  [key: string]: unknown;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(levelPriority, value);

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let threshold = isLogLevel(envLevel) ? levelPriority[envLevel] : levelPriority.info;

const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
  if (levelPriority[level] < threshold) {
    return;
  }

  const context = asyncLocalStorage.getStore() || {};

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
    ...meta
  };

  console.error(JSON.stringify(payload));
};

/**
 * Change the minimum level at runtime (the CLI's --verbose flag).
 */
export const setLogLevel = (level: LogLevel): void => {
  threshold = levelPriority[level];
};

export const getLogContext = (): LogContext => {
  return asyncLocalStorage.getStore() || {};
};

/**
 * Run `fn` with `context` merged over the current context. Every log line
 * emitted inside, including across awaits, carries the merged fields.
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run({ ...getLogContext(), ...context }, fn);
};

export const generateBatchId = (): string => {
  return randomUUID();
};

/**
 * Short preview of a possibly long value for log metadata.
 */
export const preview = (value: string, max = 100): string =>
  value.length > max ? `${value.slice(0, max)}...` : value;

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log('error', message, meta)
};
