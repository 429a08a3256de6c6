/**
 * Error taxonomy shared by the summarization core, the processors and the CLI.
 *
 * @module utils/errors
 */

import { ZodError } from 'zod';

/**
 * Standard error codes
 */
export enum ErrorCode {
  INVALID_ARGUMENT = 'invalid_argument',
  ARGUMENT_NULL = 'argument_null',
  ARGUMENT_OUT_OF_RANGE = 'argument_out_of_range',
  CONFIGURATION_ERROR = 'configuration_error',
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  UNSUPPORTED_FILE = 'unsupported_file',
  CANCELLED = 'cancelled',
  TIMEOUT = 'timeout',
  DEPENDENCY_ERROR = 'dependency_error',
  INTERNAL_ERROR = 'internal_error'
}

/**
 * Custom application error class
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A caller passed an invalid argument. Programmer error: never swallowed.
 */
export class ArgumentError extends AppError {
  constructor(
    message: string,
    public readonly paramName: string,
    code: ErrorCode = ErrorCode.INVALID_ARGUMENT
  ) {
    super(code, `${message} (parameter '${paramName}')`);
    this.name = 'ArgumentError';
  }
}

export class ArgumentNullError extends ArgumentError {
  constructor(paramName: string) {
    super('Value cannot be null or undefined', paramName, ErrorCode.ARGUMENT_NULL);
    this.name = 'ArgumentNullError';
  }
}

export class ArgumentOutOfRangeError extends ArgumentError {
  constructor(paramName: string, message: string) {
    super(message, paramName, ErrorCode.ARGUMENT_OUT_OF_RANGE);
    this.name = 'ArgumentOutOfRangeError';
  }
}

/**
 * The caller's AbortSignal fired. Crosses every layer unchanged.
 */
export class OperationCancelledError extends AppError {
  constructor(message = 'The operation was cancelled', options?: { cause?: unknown }) {
    super(ErrorCode.CANCELLED, message);
    this.name = 'OperationCancelledError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Recognizes our own cancellation error and the AbortError raised by fetch and
 * the AI SDKs when a signal fires.
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof OperationCancelledError) {
    return true;
  }
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

/**
 * Throw OperationCancelledError when `signal` has already been aborted.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(undefined, { cause: signal.reason });
  }
}

export interface ErrorDescription {
  error: ErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Normalize any thrown value into a printable description.
 */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof ZodError) {
    return {
      error: ErrorCode.VALIDATION_ERROR,
      message: 'Validation failed',
      details: error.flatten()
    };
  }

  if (error instanceof AppError) {
    return {
      error: error.code,
      message: error.message,
      details: error.details
    };
  }

  if (error instanceof Error) {
    return {
      error: ErrorCode.INTERNAL_ERROR,
      message: error.message || 'An unexpected error occurred'
    };
  }

  return {
    error: ErrorCode.INTERNAL_ERROR,
    message: String(error)
  };
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
