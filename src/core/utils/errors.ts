/**
 * Error types and handling helpers shared by the watcher and the CLI.
 */

import logger from './logger.js';

// ============================================================================
// Custom Error Classes
// ============================================================================

export interface DropwatchErrorOptions {
  code?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all dropwatch errors
 */
export class DropwatchError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, options?: DropwatchErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = options?.code || 'DROPWATCH_ERROR';
    this.context = options?.context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON-serializable object
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

type SubclassOptions = Omit<DropwatchErrorOptions, 'code'>;

/**
 * Thrown when required configuration is missing or invalid. Fatal at startup.
 */
export class ConfigurationError extends DropwatchError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: 'CONFIG_ERROR' });
  }
}

/**
 * The watched directory is missing, not a directory, or the OS watch failed.
 * This is the only error that ends the dispatch loop.
 */
export class WatchUnavailableError extends DropwatchError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: 'WATCH_UNAVAILABLE' });
  }
}

/**
 * The pipeline process could not be launched at all (missing interpreter,
 * missing or non-executable entry point).
 */
export class JobStartFailureError extends DropwatchError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: 'JOB_START_FAILURE' });
  }
}

// ============================================================================
// Error Handling Utilities
// ============================================================================

export function isDropwatchError(error: unknown): error is DropwatchError {
  return error instanceof DropwatchError;
}

function messageOf(value: object): string {
  if ('message' in value && typeof value.message === 'string') return value.message;
  if ('error' in value && typeof value.error === 'string') return value.error;
  return JSON.stringify(value);
}

/**
 * Convert unknown error to Error object
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (typeof error === 'object' && error !== null) {
    return new Error(messageOf(error));
  }

  return new Error(String(error));
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'object' && error !== null) {
    return messageOf(error);
  }

  return String(error);
}

/**
 * Node system errors carry a string `code` such as `ENOENT`.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Log error with appropriate context
 */
export function logError(
  error: unknown,
  context?: string,
  additionalData?: Record<string, unknown>
): void {
  const err = toError(error);
  const errorData: Record<string, unknown> = {
    ...additionalData,
    context,
    code: getErrorCode(err),
    stack: err.stack,
  };

  if (isDropwatchError(err)) {
    errorData.errorContext = err.context;
  }

  logger.error(errorData, err.message);
}
