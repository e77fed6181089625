/**
 * Error codes used throughout diffwatch.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'MirrorError'
  | 'HarvestError'
  | 'CheckpointError'
  | 'ProviderError'
  | 'NotificationError'
  | 'TimeoutError'
  | 'ProcessError'
  | 'PromptError'
  | 'PipelineError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all diffwatch errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('HarvestError', 'git log failed', {
 *   cause: originalError,
 *   details: { branch: 'main' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing environment variables or the config file.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the local mirror cannot be created.
 * A failed update of an existing mirror is not an error; it is logged and the
 * stale mirror is used.
 */
export class MirrorError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('MirrorError', message, options);
  }
}

/**
 * Error thrown when commits or diffs cannot be read from the mirror.
 */
export class HarvestError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('HarvestError', message, options);
  }
}

/**
 * Error thrown when the checkpoint store cannot be read or written.
 */
export class CheckpointError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CheckpointError', message, options);
  }
}

/**
 * Error thrown when the analysis service rejects a request or returns
 * something that is not a chat completion.
 */
export class AnalysisServiceError extends AppError {
  /** HTTP status of the failed response, when one was received */
  public readonly status?: number;
  /** Raw response body, when one was received */
  public readonly body?: string;

  constructor(
    message: string,
    options: AppErrorOptions & { status?: number; body?: string } = {},
  ) {
    super('ProviderError', message, {
      ...options,
      details: options.details ?? { status: options.status, body: options.body },
    });
    this.status = options.status;
    this.body = options.body;
  }
}

/**
 * Error thrown when the notification email cannot be delivered.
 */
export class NotificationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotificationError', message, options);
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when the analysis prompt cannot be composed.
 */
export class PromptError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PromptError', message, options);
  }
}

/**
 * Error thrown when the pipeline is driven through an illegal state transition.
 */
export class PipelineStateError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PipelineError', message, options);
  }
}

/**
 * Maps an error to the process exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}

/**
 * Coerces any thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
