import type { PipelineEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout diffwatch.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'RunStarted', ... });
 *
 * // Standard logging
 * logger.info('Email sent successfully.');
 * logger.error(new Error('Failed'), 'Failed to send email');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ repo: 'myrepo' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured pipeline event.
   */
  log(event: PipelineEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: PipelineEvent, message: string): MaybePromise<void>;

  /** Log a debug message (only shown in verbose mode) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All messages from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
