/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Interface for logging throughout cartwright.
 *
 * @example
 * ```typescript
 * logger.info('Update Carthage for platform iOS');
 * logger.error(new Error('Failed'), 'carthage update failed');
 *
 * // Create a child logger with additional context
 * const taskLogger = logger.child({ task: 'bootstrap' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, hidden unless verbose) */
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
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
