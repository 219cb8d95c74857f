/**
 * Error codes used throughout cartwright.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ToolNotFoundError'
  | 'SubprocessError'
  | 'ToolchainError'
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
 * Base error class for all cartwright errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('SubprocessError', 'carthage exited with code 1', {
 *   cause: originalError,
 *   details: { exitCode: 1 }
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
 * User-correctable - suggests fixing configuration files.
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
 * Error thrown when an executable could not be found in any of the
 * locations that were searched.
 */
export class ToolNotFoundError extends AppError {
  /** Name of the executable that was looked up */
  public readonly toolName: string;

  constructor(toolName: string, message: string, options: AppErrorOptions = {}) {
    super('ToolNotFoundError', message, options);
    this.toolName = toolName;
  }
}

/**
 * Error thrown when a subprocess fails to start or exits nonzero.
 * Includes the process exit code when available.
 */
export class SubprocessError extends AppError {
  /** Exit code of the failed process, null when it never ran or was killed */
  public readonly exitCode: number | null;
  /** The argv that was executed */
  public readonly command: readonly string[];

  constructor(
    message: string,
    options: AppErrorOptions & { exitCode?: number | null; command?: readonly string[] } = {},
  ) {
    super('SubprocessError', message, options);
    this.exitCode = options.exitCode ?? null;
    this.command = options.command ?? [];
  }
}

/**
 * Error thrown when the Xcode toolchain cannot be detected or the
 * required Xcode version is not installed.
 */
export class ToolchainError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolchainError', message, options);
  }
}

/**
 * Exit code for an error surfaced at the CLI boundary.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
