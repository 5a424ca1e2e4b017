/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the launcher. Every error carries the process
 * exit code the CLI should terminate with.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    exitCode: number = 1,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for malformed arguments and preset files
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 2, context);
  }
}

/**
 * Configuration error - for malformed environment settings
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 1, { configKey, ...context });
  }
}

/**
 * A required command-line option was not supplied
 */
export class MissingArgumentError extends AppError {
  public readonly option: string;

  constructor(option: string, context?: Record<string, unknown>) {
    super(`Missing required argument: ${option} <path>`, 'MISSING_ARGUMENT', 2, {
      option,
      ...context,
    });
    this.option = option;
  }
}

/**
 * Destination bootstrap or source snapshot failed. Nothing has been launched.
 */
export class BootstrapError extends AppError {
  public readonly path?: string;

  constructor(message: string, path?: string, context?: Record<string, unknown>) {
    super(message, 'BOOTSTRAP_ERROR', 1, { path, ...context });
    this.path = path;
  }
}

/**
 * The training executable could not be started
 */
export class LaunchError extends AppError {
  public readonly command: string;

  constructor(message: string, command: string, exitCode: number = 127, context?: Record<string, unknown>) {
    super(message, 'LAUNCH_ERROR', exitCode, { command, ...context });
    this.command = command;
  }
}

/**
 * Exit code for any thrown value; unknown errors map to 1
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof AppError) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Node.js errno code (ENOENT, EACCES, ...) of a thrown value, if it has one
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
