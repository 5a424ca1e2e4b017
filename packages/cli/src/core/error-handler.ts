/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { BootstrapError, LaunchError, logger, MissingArgumentError } from '@trainlaunch/utils';

export const USAGE = 'Usage: trainlaunch --pathCheckpoint <path> [training arguments...]';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Add launcher-specific hints to the formatted message
 */
export function describeLaunchError(error: unknown): string {
  const message = formatError(error);

  if (error instanceof MissingArgumentError) {
    return `${message}\n${USAGE}`;
  }
  if (error instanceof BootstrapError) {
    return `${message}\nNothing was launched; the destination may be partially populated.`;
  }
  if (error instanceof LaunchError && error.exitCode === 127) {
    return `${message}\nCheck that '${error.command}' is installed and on PATH.`;
  }
  return message;
}

/**
 * Log error with full context (for debugging), never exposing secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  if (error instanceof Error) {
    logger.error('Launcher error', error, { context: sanitizedContext });
  } else {
    logger.error('Launcher error', String(error), { context: sanitizedContext });
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return describeLaunchError(error);
}
