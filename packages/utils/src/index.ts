/**
 * @trainlaunch/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 * - Workspace root discovery
 */

export {
  logger,
  Logger,
  LogLevel,
  winstonLogger,
  createLogger,
  getLoggerConfig,
  resolveLogLevel,
  setLogLevel,
} from './logger.js';
export type { LogContext, LoggerConfig } from './logger.js';

export * from './config/index.js';

export * from './errors.js';

export { findWorkspaceRoot, clearWorkspaceRootCache } from './fs/workspace-root.js';
