/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, optional log rotation,
 * and context propagation.
 *
 * Console output goes to stderr at every level: stdout belongs to the training
 * process being teed.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

// Log context interface
export interface LogContext {
  destination?: string;
  command?: string;
  path?: string;
  [key: string]: unknown;
}

// Logger configuration interface
export interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  silent: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

/**
 * Effective level: LOG_LEVEL wins, tracing lowers the default to debug
 */
export function resolveLogLevel(trace: boolean, env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL || (trace ? 'debug' : 'info');
}

/**
 * Resolve logger configuration from environment variables
 */
export function getLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: resolveLogLevel(false, env),
    enableConsole: env.LOG_CONSOLE !== 'false',
    // File logging is opt-in: the launcher runs from arbitrary working directories
    enableFile: env.LOG_FILE === 'true',
    silent: env.NODE_ENV === 'test',
    logDir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
  };
}

const defaultConfig = getLoggerConfig();

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? ' ' + metaStr : ''}`;
  })
);

function buildTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
        stderrLevels: Object.values(LogLevel),
      })
    );
  }

  if (config.enableFile && !config.silent) {
    fs.mkdirSync(config.logDir, { recursive: true });

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: structuredFormat,
        maxSize: config.maxSize,
        maxFiles: config.maxFiles,
        zippedArchive: true,
      })
    );

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        format: structuredFormat,
        maxSize: config.maxSize,
        maxFiles: config.maxFiles,
        zippedArchive: true,
      })
    );
  }

  return transports;
}

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'trainlaunch' },
  transports: buildTransports(defaultConfig),
  silent: defaultConfig.silent,
  exitOnError: false,
});

// Logger class with package namespacing
class Logger {
  private readonly namespace: string;

  constructor(namespace: string = 'trainlaunch') {
    this.namespace = namespace;
  }

  private mergeContext(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...context };
  }

  /**
   * Log error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }
}

/**
 * Change the level of every logger at runtime (console transport inherits it)
 */
export function setLogLevel(level: string): void {
  winstonLogger.level = level;
}

// Factory function to create package-specific loggers
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

// Default logger
export const logger = new Logger('trainlaunch');

export { Logger };

// Export winston logger for advanced usage
export { winstonLogger };
