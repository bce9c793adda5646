/**
 * Logger Utility
 *
 * Leveled, prefix-scoped logging for the service provider manager.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): Tracing detail, e.g. every probe result. Only shown when LOG_LEVEL=debug.
 *   - INFO  (1): Operational events such as startup, registrations and status changes. Default.
 *   - WARN  (2): Recoverable problems, e.g. a provider deleted while a scan was running.
 *   - ERROR (3): Failures that abort an operation. Always shown.
 *
 * USAGE:
 *
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('HEALTHCHECK');
 *
 *   log.info('Scan completed', { checked: 4, durationMs: 120 });
 *   log.error('Failed to list providers', extractError(err));
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] [REQ_ID] Message key=value key=value
 *
 *   [2026-01-15T10:30:45.123Z] INFO  [HEALTHCHECK] Provider health status changed name=kubevirt from=ready to=not_ready
 *
 * The request ID is only present for log lines written while handling an
 * HTTP request (see middleware/requestLogger).
 */

import { requestContext } from './requestContext';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const level = envLevel ? LOG_LEVEL_MAP[envLevel] : undefined;
  return level ?? LogLevel.INFO;
};

let currentLogLevel = getLogLevel();

// ANSI escape codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/**
 * Format context object as key=value pairs
 * Objects are JSON stringified, primitives are converted to strings
 */
export const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  return Object.entries(context)
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (value instanceof Date) {
        return `${key}=${value.toISOString()}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');
};

const write = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const timestamp = new Date().toISOString();

  const requestId = requestContext.get()?.requestId;
  const requestIdStr = requestId ? ` ${colors.dim}[${requestId}]${colors.reset}` : '';

  const formatted = formatContext(context);
  const contextStr = formatted ? ` ${colors.dim}${formatted}${colors.reset}` : '';

  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset}${requestIdStr} ${message}${contextStr}`
  );
};

/**
 * Logger interface returned by createLogger
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a specific prefix/module name
 *
 * @param prefix - Module identifier shown in log output (e.g., 'HEALTHCHECK', 'DB')
 *
 * @example
 * const log = createLogger('PROVIDERS');
 * log.info('Provider registered', { providerId: '123' });
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message, context) => {
      write(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message, context) => {
      write(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message, context) => {
      write(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message, context) => {
      write(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

/**
 * Default logger instance with 'APP' prefix
 */
export const logger = createLogger('APP');

/**
 * Update log level at runtime
 *
 * @param level - LogLevel enum value or one of 'debug', 'info', 'warn', 'error'
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const parsedLevel = LOG_LEVEL_MAP[level.toLowerCase()];
    if (parsedLevel !== undefined) {
      currentLogLevel = parsedLevel;
      logger.info('Log level changed', { level: level.toLowerCase() });
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await directory.listDueForHealthCheck(now);
 * } catch (error) {
 *   log.error('Failed to list providers', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  if (error instanceof Error) {
    return {
      error: error.message,
      ...(error.name && error.name !== 'Error' ? { errorName: error.name } : {}),
    };
  }
  return { error: String(error) };
}

export default logger;
