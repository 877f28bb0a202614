/**
 * Structured JSON logger for orgview
 *
 * Provides configurable logging with:
 * - JSON output format
 * - Configurable log levels (debug/info/warn/error/silent)
 * - Optional file output
 * - Timestamps and context metadata
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';
import { createWriteStream } from 'node:fs';
import type { LoggingConfig } from '../config/schema.js';

/**
 * Context metadata for log entries
 */
export interface LogContext {
  /** Node the operation starts from */
  nodeId?: string;
  /** Operation name */
  operation?: string;
  /** Number of distinct ids an ancestry query matches against */
  haystackSize?: number;
  /** Whether a hierarchy query stops one level below its start */
  directDescendantsOnly?: boolean;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Cache a lookup went to, and whether it was served from memory
 */
export interface CacheLookup {
  cache: string;
  key: string;
  hit: boolean;
}

/**
 * Logger instance type
 */
export type OrgViewLogger = Logger;

function createDestination(config: LoggingConfig): DestinationStream | undefined {
  if (config.file !== undefined && config.file !== '') {
    return createWriteStream(config.file, { flags: 'a' });
  }
  return undefined;
}

function createLoggerOptions(config: LoggingConfig): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'orgview',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  // Enable pretty printing for development
  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

/**
 * Create a configured logger instance
 *
 * @param config - Logging configuration
 * @returns Configured pino logger
 */
export function createLogger(config: LoggingConfig): OrgViewLogger {
  const options = createLoggerOptions(config);
  const destination = createDestination(config);

  if (destination !== undefined) {
    return pino(options, destination);
  }

  return pino(options);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(logger: OrgViewLogger, context: LogContext): OrgViewLogger {
  return logger.child(context);
}

let defaultLogger: OrgViewLogger | null = null;

/**
 * Get or create the default logger instance (info level, stdout, JSON)
 */
export function getLogger(): OrgViewLogger {
  defaultLogger ??= createLogger({
    level: 'info',
    pretty: false,
  });
  return defaultLogger;
}

/**
 * Replace the default logger, e.g. with one built from loaded configuration
 */
export function setDefaultLogger(logger: OrgViewLogger): void {
  defaultLogger = logger;
}

export function logCacheLookup(logger: OrgViewLogger, lookup: CacheLookup): void {
  logger.debug(
    lookup,
    lookup.hit
      ? `Cache hit in ${lookup.cache} for ${lookup.key}`
      : `Cache miss in ${lookup.cache} for ${lookup.key}`
  );
}

export function logOperationStart(
  logger: OrgViewLogger,
  operation: string,
  context?: LogContext
): void {
  logger.debug({ operation, ...context }, `Starting ${operation}`);
}

export function logOperationComplete(
  logger: OrgViewLogger,
  operation: string,
  durationMs: number,
  context?: LogContext
): void {
  logger.debug(
    { operation, durationMs, ...context },
    `Completed ${operation} in ${durationMs}ms`
  );
}

export function logOperationError(
  logger: OrgViewLogger,
  operation: string,
  error: Error,
  context?: LogContext
): void {
  logger.error(
    {
      operation,
      error: {
        message: error.message,
        name: error.name,
        stack: error.stack,
      },
      ...context,
    },
    `Failed ${operation}: ${error.message}`
  );
}

/**
 * Run an async operation, logging its start, completion and failure.
 * Failures are rethrown unchanged.
 *
 * @param summarize - extra context for the completion entry, built from the result
 */
export async function withLogging<T>(
  logger: OrgViewLogger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext,
  summarize?: (result: T) => LogContext
): Promise<T> {
  const start = Date.now();
  logOperationStart(logger, operation, context);

  try {
    const result = await fn();
    logOperationComplete(logger, operation, Date.now() - start, {
      ...context,
      ...summarize?.(result),
    });
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logOperationError(logger, operation, err, context);
    throw error;
  }
}
