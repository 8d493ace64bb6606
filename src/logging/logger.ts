/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and
 * child loggers. Metadata is passed through the PII scrubber before it is
 * written, so denial and anomaly logs never carry raw identifiers.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';
import { createPIIScrubber, type PIIScrubber } from './piiScrubber.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  principalId?: string;
  role?: string;
  service?: string;
  operation?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  principalId?: string;
  role?: string;
  operation?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((entry) => entry === value);
}

/** Output sink for log entries. Defaults to one JSON line on stdout. */
export type LogOutput = (entry: LogEntry) => void;

const defaultLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Defaults to 'lendgate'. */
  service?: string;
  /** Minimum level to emit. Defaults to 'info'. */
  level?: LogLevel;
  context?: LogContext;
  output?: LogOutput;
  scrubber?: PIIScrubber;
  clock?: () => Date;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'lendgate';
  const minLevel = options.level ?? 'info';
  const output = options.output ?? defaultLogOutput;
  const scrubber = options.scrubber ?? createPIIScrubber();
  const clock = options.clock ?? (() => new Date());
  const context: LogContext = {
    ...options.context,
    correlationId: options.context?.correlationId ?? randomUUID(),
    service: options.context?.service ?? service,
  };

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: clock().toISOString(),
      level,
      message: scrubber.scrub(message),
      service: context.service ?? service,
      correlationId: context.correlationId ?? '',
    };

    if (context.principalId) entry.principalId = context.principalId;
    if (context.role) entry.role = context.role;
    if (context.operation) entry.operation = context.operation;
    if (metadata && Object.keys(metadata).length > 0) {
      entry.metadata = scrubber.scrubObject(metadata);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: scrubber.scrub(error.message),
        stack: error.stack,
      };
      if ('code' in error && typeof error.code === 'string') entry.error.code = error.code;
    }

    return entry;
  }

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message, metadata) {
      log('debug', message, undefined, metadata);
    },
    info(message, metadata) {
      log('info', message, undefined, metadata);
    },
    warn(message, metadata) {
      log('warn', message, undefined, metadata);
    },
    error(message, error, metadata) {
      log('error', message, error, metadata);
    },
    fatal(message, error, metadata) {
      log('fatal', message, error, metadata);
    },
    child(childContext: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...context, ...childContext },
        output,
        scrubber,
        clock,
      });
    },
  };
}

/** Logger that drops everything. Handy as a default for library classes. */
export const silentLogger: Logger = createLogger({ level: 'fatal', output: () => undefined });
