/**
 * Logging Module
 *
 * Structured JSON logging with PII scrubbing.
 */

export {
  type LogLevel,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  silentLogger,
} from './logger.js';

export { type PIIPattern, type PIIScrubber, createPIIScrubber } from './piiScrubber.js';
