/**
 * Logging Module
 *
 * Structured JSON logging for the tracing module.
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
  createLogger,
} from './logger.js';
