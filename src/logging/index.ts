/**
 * storefront-core Logging
 *
 * Structured event logging with pluggable formatters.
 */

export {
  Logger,
  createLogger,
  silentLogger,
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

export {
  type LogFormat,
  type LogFormatter,
  LineFormatter,
  JsonFormatter,
  KeyValueFormatter,
  createFormatter,
} from './formatters/index.js';
