/**
 * Log Formatter Types
 */

import type { LogEntry } from '../logger.js';

/**
 * Log formatter interface
 */
export interface LogFormatter {
  /**
   * Format a log entry into a string
   */
  format(entry: LogEntry): string;
}

/**
 * Names accepted by configuration for the built-in formatters
 */
export type LogFormat = 'line' | 'json' | 'keyvalue';
