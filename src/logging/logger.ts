/**
 * Structured Logger for storefront-core
 */

import { getRequestContext } from '../context.js';
import type { LogFormatter } from './formatters/types.js';
import { LineFormatter } from './formatters/line.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry data
 */
export interface LogEntry {
  level: LogLevel;
  timestamp: Date;
  pid: number;
  progname: string;
  /** Dotted event name, e.g. `order.placed` */
  event: string;
  /** Static, request-context and per-call fields merged in that order */
  fields: Record<string, unknown>;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Output stream (default: process.stdout) */
  output?: NodeJS.WritableStream;
  /** Log formatter (default: LineFormatter) */
  formatter?: LogFormatter;
  /** Program name (default: 'storefront') */
  progname?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable/disable logging (default: true) */
  enabled?: boolean;
  /** Fields added to every entry */
  fields?: Record<string, unknown>;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured event logger.
 *
 * @example
 * ```typescript
 * const log = createLogger({ formatter: new JsonFormatter() });
 * log.info('order.placed', { orderId, total: 2997 });
 * ```
 */
export class Logger {
  private output: NodeJS.WritableStream;
  private formatter: LogFormatter;
  private progname: string;
  private level: LogLevel;
  private enabled: boolean;
  private readonly fields: Record<string, unknown>;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.formatter = options.formatter ?? new LineFormatter();
    this.progname = options.progname ?? 'storefront';
    this.level = options.level ?? 'info';
    this.enabled = options.enabled ?? true;
    this.fields = options.fields ?? {};
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Log an event at the given level
   */
  log(level: LogLevel, event: string, fields?: Record<string, unknown>): void {
    if (!this.enabled || !this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      timestamp: this.now(),
      pid: process.pid,
      progname: this.progname,
      event,
      fields: { ...this.fields, ...getRequestContext(), ...fields },
    };

    this.output.write(this.formatter.format(entry) + '\n');
  }

  debug(event: string, fields?: Record<string, unknown>): void {
    this.log('debug', event, fields);
  }

  info(event: string, fields?: Record<string, unknown>): void {
    this.log('info', event, fields);
  }

  warn(event: string, fields?: Record<string, unknown>): void {
    this.log('warn', event, fields);
  }

  error(event: string, fields?: Record<string, unknown>): void {
    this.log('error', event, fields);
  }

  /**
   * Logger sharing this one's settings with extra static fields
   */
  child(fields: Record<string, unknown>): Logger {
    return new Logger({
      output: this.output,
      formatter: this.formatter,
      progname: this.progname,
      level: this.level,
      enabled: this.enabled,
      fields: { ...this.fields, ...fields },
      now: this.now,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.enabled && this.shouldLog(level);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormatter(formatter: LogFormatter): void {
    this.formatter = formatter;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger that discards everything
 */
export function silentLogger(): Logger {
  return new Logger({ enabled: false });
}
