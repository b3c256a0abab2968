/**
 * Line Formatter - Traditional single-line log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as traditional single-line format.
 *
 * @example
 * I, [2024-05-02T10:15:00.000Z #3784] INFO -- storefront: order.placed order_id="0190..." total=2997
 */
export class LineFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, event, fields } = entry;
    const levelChar = level.charAt(0).toUpperCase();
    const levelUpper = level.toUpperCase();
    const ts = timestamp.toISOString();

    const parts: string[] = [event];
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      parts.push(`${toSnakeCase(key)}=${formatValue(value)}`);
    }

    return `${levelChar}, [${ts} #${pid}] ${levelUpper} -- ${progname}: ${parts.join(' ')}`;
  }
}

function formatObject(value: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    parts.push(`${key}: ${formatValue(item)}`);
  }
  return `{${parts.join(', ')}}`;
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (value instanceof Error) return `"${escapeString(value.message)}"`;
  if (typeof value === 'object') return formatObject(toPlain(value));
  return String(value);
}

/** Objects with a toJSON (Money, errors) render as their JSON form */
function toPlain(value: object): Record<string, unknown> {
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const json: unknown = value.toJSON();
    if (typeof json === 'object' && json !== null) {
      return Object.fromEntries(Object.entries(json));
    }
    return { value: json };
  }
  return Object.fromEntries(Object.entries(value));
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function toSnakeCase(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}
