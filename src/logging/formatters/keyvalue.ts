/**
 * KeyValue Formatter - key=value pairs for log parsing
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as key=value pairs, suitable for log parsing systems.
 *
 * @example
 * level=info timestamp="2024-05-02T10:15:00.000Z" pid=3784 progname="storefront" event="order.placed" order_id="0190..."
 */
export class KeyValueFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, event, fields } = entry;

    const parts: string[] = [
      `level=${level}`,
      `timestamp="${timestamp.toISOString()}"`,
      `pid=${pid}`,
      `progname="${progname}"`,
      `event="${escapeString(event)}"`,
    ];

    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      parts.push(`${toSnakeCase(key)}=${formatValue(value)}`);
    }

    return parts.join(' ');
  }
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (typeof value === 'object') {
    return `"${escapeString(JSON.stringify(value))}"`;
  }
  return String(value);
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function toSnakeCase(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}
