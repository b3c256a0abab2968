/**
 * JSON Formatter - Compact JSON log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as compact JSON. Entry fields are flattened into the
 * top-level object; the reserved keys always win.
 *
 * @example
 * {"orderId":"0190...","total":2997,"level":"info","timestamp":"2024-05-02T10:15:00.000Z","pid":3784,"progname":"storefront","event":"order.placed"}
 */
export class JsonFormatter implements LogFormatter {
  private pretty: boolean;

  constructor(options?: { pretty?: boolean }) {
    this.pretty = options?.pretty ?? false;
  }

  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, event, fields } = entry;

    const obj: Record<string, unknown> = {
      ...fields,
      level,
      timestamp: timestamp.toISOString(),
      pid,
      progname,
      event,
    };

    return JSON.stringify(obj, null, this.pretty ? 2 : undefined);
  }
}
