import type { LogFormat, LogFormatter } from './types.js';
import { LineFormatter } from './line.js';
import { JsonFormatter } from './json.js';
import { KeyValueFormatter } from './keyvalue.js';

export type { LogFormat, LogFormatter } from './types.js';
export { LineFormatter } from './line.js';
export { JsonFormatter } from './json.js';
export { KeyValueFormatter } from './keyvalue.js';

/**
 * Build a built-in formatter by name
 */
export function createFormatter(format: LogFormat): LogFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'keyvalue':
      return new KeyValueFormatter();
    case 'line':
      return new LineFormatter();
  }
}
