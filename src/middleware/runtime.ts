/**
 * Runtime Middleware - Measure and log each operation
 */

import { performance } from 'node:perf_hooks';
import { toJSON } from '../result.js';
import type { Logger } from '../logging/logger.js';
import { shouldApply, type ConditionalOptions, type OperationMiddleware } from './types.js';

export interface RuntimeOptions extends ConditionalOptions {
  logger: Logger;
}

/**
 * Logs `operation.completed` with the duration in milliseconds, measured on
 * a monotonic clock, and the outcome. A thrown error is logged as
 * `operation.errored` and rethrown.
 */
export function RuntimeMiddleware(options: RuntimeOptions): OperationMiddleware {
  const { logger } = options;

  return async (operation, next) => {
    if (!shouldApply(operation, options)) {
      return next();
    }

    const startTime = performance.now();
    try {
      const result = await next();
      const durationMs = Math.round(performance.now() - startTime);
      logger.info('operation.completed', {
        operation: operation.name,
        durationMs,
        ...toJSON(result),
      });
      return result;
    } catch (error) {
      const durationMs = Math.round(performance.now() - startTime);
      logger.error('operation.errored', { operation: operation.name, durationMs, error });
      throw error;
    }
  };
}
