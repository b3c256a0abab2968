/**
 * Correlate Middleware - Tag every log line of an operation with one id
 */

import { getRequestContext, runInContext } from '../context.js';
import { generateCorrelationId } from '../utils/ids.js';
import { shouldApply, type ConditionalOptions, type Operation, type OperationMiddleware } from './types.js';

export interface CorrelateOptions extends ConditionalOptions {
  /** Correlation ID or function to generate one */
  id?: string | ((operation: Operation) => string);
}

/**
 * Runs the operation inside a request context carrying a correlation id
 * together with the operation name, order id and user id. An id already in
 * the surrounding context is reused, so nested operations share it.
 *
 * @example
 * ```typescript
 * new MiddlewareStack().use(CorrelateMiddleware({ id: () => request.headers['x-request-id'] }));
 * ```
 */
export function CorrelateMiddleware(options: CorrelateOptions = {}): OperationMiddleware {
  return (operation, next) => {
    if (!shouldApply(operation, options)) {
      return next();
    }

    const correlationId = resolveCorrelationId(operation, options.id);
    return runInContext(
      {
        correlationId,
        operation: operation.name,
        ...(operation.orderId !== undefined && { orderId: operation.orderId }),
        ...(operation.userId !== undefined && { userId: operation.userId }),
      },
      next
    );
  };
}

function resolveCorrelationId(
  operation: Operation,
  value?: string | ((operation: Operation) => string)
): string {
  if (typeof value === 'function') {
    return value(operation);
  }
  if (typeof value === 'string') {
    return value;
  }
  return getRequestContext().correlationId ?? generateCorrelationId();
}
