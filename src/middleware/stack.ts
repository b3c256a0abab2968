/**
 * MiddlewareStack - ordered operation middlewares
 */

import type { Result } from '../result.js';
import type { Operation, OperationMiddleware } from './types.js';

/**
 * The first middleware registered is the outermost.
 *
 * @example
 * ```typescript
 * const stack = new MiddlewareStack()
 *   .use(CorrelateMiddleware())
 *   .use(RuntimeMiddleware({ logger }));
 *
 * await stack.run({ name: 'cancel', orderId }, () => workflow.cancel(orderId));
 * ```
 */
export class MiddlewareStack {
  private readonly middlewares: OperationMiddleware[] = [];

  constructor(middlewares: Iterable<OperationMiddleware> = []) {
    for (const middleware of middlewares) {
      this.use(middleware);
    }
  }

  use(middleware: OperationMiddleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  get size(): number {
    return this.middlewares.length;
  }

  run<T, E>(operation: Operation, fn: () => Promise<Result<T, E>>): Promise<Result<T, E>> {
    let next = fn;

    // Wrap in reverse so the first middleware ends up outermost
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const middleware = this.middlewares[i];
      if (middleware === undefined) continue;
      const inner = next;
      next = () => middleware(operation, inner);
    }

    return next();
  }
}
