/**
 * Request-scoped context via AsyncLocalStorage
 *
 * Set once at the boundary of an operation and read by the logger anywhere
 * downstream, including inside promise chains and timers.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContext {
  /** Correlates every log line of one operation */
  correlationId?: string;
  /** Workflow operation being executed */
  operation?: string;
  orderId?: string;
  userId?: string;
  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Run `fn` with `ctx` merged over the current context
 */
export function runInContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run({ ...getRequestContext(), ...ctx }, fn);
}

/**
 * Current request context, or an empty object outside `runInContext()`
 */
export function getRequestContext(): RequestContext {
  return storage.getStore() ?? {};
}

/**
 * Add fields to the active context. No-op outside `runInContext()`.
 */
export function annotateContext(fields: RequestContext): void {
  const store = storage.getStore();
  if (store) {
    Object.assign(store, fields);
  }
}
