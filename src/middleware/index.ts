/**
 * Operation middleware
 *
 * Cross-cutting concerns wrapped around every order workflow operation.
 */

export { MiddlewareStack } from './stack.js';
export { CorrelateMiddleware, type CorrelateOptions } from './correlate.js';
export { RuntimeMiddleware, type RuntimeOptions } from './runtime.js';
export {
  shouldApply,
  type Operation,
  type OperationMiddleware,
  type OperationCondition,
  type ConditionalOptions,
} from './types.js';
