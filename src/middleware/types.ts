/**
 * Operation middleware types
 */

import type { Result } from '../result.js';

/**
 * Workflow operation being executed, as seen by middleware
 */
export interface Operation {
  /** e.g. `createOrder`, `pay` */
  readonly name: string;
  readonly orderId?: string;
  readonly userId?: string;
}

/**
 * Wraps an operation. Must call `next` at most once and return its result
 * (or a result derived from it).
 */
export type OperationMiddleware = <T, E>(
  operation: Operation,
  next: () => Promise<Result<T, E>>
) => Promise<Result<T, E>>;

/**
 * Condition gating a middleware
 */
export type OperationCondition = (operation: Operation) => boolean;

export interface ConditionalOptions {
  /** Apply only when this returns true */
  if?: OperationCondition;
  /** Skip when this returns true */
  unless?: OperationCondition;
}

export function shouldApply(operation: Operation, options: ConditionalOptions): boolean {
  if (options.if !== undefined && !options.if(operation)) {
    return false;
  }
  if (options.unless !== undefined && options.unless(operation)) {
    return false;
  }
  return true;
}
