/**
 * Result - Explicit outcome of a stock, cart or order operation
 */

import type { StorefrontError } from './errors.js';

/**
 * Business outcome status
 */
export type Status = 'success' | 'failed';

/**
 * Successful outcome carrying a value
 */
export interface Success<T> {
  readonly ok: true;
  readonly status: 'success';
  readonly value: T;
}

/**
 * Failed outcome carrying the error that explains it
 */
export interface Failure<E> {
  readonly ok: false;
  readonly status: 'failed';
  readonly error: E;
}

/**
 * Immutable result of an operation. Narrow on `ok` (or `status`).
 *
 * @example
 * ```typescript
 * const result = ledger.reserve('sku-1', 2);
 * if (!result.ok) {
 *   console.log(result.error.available);
 * }
 * ```
 */
export type Result<T, E = StorefrontError> = Success<T> | Failure<E>;

/**
 * Handlers for {@link match}
 */
export interface ResultHandlers<T, E, R> {
  success: (value: T) => R;
  failed: (error: E) => R;
}

/**
 * JSON representation of a result, used in log entries
 */
export interface ResultJSON {
  status: Status;
  code?: string;
  reason?: string;
}

/**
 * Create a success result
 */
export function ok(): Success<void>;
export function ok<T>(value: T): Success<T>;
export function ok<T>(value?: T): Success<T | undefined> {
  const result: Success<T | undefined> = { ok: true, status: 'success', value };
  return Object.freeze(result);
}

/**
 * Create a failed result
 */
export function err<E>(error: E): Failure<E> {
  const result: Failure<E> = { ok: false, status: 'failed', error };
  return Object.freeze(result);
}

export function isSuccess<T, E>(result: Result<T, E>): result is Success<T> {
  return result.ok;
}

export function isFailure<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.ok;
}

/**
 * Transform the value of a success, passing failures through
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Transform the error of a failure, passing successes through
 */
export function mapError<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : err(fn(result.error));
}

/**
 * Return the value or throw the failure's error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/**
 * Fold a result into a single value
 */
export function match<T, E, R>(result: Result<T, E>, handlers: ResultHandlers<T, E, R>): R {
  return result.ok ? handlers.success(result.value) : handlers.failed(result.error);
}

/**
 * Serialize a result's outcome for logging
 */
export function toJSON<T, E>(result: Result<T, E>): ResultJSON {
  if (result.ok) {
    return { status: 'success' };
  }

  const error = result.error;
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : error.name;
    return { status: 'failed', code, reason: error.message };
  }
  return { status: 'failed', reason: String(error) };
}
