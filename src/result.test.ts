/**
 * Result Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ok,
  err,
  isSuccess,
  isFailure,
  map,
  mapError,
  unwrap,
  unwrapOr,
  match,
  toJSON,
  type Result,
} from './result.js';
import { InsufficientStockError, StorefrontError } from './errors.js';

describe('Result', () => {
  describe('ok', () => {
    it('should create a frozen success', () => {
      const result = ok(42);

      expect(result.ok).toBe(true);
      expect(result.status).toBe('success');
      expect(result.value).toBe(42);
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should allow an empty success', () => {
      expect(ok().value).toBeUndefined();
    });
  });

  describe('err', () => {
    it('should create a frozen failure', () => {
      const error = new StorefrontError('nope');
      const result = err(error);

      expect(result.ok).toBe(false);
      expect(result.status).toBe('failed');
      expect(result.error).toBe(error);
      expect(Object.isFrozen(result)).toBe(true);
    });
  });

  describe('predicates', () => {
    it('should narrow on status', () => {
      const success: Result<number> = ok(1);
      const failure: Result<number> = err(new StorefrontError('x'));

      expect(isSuccess(success)).toBe(true);
      expect(isFailure(success)).toBe(false);
      expect(isSuccess(failure)).toBe(false);
      expect(isFailure(failure)).toBe(true);
    });
  });

  describe('map / mapError', () => {
    it('should transform only the matching side', () => {
      const success: Result<number, string> = ok(2);
      const failure: Result<number, string> = err('bad');

      expect(map(success, (n) => n * 10)).toEqual(ok(20));
      expect(map(failure, (n: number) => n * 10)).toBe(failure);
      expect(mapError(failure, (e) => e.toUpperCase())).toEqual(err('BAD'));
      expect(mapError(success, (e: string) => e.toUpperCase())).toBe(success);
    });
  });

  describe('unwrap', () => {
    it('should return the value or throw the error', () => {
      const error = new StorefrontError('boom');

      expect(unwrap(ok('v'))).toBe('v');
      expect(() => unwrap(err(error))).toThrow(error);
    });

    it('should fall back with unwrapOr', () => {
      expect(unwrapOr(err('x'), 7)).toBe(7);
      expect(unwrapOr(ok(3), 7)).toBe(3);
    });
  });

  describe('match', () => {
    it('should fold both sides', () => {
      const handlers = {
        success: (n: number) => `got ${n}`,
        failed: (e: string) => `error ${e}`,
      };

      expect(match(ok(5), handlers)).toBe('got 5');
      expect(match(err('late'), handlers)).toBe('error late');
    });
  });

  describe('toJSON', () => {
    it('should serialize a success', () => {
      expect(toJSON(ok(1))).toEqual({ status: 'success' });
    });

    it('should use the error code of storefront errors', () => {
      const result = err(new InsufficientStockError('sku-1', 3, 1));

      expect(toJSON(result)).toEqual({
        status: 'failed',
        code: 'INSUFFICIENT_STOCK',
        reason: "Insufficient stock for product 'sku-1': requested 3, available 1",
      });
    });

    it('should fall back to the error name and to plain values', () => {
      expect(toJSON(err(new TypeError('bad type')))).toEqual({
        status: 'failed',
        code: 'TypeError',
        reason: 'bad type',
      });
      expect(toJSON(err('plain'))).toEqual({ status: 'failed', reason: 'plain' });
    });
  });
});
