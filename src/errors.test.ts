/**
 * Errors Tests
 */

import { describe, it, expect } from 'vitest';
import {
  StorefrontError,
  InsufficientStockError,
  InvalidQuantityError,
  EmptyCartError,
  InvalidTransitionError,
  PaymentError,
  ConfigurationError,
  ProductNotFoundError,
  OrderNotFoundError,
  InvalidAddressError,
  CurrencyMismatchError,
  isStorefrontError,
} from './errors.js';

describe('Errors', () => {
  describe('StorefrontError', () => {
    it('should default the code', () => {
      const error = new StorefrontError('Something broke');

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('StorefrontError');
      expect(error.code).toBe('STOREFRONT_ERROR');
      expect(error.message).toBe('Something broke');
    });

    it('should serialize name, code and message', () => {
      expect(new StorefrontError('Oops').toJSON()).toEqual({
        name: 'StorefrontError',
        code: 'STOREFRONT_ERROR',
        message: 'Oops',
      });
    });
  });

  describe('InsufficientStockError', () => {
    it('should carry the shortfall', () => {
      const error = new InsufficientStockError('sku-1', 5, 2);

      expect(error.code).toBe('INSUFFICIENT_STOCK');
      expect(error.productId).toBe('sku-1');
      expect(error.requested).toBe(5);
      expect(error.available).toBe(2);
      expect(error.message).toBe("Insufficient stock for product 'sku-1': requested 5, available 2");
    });

    it('should include details in JSON', () => {
      expect(new InsufficientStockError('sku-1', 5, 2).toJSON()).toEqual({
        name: 'InsufficientStockError',
        code: 'INSUFFICIENT_STOCK',
        message: "Insufficient stock for product 'sku-1': requested 5, available 2",
        productId: 'sku-1',
        requested: 5,
        available: 2,
      });
    });
  });

  it('should build default messages', () => {
    expect(new InvalidQuantityError(-1).message).toBe('Invalid quantity: -1');
    expect(new EmptyCartError('user-1').message).toBe("Cart of user 'user-1' is empty");
    expect(new InvalidTransitionError('CANCELLED', 'pay').message).toBe(
      "Cannot pay an order in status 'CANCELLED'"
    );
    expect(new PaymentError('declined').message).toBe('Payment failed: declined');
    expect(new ProductNotFoundError('sku-9').message).toBe("Product 'sku-9' not found");
    expect(new OrderNotFoundError('o-1').message).toBe("Order 'o-1' not found");
    expect(new InvalidAddressError(['city is required', 'country is required']).message).toBe(
      'Invalid shipping address: city is required; country is required'
    );
    expect(new CurrencyMismatchError('USD', 'EUR').message).toBe(
      'Cannot operate on different currencies: USD and EUR'
    );
  });

  it('should assign a code per class', () => {
    expect(new InvalidQuantityError(0).code).toBe('INVALID_QUANTITY');
    expect(new EmptyCartError('u').code).toBe('EMPTY_CART');
    expect(new InvalidTransitionError('PENDING', 'ship').code).toBe('INVALID_TRANSITION');
    expect(new PaymentError('timeout').code).toBe('PAYMENT_ERROR');
    expect(new ConfigurationError('missing').code).toBe('CONFIGURATION_ERROR');
    expect(new OrderNotFoundError('o').code).toBe('ORDER_NOT_FOUND');
  });

  it('should keep the payment reason', () => {
    const error = new PaymentError('invalid_payment_info', 'Invalid payment info: cvv');

    expect(error.reason).toBe('invalid_payment_info');
    expect(error.toJSON()).toMatchObject({ reason: 'invalid_payment_info', code: 'PAYMENT_ERROR' });
  });

  describe('isStorefrontError', () => {
    it('should recognize subclasses only', () => {
      expect(isStorefrontError(new EmptyCartError('u'))).toBe(true);
      expect(isStorefrontError(new Error('plain'))).toBe(false);
      expect(isStorefrontError('text')).toBe(false);
    });
  });
});
