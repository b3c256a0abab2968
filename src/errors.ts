/**
 * Error taxonomy for storefront-core
 *
 * Business outcomes (insufficient stock, invalid transitions, declined
 * payments) travel as `Result` failures carrying one of these errors.
 * Programming errors and storage failures are thrown.
 */

/**
 * Stable machine-readable error codes
 */
export type ErrorCode =
  | 'STOREFRONT_ERROR'
  | 'INSUFFICIENT_STOCK'
  | 'INVALID_QUANTITY'
  | 'EMPTY_CART'
  | 'INVALID_TRANSITION'
  | 'PAYMENT_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'PRODUCT_NOT_FOUND'
  | 'ORDER_NOT_FOUND'
  | 'INVALID_ADDRESS'
  | 'INVALID_MONEY'
  | 'CURRENCY_MISMATCH';

/**
 * Base error class for all storefront-core errors
 */
export class StorefrontError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = 'STOREFRONT_ERROR') {
    super(message);
    this.name = 'StorefrontError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Fields worth logging besides the message */
  details(): Record<string, unknown> {
    return {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...this.details(),
    };
  }
}

/**
 * A reservation or cart edit asked for more units than are available
 */
export class InsufficientStockError extends StorefrontError {
  readonly productId: string;
  readonly requested: number;
  readonly available: number;

  constructor(productId: string, requested: number, available: number) {
    super(
      `Insufficient stock for product '${productId}': requested ${requested}, available ${available}`,
      'INSUFFICIENT_STOCK'
    );
    this.name = 'InsufficientStockError';
    this.productId = productId;
    this.requested = requested;
    this.available = available;
  }

  override details(): Record<string, unknown> {
    return { productId: this.productId, requested: this.requested, available: this.available };
  }
}

export class InvalidQuantityError extends StorefrontError {
  readonly quantity: number;

  constructor(quantity: number, message?: string) {
    super(message ?? `Invalid quantity: ${quantity}`, 'INVALID_QUANTITY');
    this.name = 'InvalidQuantityError';
    this.quantity = quantity;
  }

  override details(): Record<string, unknown> {
    return { quantity: this.quantity };
  }
}

export class EmptyCartError extends StorefrontError {
  readonly userId: string;

  constructor(userId: string) {
    super(`Cart of user '${userId}' is empty`, 'EMPTY_CART');
    this.name = 'EmptyCartError';
    this.userId = userId;
  }

  override details(): Record<string, unknown> {
    return { userId: this.userId };
  }
}

/**
 * A workflow guard rejected an event. State is left untouched.
 */
export class InvalidTransitionError extends StorefrontError {
  readonly fromStatus: string;
  readonly event: string;

  constructor(fromStatus: string, event: string, message?: string) {
    super(message ?? `Cannot ${event} an order in status '${fromStatus}'`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
    this.fromStatus = fromStatus;
    this.event = event;
  }

  override details(): Record<string, unknown> {
    return { fromStatus: this.fromStatus, event: this.event };
  }
}

/**
 * Why a processor refused or could not complete a payment operation
 */
export type PaymentErrorReason =
  | 'invalid_payment_info'
  | 'declined'
  | 'unreachable'
  | 'timeout'
  | 'refund_rejected';

export class PaymentError extends StorefrontError {
  readonly reason: PaymentErrorReason;

  constructor(reason: PaymentErrorReason, message?: string) {
    super(message ?? `Payment failed: ${reason}`, 'PAYMENT_ERROR');
    this.name = 'PaymentError';
    this.reason = reason;
  }

  override details(): Record<string, unknown> {
    return { reason: this.reason };
  }
}

/**
 * The system is misconfigured (e.g. no processor registered for a payment
 * method). Never retried.
 */
export class ConfigurationError extends StorefrontError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ProductNotFoundError extends StorefrontError {
  readonly productId: string;

  constructor(productId: string) {
    super(`Product '${productId}' not found`, 'PRODUCT_NOT_FOUND');
    this.name = 'ProductNotFoundError';
    this.productId = productId;
  }

  override details(): Record<string, unknown> {
    return { productId: this.productId };
  }
}

export class OrderNotFoundError extends StorefrontError {
  readonly orderId: string;

  constructor(orderId: string) {
    super(`Order '${orderId}' not found`, 'ORDER_NOT_FOUND');
    this.name = 'OrderNotFoundError';
    this.orderId = orderId;
  }

  override details(): Record<string, unknown> {
    return { orderId: this.orderId };
  }
}

export class InvalidAddressError extends StorefrontError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid shipping address: ${issues.join('; ')}`, 'INVALID_ADDRESS');
    this.name = 'InvalidAddressError';
    this.issues = issues;
  }

  override details(): Record<string, unknown> {
    return { issues: this.issues };
  }
}

export class InvalidMoneyError extends StorefrontError {
  constructor(message: string) {
    super(message, 'INVALID_MONEY');
    this.name = 'InvalidMoneyError';
  }
}

export class CurrencyMismatchError extends StorefrontError {
  constructor(currency1: string, currency2: string) {
    super(`Cannot operate on different currencies: ${currency1} and ${currency2}`, 'CURRENCY_MISMATCH');
    this.name = 'CurrencyMismatchError';
  }
}

/**
 * Check if a value is a storefront error
 */
export function isStorefrontError(value: unknown): value is StorefrontError {
  return value instanceof StorefrontError;
}
