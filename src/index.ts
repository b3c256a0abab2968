/**
 * storefront-core - Cart, stock reservation and order lifecycle engine
 *
 * @example
 * ```typescript
 * import { createStorefront, Money } from 'storefront-core';
 *
 * const shop = createStorefront();
 * const mug = shop.catalog.add({ name: 'Mug', price: Money.create(1250) });
 * shop.stock.addStock(mug.id, 5);
 *
 * const cart = shop.carts.forUser('user-1');
 * cart.addItem(mug.id, 2);
 *
 * const placed = await shop.workflow.createOrder({ cart, shippingAddress });
 * if (placed.ok) {
 *   const paid = await shop.workflow.pay(placed.value.id, 'credit_card', {
 *     cardNumber: '4111 1111 1111 1111',
 *     expiry: '12/30',
 *     cvv: '123',
 *   });
 * }
 * ```
 */

// Core
export {
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
  type Success,
  type Failure,
  type Status,
  type ResultHandlers,
  type ResultJSON,
} from './result.js';

export { Money, sum } from './money.js';

export {
  runInContext,
  getRequestContext,
  annotateContext,
  type RequestContext,
} from './context.js';

// Errors
export {
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
  InvalidMoneyError,
  CurrencyMismatchError,
  isStorefrontError,
  type ErrorCode,
  type PaymentErrorReason,
} from './errors.js';

// Configuration
export {
  configure,
  getConfiguration,
  resetConfiguration,
  configureFromEnv,
  parseEnvironment,
  createConfiguredLogger,
  defaultShippingCost,
  type StorefrontConfiguration,
  type EnvironmentOverrides,
} from './config.js';

// Components
export * from './catalog/index.js';
export * from './inventory/index.js';
export * from './cart/index.js';
export * from './payments/index.js';
export * from './orders/index.js';

export { KeyedLock, sortKeys, type Release } from './utils/keyed-lock.js';

export { createStorefront, type Storefront, type StorefrontOptions } from './storefront.js';

// Logging
export {
  Logger,
  createLogger,
  silentLogger,
  LineFormatter,
  JsonFormatter,
  KeyValueFormatter,
  createFormatter,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type LogFormat,
  type LogFormatter,
} from './logging/index.js';

// Middleware
export {
  MiddlewareStack,
  CorrelateMiddleware,
  RuntimeMiddleware,
  type Operation,
  type OperationMiddleware,
  type CorrelateOptions,
  type RuntimeOptions,
} from './middleware/index.js';
