/**
 * OrderWorkflow - cart to order conversion and the order lifecycle
 *
 * The only component that reserves or releases stock on behalf of orders.
 * Every operation on an existing order holds that order's lock. Order
 * creation holds the cart owner's lock, and the locks of the products it
 * reserves while reserving and persisting.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  CurrencyMismatchError,
  EmptyCartError,
  InsufficientStockError,
  InvalidAddressError,
  InvalidQuantityError,
  InvalidTransitionError,
  OrderNotFoundError,
  PaymentError,
  ProductNotFoundError,
} from '../errors.js';
import { ok, err, type Result } from '../result.js';
import { Money } from '../money.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { MiddlewareStack } from '../middleware/stack.js';
import type { Operation } from '../middleware/types.js';
import type { Cart, CartLine } from '../cart/cart.js';
import type { Product, ProductCatalog } from '../catalog/product-catalog.js';
import type { StockLedger } from '../inventory/stock-ledger.js';
import type { PaymentProcessorRegistry } from '../payments/registry.js';
import type { PaymentInfo, PaymentMethod, Receipt } from '../payments/types.js';
import { Order, type OrderLine, type ShippingAddress } from './order.js';
import type { OrderStore } from './order-store.js';
import { createEvent, type EventBus, type OrderEvent } from './events.js';

// ============================================
// Types
// ============================================

export interface OrderWorkflowDependencies {
  catalog: ProductCatalog;
  stock: StockLedger;
  store: OrderStore;
  payments: PaymentProcessorRegistry;
  events?: EventBus;
  logger?: Logger;
  /** Wraps every operation (default: empty stack) */
  middleware?: MiddlewareStack;
  /** Shipping cost of new orders (default: zero in `currency`) */
  shippingCost?: Money;
  /** Currency of new orders (default: USD) */
  currency?: string;
  now?: () => Date;
}

export interface CreateOrderInput {
  /** Converted into the order and cleared; its owner becomes the buyer */
  cart: Cart;
  shippingAddress: ShippingAddress;
}

export type PaymentOutcome =
  | { status: 'COMPLETED'; order: Order; receipt: Receipt }
  | { status: 'FAILED'; order: Order; error: PaymentError };

export type CreateOrderError =
  | EmptyCartError
  | InvalidAddressError
  | ProductNotFoundError
  | InsufficientStockError
  | InvalidQuantityError
  | CurrencyMismatchError;

export type PayError = OrderNotFoundError | InvalidTransitionError | ConfigurationError;

export type TransitionError = OrderNotFoundError | InvalidTransitionError;

export type RefundError = OrderNotFoundError | InvalidTransitionError | PaymentError | ConfigurationError;

const ShippingAddressSchema = z.object({
  street: z.string().trim().min(1, 'is required'),
  city: z.string().trim().min(1, 'is required'),
  state: z.string().trim().min(1, 'is required'),
  postalCode: z.string().trim().min(1, 'is required'),
  country: z.string().trim().min(1, 'is required'),
});

/**
 * Validate and trim a shipping address
 */
export function parseShippingAddress(input: unknown): Result<ShippingAddress, InvalidAddressError> {
  const parsed = ShippingAddressSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new InvalidAddressError(
        parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message
        )
      )
    );
  }
  return ok(parsed.data);
}

// ============================================
// Workflow
// ============================================

/**
 * @example
 * ```typescript
 * const placed = await workflow.createOrder({ cart, shippingAddress });
 * if (placed.ok) {
 *   const paid = await workflow.pay(placed.value.id, 'wallet', { provider: 'acme', walletId: 'w-1' });
 * }
 * ```
 */
export class OrderWorkflow {
  private readonly catalog: ProductCatalog;
  private readonly stock: StockLedger;
  private readonly store: OrderStore;
  private readonly payments: PaymentProcessorRegistry;
  private readonly events?: EventBus;
  private readonly logger: Logger;
  private readonly middleware: MiddlewareStack;
  private readonly shippingCost: Money;
  private readonly now: () => Date;
  private readonly orderLocks = new KeyedLock();
  private readonly cartLocks = new KeyedLock();

  constructor(deps: OrderWorkflowDependencies) {
    this.catalog = deps.catalog;
    this.stock = deps.stock;
    this.store = deps.store;
    this.payments = deps.payments;
    this.events = deps.events;
    this.logger = (deps.logger ?? silentLogger()).child({ component: 'order-workflow' });
    this.middleware = deps.middleware ?? new MiddlewareStack();
    this.shippingCost = deps.shippingCost ?? Money.zero(deps.currency ?? 'USD');
    this.now = deps.now ?? (() => new Date());
  }

  // ==================== Creation ====================

  /**
   * Convert a cart into a PENDING order, reserving stock for every line.
   * Either every line is reserved or none is.
   */
  createOrder(input: CreateOrderInput): Promise<Result<Order, CreateOrderError>> {
    const { userId } = input.cart;
    return this.run({ name: 'createOrder', userId }, () =>
      this.cartLocks.runExclusive(userId, () => this.checkout(input))
    );
  }

  /**
   * Runs holding the cart's lock, so a cart is converted at most once
   */
  private async checkout(input: CreateOrderInput): Promise<Result<Order, CreateOrderError>> {
    const { cart } = input;
    const cartLines = cart.snapshot();
    if (cartLines.length === 0) {
      return err(new EmptyCartError(cart.userId));
    }

    const address = parseShippingAddress(input.shippingAddress);
    if (!address.ok) {
      this.logger.warn('order.address_rejected', { userId: cart.userId, issues: address.error.issues });
      return address;
    }

    const products = new Map<string, Product>();
    for (const line of cartLines) {
      const product = this.catalog.findById(line.productId);
      if (!product || !product.active) {
        return err(new ProductNotFoundError(line.productId));
      }
      if (product.price.getCurrency() !== this.shippingCost.getCurrency()) {
        this.logger.warn('order.currency_rejected', {
          userId: cart.userId,
          productId: product.id,
          currency: product.price.getCurrency(),
        });
        return err(new CurrencyMismatchError(product.price.getCurrency(), this.shippingCost.getCurrency()));
      }
      products.set(product.id, product);
    }

    const placed = await this.stock.withProductLocks(
      products.keys(),
      async (): Promise<Result<Order, InsufficientStockError | InvalidQuantityError>> => {
        const granted: CartLine[] = [];
        for (const line of cartLines) {
          const reserved = this.stock.reserve(line.productId, line.quantity);
          if (!reserved.ok) {
            this.logger.warn('order.reservation_failed', {
              userId: cart.userId,
              productId: line.productId,
              error: reserved.error,
            });
            this.rollbackReservations(granted);
            return reserved;
          }
          granted.push(line);
        }

        const lines: OrderLine[] = cartLines.map((line) => {
          const product = products.get(line.productId);
          if (!product) {
            throw new Error(`Product '${line.productId}' missing from checkout snapshot`);
          }
          return {
            productId: product.id,
            productName: product.name,
            quantity: line.quantity,
            unitPrice: product.price,
          };
        });

        const order = Order.create({
          userId: cart.userId,
          lines,
          shippingAddress: address.value,
          shippingCost: this.shippingCost,
          now: this.now(),
        });

        try {
          await this.store.put(order);
        } catch (error) {
          this.logger.error('order.persist_failed', { userId: cart.userId, orderId: order.id, error });
          this.rollbackReservations(granted);
          throw error;
        }

        cart.subtract(cartLines);
        return ok(order);
      }
    );

    if (placed.ok) {
      const order = placed.value;
      this.logger.info('order.placed', {
        orderId: order.id,
        userId: order.userId,
        lines: order.lines.length,
        total: order.total(),
      });
      await this.raise(
        createEvent(
          'order.placed',
          {
            orderId: order.id,
            userId: order.userId,
            total: order.total().getAmount(),
            currency: order.currency,
            itemCount: order.itemCount(),
          },
          this.now()
        )
      );
    }

    return placed;
  }

  // ==================== Payment ====================

  /**
   * Charge the order total. A declined or failed charge is a normal
   * outcome: the order stays PENDING with payment FAILED and keeps its
   * stock, ready for another attempt.
   */
  pay(orderId: string, method: PaymentMethod, info: PaymentInfo): Promise<Result<PaymentOutcome, PayError>> {
    return this.withOrder<PaymentOutcome, PayError>('pay', orderId, async (order) => {
      const guard = order.canPay();
      if (!guard.ok) return guard;

      const processor = this.payments.find(method);
      if (!processor) {
        this.logger.error('order.payment_unconfigured', { orderId, method });
        return err(new ConfigurationError(`No payment processor registered for method '${method}'`));
      }

      const amount = order.total();
      let charge: Result<Receipt, PaymentError>;
      try {
        charge = await processor.charge(amount, info);
      } catch (error) {
        charge = err(new PaymentError('unreachable', `Processor unreachable: ${describe(error)}`));
      }

      if (!charge.ok) {
        const failed = order.failPayment(method, this.now());
        if (!failed.ok) return failed;
        await this.store.put(order);

        this.logger.warn('order.payment_failed', { orderId, method, reason: charge.error.reason });
        await this.raise(
          createEvent('order.payment_failed', { orderId, method, reason: charge.error.reason }, this.now())
        );
        const outcome: PaymentOutcome = { status: 'FAILED', order, error: charge.error };
        return ok(outcome);
      }

      const receipt = charge.value;
      const confirmed = order.confirmPayment(receipt, this.now());
      if (!confirmed.ok) return confirmed;

      try {
        await this.store.put(order);
      } catch (error) {
        this.logger.error('order.persist_failed', { orderId, transactionId: receipt.transactionId, error });
        const reversed = await processor.refund(amount, receipt);
        if (reversed.ok) {
          this.logger.info('order.charge_reversed', { orderId, transactionId: receipt.transactionId });
        } else {
          this.logger.error('order.charge_reversal_failed', {
            orderId,
            transactionId: receipt.transactionId,
            error: reversed.error,
          });
        }
        throw error;
      }

      this.logger.info('order.paid', { orderId, method, transactionId: receipt.transactionId, amount });
      await this.raise(
        createEvent(
          'order.paid',
          {
            orderId,
            method,
            transactionId: receipt.transactionId,
            amount: amount.getAmount(),
            currency: amount.getCurrency(),
          },
          this.now()
        )
      );
      const outcome: PaymentOutcome = { status: 'COMPLETED', order, receipt };
      return ok(outcome);
    });
  }

  /**
   * Return the charged amount and put the lines' stock back, unless a
   * cancellation already did
   */
  refund(orderId: string): Promise<Result<Order, RefundError>> {
    return this.withOrder<Order, RefundError>('refund', orderId, async (order) => {
      const guard = order.canRefund();
      if (!guard.ok) return guard;

      const receipt = guard.value;
      const processor = this.payments.find(receipt.method);
      if (!processor) {
        this.logger.error('order.payment_unconfigured', { orderId, method: receipt.method });
        return err(new ConfigurationError(`No payment processor registered for method '${receipt.method}'`));
      }

      let refunded: Result<void, PaymentError>;
      try {
        refunded = await processor.refund(receipt.amount, receipt);
      } catch (error) {
        refunded = err(new PaymentError('unreachable', `Processor unreachable: ${describe(error)}`));
      }
      if (!refunded.ok) {
        this.logger.warn('order.refund_failed', { orderId, reason: refunded.error.reason });
        return refunded;
      }

      const marked = order.markRefunded(this.now());
      if (!marked.ok) return marked;
      const releasing = order.markStockReleased();
      await this.store.put(order);
      if (releasing) {
        this.restoreStock(order);
      }

      this.logger.info('order.refunded', { orderId, amount: receipt.amount, stockReleased: releasing });
      await this.raise(
        createEvent(
          'order.refunded',
          {
            orderId,
            amount: receipt.amount.getAmount(),
            currency: receipt.amount.getCurrency(),
            stockReleased: releasing,
          },
          this.now()
        )
      );
      return ok(order);
    });
  }

  // ==================== Lifecycle ====================

  /**
   * PENDING or CONFIRMED -> CANCELLED, restoring exactly the frozen
   * quantities. A paid order keeps its payment COMPLETED until refunded.
   */
  cancel(orderId: string, reason?: string): Promise<Result<Order, TransitionError>> {
    return this.withOrder<Order, TransitionError>('cancel', orderId, async (order) => {
      const cancelled = order.cancel(reason, this.now());
      if (!cancelled.ok) return cancelled;

      const releasing = order.markStockReleased();
      await this.store.put(order);
      if (releasing) {
        this.restoreStock(order);
      }

      this.logger.info('order.cancelled', { orderId, reason, stockReleased: releasing });
      await this.raise(createEvent('order.cancelled', { orderId, reason, stockReleased: releasing }, this.now()));
      return ok(order);
    });
  }

  ship(orderId: string, trackingNumber: string): Promise<Result<Order, TransitionError>> {
    return this.withOrder<Order, TransitionError>('ship', orderId, async (order) => {
      const shipped = order.ship(trackingNumber, this.now());
      if (!shipped.ok) return shipped;

      await this.store.put(order);

      const tracking = order.trackingNumber ?? trackingNumber;
      this.logger.info('order.shipped', { orderId, trackingNumber: tracking });
      await this.raise(createEvent('order.shipped', { orderId, trackingNumber: tracking }, this.now()));
      return ok(order);
    });
  }

  deliver(orderId: string): Promise<Result<Order, TransitionError>> {
    return this.withOrder<Order, TransitionError>('deliver', orderId, async (order) => {
      const delivered = order.deliver(this.now());
      if (!delivered.ok) return delivered;

      await this.store.put(order);

      this.logger.info('order.delivered', { orderId });
      await this.raise(createEvent('order.delivered', { orderId }, this.now()));
      return ok(order);
    });
  }

  /**
   * Replace the shipping cost of an order that has not been paid yet
   */
  setShippingCost(orderId: string, amount: Money): Promise<Result<Order, TransitionError>> {
    return this.withOrder<Order, TransitionError>('setShippingCost', orderId, async (order) => {
      const updated = order.setShippingCost(amount, this.now());
      if (!updated.ok) return updated;

      await this.store.put(order);

      this.logger.info('order.shipping_cost_set', { orderId, shippingCost: amount, total: order.total() });
      return ok(order);
    });
  }

  // ==================== Queries ====================

  async getOrder(orderId: string): Promise<Result<Order, OrderNotFoundError>> {
    const order = await this.store.get(orderId);
    return order ? ok(order) : err(new OrderNotFoundError(orderId));
  }

  listOrders(userId: string): Promise<Order[]> {
    return this.store.listByUser(userId);
  }

  // ==================== Internals ====================

  private run<T, E>(operation: Operation, fn: () => Promise<Result<T, E>>): Promise<Result<T, E>> {
    return this.middleware.run(operation, fn);
  }

  /**
   * Load an order and run `fn` holding its lock
   */
  private withOrder<T, E>(
    name: string,
    orderId: string,
    fn: (order: Order) => Promise<Result<T, E>>
  ): Promise<Result<T, E | OrderNotFoundError>> {
    return this.run({ name, orderId }, () =>
      this.orderLocks.runExclusive(orderId, async (): Promise<Result<T, E | OrderNotFoundError>> => {
        const order = await this.store.get(orderId);
        if (!order) {
          return err(new OrderNotFoundError(orderId));
        }
        return fn(order);
      })
    );
  }

  private rollbackReservations(granted: readonly CartLine[]): void {
    for (const line of granted) {
      this.releaseLine(line.productId, line.quantity);
    }
    if (granted.length > 0) {
      this.logger.info('order.reservations_rolled_back', {
        products: granted.map((line) => line.productId),
      });
    }
  }

  private restoreStock(order: Order): void {
    for (const line of order.lines) {
      this.releaseLine(line.productId, line.quantity);
    }
    this.logger.info('stock.restored', { orderId: order.id, units: order.itemCount() });
  }

  private releaseLine(productId: string, quantity: number): void {
    const released = this.stock.release(productId, quantity);
    if (!released.ok) {
      // Lines only ever hold positive quantities
      throw released.error;
    }
  }

  private async raise(event: OrderEvent): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.publish(event);
    } catch (error) {
      this.logger.error('event.publish_failed', { eventName: event.eventName, error });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
