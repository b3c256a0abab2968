/**
 * Order Aggregate
 *
 * Frozen lines plus two independent state machines: fulfilment status and
 * payment status. Only the order workflow calls the mutating methods.
 */

import { CurrencyMismatchError, InvalidTransitionError } from '../errors.js';
import { ok, err, type Result } from '../result.js';
import { sum, type Money } from '../money.js';
import { generateOrderId } from '../utils/ids.js';
import type { PaymentMethod, Receipt } from '../payments/types.js';
import {
  canTransition,
  canTransitionPayment,
  type OrderEventName,
  type OrderStatus,
  type PaymentStatus,
} from './order-status.js';

/**
 * A product as bought: price and name copied at order creation
 */
export interface OrderLine {
  readonly productId: string;
  readonly productName: string;
  readonly quantity: number;
  readonly unitPrice: Money;
}

export interface ShippingAddress {
  readonly street: string;
  readonly city: string;
  readonly state: string;
  readonly postalCode: string;
  readonly country: string;
}

export interface StatusChange {
  readonly from: OrderStatus;
  readonly to: OrderStatus;
  readonly event: OrderEventName;
  readonly at: Date;
}

export interface OrderProps {
  id: string;
  userId: string;
  lines: readonly OrderLine[];
  shippingAddress: ShippingAddress;
  status: OrderStatus;
  paymentStatus: PaymentStatus;
  shippingCost: Money;
  paymentMethod?: PaymentMethod;
  receipt?: Receipt;
  trackingNumber?: string;
  cancellationReason?: string;
  stockReleased: boolean;
  history: StatusChange[];
  createdAt: Date;
  updatedAt: Date;
}

export interface NewOrder {
  userId: string;
  lines: readonly OrderLine[];
  shippingAddress: ShippingAddress;
  shippingCost: Money;
  id?: string;
  now?: Date;
}

export class Order {
  private props: OrderProps;

  private constructor(props: OrderProps) {
    this.props = props;
  }

  /**
   * New PENDING order. Lines and address are copied and frozen.
   */
  static create(params: NewOrder): Order {
    if (params.lines.length === 0) {
      throw new RangeError('An order needs at least one line');
    }

    const now = params.now ?? new Date();
    const lines = Object.freeze(params.lines.map((line) => Object.freeze({ ...line })));

    return new Order({
      id: params.id ?? generateOrderId(),
      userId: params.userId,
      lines,
      shippingAddress: Object.freeze({ ...params.shippingAddress }),
      status: 'PENDING',
      paymentStatus: 'PENDING',
      shippingCost: params.shippingCost,
      stockReleased: false,
      history: [],
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Rebuild from stored props
   */
  static reconstitute(props: OrderProps): Order {
    return new Order({ ...props, history: [...props.history] });
  }

  // ==================== Getters ====================

  get id(): string { return this.props.id; }
  get userId(): string { return this.props.userId; }
  get lines(): readonly OrderLine[] { return this.props.lines; }
  get shippingAddress(): ShippingAddress { return this.props.shippingAddress; }
  get status(): OrderStatus { return this.props.status; }
  get paymentStatus(): PaymentStatus { return this.props.paymentStatus; }
  get shippingCost(): Money { return this.props.shippingCost; }
  get paymentMethod(): PaymentMethod | undefined { return this.props.paymentMethod; }
  get receipt(): Receipt | undefined { return this.props.receipt; }
  get trackingNumber(): string | undefined { return this.props.trackingNumber; }
  get cancellationReason(): string | undefined { return this.props.cancellationReason; }
  /** True once the frozen lines' stock went back to the ledger */
  get stockReleased(): boolean { return this.props.stockReleased; }
  get history(): readonly StatusChange[] { return [...this.props.history]; }
  get createdAt(): Date { return this.props.createdAt; }
  get updatedAt(): Date { return this.props.updatedAt; }

  get currency(): string {
    return this.props.shippingCost.getCurrency();
  }

  /**
   * Σ quantity × unit price at purchase
   */
  subtotal(): Money {
    return sum(
      this.props.lines.map((line) => line.unitPrice.multiply(line.quantity)),
      this.currency
    );
  }

  /**
   * Subtotal plus shipping
   */
  total(): Money {
    return this.subtotal().add(this.props.shippingCost);
  }

  itemCount(): number {
    return this.props.lines.reduce((count, line) => count + line.quantity, 0);
  }

  // ==================== Guards ====================

  /**
   * Payment may be attempted (or retried) only while PENDING
   */
  canPay(): Result<void, InvalidTransitionError> {
    if (this.props.status !== 'PENDING' || !canTransitionPayment(this.props.paymentStatus, 'COMPLETED')) {
      return err(new InvalidTransitionError(this.props.status, 'pay'));
    }
    return ok();
  }

  /**
   * Refund needs a completed payment on a CONFIRMED order, or on one
   * cancelled after payment
   */
  canRefund(): Result<Receipt, InvalidTransitionError> {
    const { status, paymentStatus, receipt } = this.props;
    if (status !== 'CONFIRMED' && status !== 'CANCELLED') {
      return err(new InvalidTransitionError(status, 'refund'));
    }
    if (paymentStatus !== 'COMPLETED' || receipt === undefined) {
      return err(
        new InvalidTransitionError(
          status,
          'refund',
          `Cannot refund an order whose payment is '${paymentStatus}'`
        )
      );
    }
    return ok(receipt);
  }

  // ==================== Behavior ====================

  /**
   * PENDING -> CONFIRMED, payment -> COMPLETED
   */
  confirmPayment(receipt: Receipt, at: Date = new Date()): Result<void, InvalidTransitionError> {
    const guard = this.canPay();
    if (!guard.ok) return guard;

    this.props.paymentStatus = 'COMPLETED';
    this.props.paymentMethod = receipt.method;
    this.props.receipt = receipt;
    this.moveTo('CONFIRMED', 'pay', at);
    return ok();
  }

  /**
   * Payment -> FAILED; the order stays PENDING and keeps its stock
   */
  failPayment(method: PaymentMethod, at: Date = new Date()): Result<void, InvalidTransitionError> {
    const guard = this.canPay();
    if (!guard.ok) return guard;

    this.props.paymentStatus = 'FAILED';
    this.props.paymentMethod = method;
    this.props.updatedAt = at;
    return ok();
  }

  cancel(reason?: string, at: Date = new Date()): Result<void, InvalidTransitionError> {
    if (!canTransition(this.props.status, 'CANCELLED')) {
      return err(new InvalidTransitionError(this.props.status, 'cancel'));
    }

    this.props.cancellationReason = reason;
    this.moveTo('CANCELLED', 'cancel', at);
    return ok();
  }

  ship(trackingNumber: string, at: Date = new Date()): Result<void, InvalidTransitionError> {
    if (!canTransition(this.props.status, 'SHIPPED')) {
      return err(new InvalidTransitionError(this.props.status, 'ship'));
    }
    if (this.props.paymentStatus !== 'COMPLETED') {
      return err(
        new InvalidTransitionError(
          this.props.status,
          'ship',
          `Cannot ship an order whose payment is '${this.props.paymentStatus}'`
        )
      );
    }

    const tracking = trackingNumber.trim();
    if (tracking.length === 0) {
      return err(new InvalidTransitionError(this.props.status, 'ship', 'Tracking number is required'));
    }

    this.props.trackingNumber = tracking;
    this.moveTo('SHIPPED', 'ship', at);
    return ok();
  }

  deliver(at: Date = new Date()): Result<void, InvalidTransitionError> {
    if (!canTransition(this.props.status, 'DELIVERED')) {
      return err(new InvalidTransitionError(this.props.status, 'deliver'));
    }

    this.moveTo('DELIVERED', 'deliver', at);
    return ok();
  }

  /**
   * Payment COMPLETED -> REFUNDED. Status is unchanged.
   */
  markRefunded(at: Date = new Date()): Result<void, InvalidTransitionError> {
    const guard = this.canRefund();
    if (!guard.ok) return guard;

    this.props.paymentStatus = 'REFUNDED';
    this.props.updatedAt = at;
    return ok();
  }

  /**
   * Allowed while PENDING or CONFIRMED and not yet paid
   */
  setShippingCost(amount: Money, at: Date = new Date()): Result<void, InvalidTransitionError> {
    const { status, paymentStatus } = this.props;
    const editable = status === 'PENDING' || status === 'CONFIRMED';
    if (!editable || paymentStatus === 'COMPLETED' || paymentStatus === 'REFUNDED') {
      return err(
        new InvalidTransitionError(
          status,
          'setShippingCost',
          `Cannot change shipping cost of an order in status '${status}' with payment '${paymentStatus}'`
        )
      );
    }
    if (amount.getCurrency() !== this.currency) {
      throw new CurrencyMismatchError(this.currency, amount.getCurrency());
    }

    this.props.shippingCost = amount;
    this.props.updatedAt = at;
    return ok();
  }

  /**
   * Record that the lines' stock is back in the ledger.
   *
   * @returns false when it already was
   */
  markStockReleased(): boolean {
    if (this.props.stockReleased) {
      return false;
    }
    this.props.stockReleased = true;
    return true;
  }

  private moveTo(to: OrderStatus, event: OrderEventName, at: Date): void {
    this.props.history.push({ from: this.props.status, to, event, at });
    this.props.status = to;
    this.props.updatedAt = at;
  }

  toJSON() {
    return {
      id: this.props.id,
      userId: this.props.userId,
      status: this.props.status,
      paymentStatus: this.props.paymentStatus,
      paymentMethod: this.props.paymentMethod,
      lines: this.props.lines.map((line) => ({
        productId: line.productId,
        productName: line.productName,
        quantity: line.quantity,
        unitPrice: line.unitPrice.toJSON(),
      })),
      shippingAddress: { ...this.props.shippingAddress },
      shippingCost: this.props.shippingCost.toJSON(),
      total: this.total().toJSON(),
      trackingNumber: this.props.trackingNumber,
      cancellationReason: this.props.cancellationReason,
      transactionId: this.props.receipt?.transactionId,
      stockReleased: this.props.stockReleased,
      createdAt: this.props.createdAt.toISOString(),
      updatedAt: this.props.updatedAt.toISOString(),
    };
  }
}
