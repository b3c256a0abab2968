/**
 * Order domain events and the bus they are published on
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logging/logger.js';
import type { PaymentErrorReason } from '../errors.js';
import type { PaymentMethod } from '../payments/types.js';

interface EventBase<N extends string, P> {
  readonly eventId: string;
  readonly eventName: N;
  readonly occurredAt: Date;
  readonly payload: P;
}

export type OrderPlacedEvent = EventBase<
  'order.placed',
  { orderId: string; userId: string; total: number; currency: string; itemCount: number }
>;

export type OrderPaidEvent = EventBase<
  'order.paid',
  { orderId: string; method: PaymentMethod; transactionId: string; amount: number; currency: string }
>;

export type OrderPaymentFailedEvent = EventBase<
  'order.payment_failed',
  { orderId: string; method: PaymentMethod; reason: PaymentErrorReason }
>;

export type OrderCancelledEvent = EventBase<
  'order.cancelled',
  { orderId: string; reason?: string; stockReleased: boolean }
>;

export type OrderShippedEvent = EventBase<'order.shipped', { orderId: string; trackingNumber: string }>;

export type OrderDeliveredEvent = EventBase<'order.delivered', { orderId: string }>;

export type OrderRefundedEvent = EventBase<
  'order.refunded',
  { orderId: string; amount: number; currency: string; stockReleased: boolean }
>;

export type OrderEvent =
  | OrderPlacedEvent
  | OrderPaidEvent
  | OrderPaymentFailedEvent
  | OrderCancelledEvent
  | OrderShippedEvent
  | OrderDeliveredEvent
  | OrderRefundedEvent;

export type OrderEventType = OrderEvent['eventName'];

export type OrderEventOf<N extends OrderEventType> = Extract<OrderEvent, { eventName: N }>;

/**
 * Build an event with a fresh id and timestamp
 */
export function createEvent<N extends OrderEventType>(
  eventName: N,
  payload: OrderEventOf<N>['payload'],
  occurredAt: Date = new Date()
): EventBase<N, OrderEventOf<N>['payload']> {
  return Object.freeze({ eventId: uuidv4(), eventName, occurredAt, payload });
}

export type EventHandler<E extends OrderEvent = OrderEvent> = (event: E) => void | Promise<void>;

/**
 * Event Bus Port
 */
export interface EventBus {
  publish(event: OrderEvent): Promise<void>;
}

/**
 * In-process bus. Handlers run in subscription order; a failing handler is
 * logged and never fails the operation that raised the event.
 */
export class InMemoryEventBus implements EventBus {
  private handlers: Map<OrderEventType, EventHandler[]> = new Map();
  private readonly published: OrderEvent[] = [];

  constructor(private readonly logger?: Logger) {}

  async publish(event: OrderEvent): Promise<void> {
    this.published.push(event);
    this.logger?.debug('event.published', { eventName: event.eventName, eventId: event.eventId });

    const eventHandlers = this.handlers.get(event.eventName) ?? [];
    for (const handler of eventHandlers) {
      try {
        await handler(event);
      } catch (error) {
        this.logger?.error('event.handler_failed', { eventName: event.eventName, error });
      }
    }
  }

  /**
   * @returns a function removing the subscription
   */
  subscribe<N extends OrderEventType>(eventName: N, handler: EventHandler<OrderEventOf<N>>): () => void {
    const wrapped: EventHandler = (event) => (isEvent(event, eventName) ? handler(event) : undefined);

    const list = this.handlers.get(eventName) ?? [];
    list.push(wrapped);
    this.handlers.set(eventName, list);

    return () => {
      const current = this.handlers.get(eventName);
      if (current) {
        const index = current.indexOf(wrapped);
        if (index > -1) {
          current.splice(index, 1);
        }
      }
    };
  }

  /**
   * Events published so far, oldest first
   */
  events(): readonly OrderEvent[] {
    return [...this.published];
  }

  clear(): void {
    this.published.length = 0;
  }
}

export function isEvent<N extends OrderEventType>(event: OrderEvent, eventName: N): event is OrderEventOf<N> {
  return event.eventName === eventName;
}
