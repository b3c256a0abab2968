/**
 * Orders
 */

export {
  ORDER_STATUSES,
  PAYMENT_STATUSES,
  canTransition,
  canTransitionPayment,
  isTerminal,
  type OrderStatus,
  type PaymentStatus,
  type OrderEventName,
} from './order-status.js';

export {
  Order,
  type OrderLine,
  type OrderProps,
  type NewOrder,
  type ShippingAddress,
  type StatusChange,
} from './order.js';

export { InMemoryOrderStore, type OrderStore } from './order-store.js';

export {
  InMemoryEventBus,
  createEvent,
  isEvent,
  type EventBus,
  type EventHandler,
  type OrderEvent,
  type OrderEventType,
  type OrderEventOf,
  type OrderPlacedEvent,
  type OrderPaidEvent,
  type OrderPaymentFailedEvent,
  type OrderCancelledEvent,
  type OrderShippedEvent,
  type OrderDeliveredEvent,
  type OrderRefundedEvent,
} from './events.js';

export {
  OrderWorkflow,
  parseShippingAddress,
  type OrderWorkflowDependencies,
  type CreateOrderInput,
  type CreateOrderError,
  type PaymentOutcome,
  type PayError,
  type RefundError,
  type TransitionError,
} from './order-workflow.js';
