/**
 * Storefront - wires catalog, stock, carts, payments and orders together
 */

import {
  createConfiguredLogger,
  defaultShippingCost,
  getConfiguration,
  type StorefrontConfiguration,
} from './config.js';
import type { Logger } from './logging/logger.js';
import { InMemoryProductCatalog } from './catalog/product-catalog.js';
import { StockLedger } from './inventory/stock-ledger.js';
import { CartRegistry } from './cart/cart.js';
import { SimulatedAcquirer, type Acquirer } from './payments/acquirer.js';
import { createDefaultProcessors, type PaymentProcessorRegistry } from './payments/registry.js';
import { InMemoryOrderStore, type OrderStore } from './orders/order-store.js';
import { InMemoryEventBus, type EventBus } from './orders/events.js';
import { OrderWorkflow } from './orders/order-workflow.js';
import { MiddlewareStack } from './middleware/stack.js';
import { CorrelateMiddleware } from './middleware/correlate.js';
import { RuntimeMiddleware } from './middleware/runtime.js';
import type { OperationMiddleware } from './middleware/types.js';

export interface StorefrontOptions {
  /** Defaults to the global configuration */
  configuration?: StorefrontConfiguration;
  /** Defaults to a logger built from `configuration.logger` */
  logger?: Logger;
  catalog?: InMemoryProductCatalog;
  stock?: StockLedger;
  store?: OrderStore;
  /** Used by the default processors (default: SimulatedAcquirer) */
  acquirer?: Acquirer;
  /** Replaces the default processors entirely */
  payments?: PaymentProcessorRegistry;
  events?: EventBus;
  /** Replaces the default correlate + runtime middlewares */
  middleware?: OperationMiddleware[];
  now?: () => Date;
}

export interface Storefront {
  readonly configuration: StorefrontConfiguration;
  readonly logger: Logger;
  readonly catalog: InMemoryProductCatalog;
  readonly stock: StockLedger;
  readonly carts: CartRegistry;
  readonly store: OrderStore;
  readonly payments: PaymentProcessorRegistry;
  readonly events: EventBus;
  readonly workflow: OrderWorkflow;
}

/**
 * Build a storefront from configuration, replacing any collaborator passed
 * in `options`
 *
 * @example
 * ```typescript
 * const shop = createStorefront();
 * const shirt = shop.catalog.add({ name: 'T-shirt', price: Money.create(1999) });
 * shop.stock.addStock(shirt.id, 10);
 *
 * const cart = shop.carts.forUser('user-1');
 * cart.addItem(shirt.id, 3);
 * const placed = await shop.workflow.createOrder({ cart, shippingAddress });
 * ```
 */
export function createStorefront(options: StorefrontOptions = {}): Storefront {
  const configuration = options.configuration ?? getConfiguration();
  const logger = options.logger ?? createConfiguredLogger(configuration);
  const currency = configuration.currency;

  const catalog = options.catalog ?? new InMemoryProductCatalog();
  const stock = options.stock ?? new StockLedger({ logger: logger.child({ component: 'stock-ledger' }) });
  const carts = new CartRegistry({ catalog, stock, currency });
  const store = options.store ?? new InMemoryOrderStore();
  const events = options.events ?? new InMemoryEventBus(logger.child({ component: 'event-bus' }));

  const payments =
    options.payments ??
    createDefaultProcessors(options.acquirer ?? new SimulatedAcquirer(), {
      timeoutMs: configuration.paymentTimeoutMs,
      now: options.now,
      logger: logger.child({ component: 'payments' }),
    });

  const middleware = new MiddlewareStack(
    options.middleware ?? [CorrelateMiddleware(), RuntimeMiddleware({ logger })]
  );

  const workflow = new OrderWorkflow({
    catalog,
    stock,
    store,
    payments,
    events,
    logger,
    middleware,
    shippingCost: defaultShippingCost(configuration),
    currency,
    now: options.now,
  });

  logger.debug('storefront.started', {
    currency,
    paymentMethods: payments.methods(),
    paymentTimeoutMs: configuration.paymentTimeoutMs,
  });

  return { configuration, logger, catalog, stock, carts, store, payments, events, workflow };
}
