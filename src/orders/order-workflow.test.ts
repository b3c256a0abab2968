/**
 * Order Workflow Tests
 */

import { describe, it, expect } from 'vitest';
import { OrderWorkflow, type PaymentOutcome } from './order-workflow.js';
import { InMemoryOrderStore } from './order-store.js';
import { InMemoryEventBus } from './events.js';
import type { Order } from './order.js';
import { InMemoryProductCatalog } from '../catalog/product-catalog.js';
import { StockLedger } from '../inventory/stock-ledger.js';
import { CartRegistry } from '../cart/cart.js';
import { SimulatedAcquirer } from '../payments/acquirer.js';
import { CreditCardProcessor } from '../payments/processors.js';
import { PaymentProcessorRegistry, createDefaultProcessors } from '../payments/registry.js';
import type { PaymentProcessor } from '../payments/types.js';
import { Money } from '../money.js';
import { ok, type Result } from '../result.js';
import {
  ConfigurationError,
  CurrencyMismatchError,
  EmptyCartError,
  InsufficientStockError,
  InvalidAddressError,
  InvalidTransitionError,
  OrderNotFoundError,
  ProductNotFoundError,
} from '../errors.js';

const NOW = new Date('2026-03-15T12:00:00.000Z');
const now = () => NOW;

const DECLINED_CARD = '4000000000000002';
const card = { cardNumber: '4111 1111 1111 1111', expiry: '12/30', cvv: '123' };
const declinedCard = { ...card, cardNumber: DECLINED_CARD };

const address = {
  street: '1 Main St',
  city: 'Springfield',
  state: 'IL',
  postalCode: '62701',
  country: 'US',
};

class FlakyOrderStore extends InMemoryOrderStore {
  failures = 0;
  onPut?: () => void;

  override async put(order: Order): Promise<void> {
    this.onPut?.();
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('disk full');
    }
    return super.put(order);
  }
}

interface SetupOptions {
  acquirer?: SimulatedAcquirer;
  payments?: PaymentProcessorRegistry;
  store?: InMemoryOrderStore;
}

function setup(options: SetupOptions = {}) {
  const catalog = new InMemoryProductCatalog();
  const stock = new StockLedger();
  const acquirer = options.acquirer ?? new SimulatedAcquirer({ declinedAccounts: [DECLINED_CARD] });
  const payments = options.payments ?? createDefaultProcessors(acquirer, { now });
  const store = options.store ?? new InMemoryOrderStore();
  const events = new InMemoryEventBus();
  const workflow = new OrderWorkflow({ catalog, stock, store, payments, events, now });
  const carts = new CartRegistry({ catalog, stock });

  catalog.add({ id: 'P', name: 'Widget', price: Money.create(1500) });
  catalog.add({ id: 'Q', name: 'Gadget', price: Money.create(900) });
  stock.addStock('P', 10);
  stock.addStock('Q', 1);

  return { catalog, stock, acquirer, payments, store, events, workflow, carts };
}

type Env = ReturnType<typeof setup>;

function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${String(result.error)}`);
  }
  return result.value;
}

async function placeOrder(env: Env, userId: string, items: Array<[string, number]>): Promise<Order> {
  const cart = env.carts.forUser(userId);
  for (const [productId, quantity] of items) {
    expectOk(cart.addItem(productId, quantity));
  }
  return expectOk(await env.workflow.createOrder({ cart, shippingAddress: address }));
}

function eventNames(env: Env): string[] {
  return env.events.events().map((event) => event.eventName);
}

describe('OrderWorkflow', () => {
  describe('createOrder', () => {
    it('should reserve stock and price the order from the catalog', async () => {
      const env = setup();

      const order = await placeOrder(env, 'user-1', [['P', 3]]);

      expect(env.stock.availableQuantity('P')).toBe(7);
      expect(order.total().getAmount()).toBe(3 * 1500);
      expect(order.status).toBe('PENDING');
      expect(order.paymentStatus).toBe('PENDING');
      expect(order.userId).toBe('user-1');
      expect(order.createdAt).toBe(NOW);
      expect(order.lines).toEqual([
        { productId: 'P', productName: 'Widget', quantity: 3, unitPrice: Money.create(1500) },
      ]);
      expect(env.carts.forUser('user-1').isEmpty).toBe(true);
      expect(await env.store.get(order.id)).toBe(order);
      expect(eventNames(env)).toEqual(['order.placed']);
    });

    it('should freeze prices at purchase time', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 2]]);

      env.catalog.setPrice('P', Money.create(9999));

      expect(order.total().getAmount()).toBe(3000);
      expect(Object.isFrozen(order.lines[0])).toBe(true);
    });

    it('should reject an empty cart', async () => {
      const env = setup();

      const result = await env.workflow.createOrder({ cart: env.carts.forUser('user-1'), shippingAddress: address });

      expect(!result.ok && result.error).toBeInstanceOf(EmptyCartError);
    });

    it('should validate the shipping address', async () => {
      const env = setup();
      const cart = env.carts.forUser('user-1');
      cart.addItem('P', 1);

      const result = await env.workflow.createOrder({ cart, shippingAddress: { ...address, city: '  ' } });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidAddressError);
        expect(result.error.message).toBe('Invalid shipping address: city is required');
      }
      expect(env.stock.availableQuantity('P')).toBe(10);
      expect(cart.quantityOf('P')).toBe(1);
    });

    it('should reject products deactivated after they were added', async () => {
      const env = setup();
      const cart = env.carts.forUser('user-1');
      cart.addItem('P', 1);
      env.catalog.setActive('P', false);

      const result = await env.workflow.createOrder({ cart, shippingAddress: address });

      expect(!result.ok && result.error).toBeInstanceOf(ProductNotFoundError);
      expect(env.stock.availableQuantity('P')).toBe(10);
    });

    it('should reserve all lines or none', async () => {
      const env = setup();
      const cart = env.carts.forUser('user-1');
      cart.addItem('P', 2);
      cart.addItem('Q', 1);
      // Another checkout takes the last Q after it was added to this cart
      env.stock.reserve('Q', 1);

      const result = await env.workflow.createOrder({ cart, shippingAddress: address });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InsufficientStockError);
        expect(result.error).toMatchObject({ productId: 'Q', requested: 1, available: 0 });
      }
      expect(env.stock.availableQuantity('P')).toBe(10);
      expect(env.stock.availableQuantity('Q')).toBe(0);
      expect(cart.lines()).toEqual([
        { productId: 'P', quantity: 2 },
        { productId: 'Q', quantity: 1 },
      ]);
      expect(env.store.size).toBe(0);
      expect(eventNames(env)).toEqual([]);
    });

    it('should let exactly one of two concurrent checkouts take the last unit', async () => {
      const env = setup();
      const first = env.carts.forUser('user-1');
      const second = env.carts.forUser('user-2');
      first.addItem('Q', 1);
      second.addItem('Q', 1);

      const results = await Promise.all([
        env.workflow.createOrder({ cart: first, shippingAddress: address }),
        env.workflow.createOrder({ cart: second, shippingAddress: address }),
      ]);

      expect(results.filter((result) => result.ok)).toHaveLength(1);
      const failure = results.find((result) => !result.ok);
      expect(failure && !failure.ok && failure.error).toBeInstanceOf(InsufficientStockError);
      expect(env.stock.availableQuantity('Q')).toBe(0);
    });

    it('should convert a cart once when it is checked out concurrently', async () => {
      const env = setup();
      const cart = env.carts.forUser('user-1');
      cart.addItem('P', 3);

      const [first, second] = await Promise.all([
        env.workflow.createOrder({ cart, shippingAddress: address }),
        env.workflow.createOrder({ cart, shippingAddress: address }),
      ]);

      expect(first.ok).toBe(true);
      expect(!second.ok && second.error).toBeInstanceOf(EmptyCartError);
      expect(env.stock.availableQuantity('P')).toBe(7);
      expect(env.store.size).toBe(1);
    });

    it('should keep items added to the cart while the order is stored', async () => {
      const store = new FlakyOrderStore();
      const env = setup({ store });
      const cart = env.carts.forUser('user-1');
      cart.addItem('P', 2);
      store.onPut = () => {
        cart.addItem('Q', 1);
      };

      const order = expectOk(await env.workflow.createOrder({ cart, shippingAddress: address }));

      expect(order.lines.map((line) => line.productId)).toEqual(['P']);
      expect(cart.lines()).toEqual([{ productId: 'Q', quantity: 1 }]);
      expect(env.stock.availableQuantity('P')).toBe(8);
    });

    it('should reject products repriced into another currency before reserving', async () => {
      const env = setup();
      const cart = env.carts.forUser('user-1');
      cart.addItem('P', 2);
      env.catalog.setPrice('P', Money.create(1500, 'EUR'));

      const result = await env.workflow.createOrder({ cart, shippingAddress: address });

      expect(!result.ok && result.error).toBeInstanceOf(CurrencyMismatchError);
      expect(env.stock.availableQuantity('P')).toBe(10);
      expect(cart.quantityOf('P')).toBe(2);
      expect(env.store.size).toBe(0);
      expect(eventNames(env)).toEqual([]);
    });

    it('should release reservations and rethrow when persisting fails', async () => {
      const store = new FlakyOrderStore();
      const env = setup({ store });
      const cart = env.carts.forUser('user-1');
      cart.addItem('P', 4);
      store.failures = 1;

      await expect(env.workflow.createOrder({ cart, shippingAddress: address })).rejects.toThrow('disk full');

      expect(env.stock.availableQuantity('P')).toBe(10);
      expect(cart.quantityOf('P')).toBe(4);
    });
  });

  describe('pay', () => {
    it('should confirm the order on a successful charge', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 3]]);

      const outcome = expectOk(await env.workflow.pay(order.id, 'credit_card', card));

      expect(outcome.status).toBe('COMPLETED');
      expect(order.status).toBe('CONFIRMED');
      expect(order.paymentStatus).toBe('COMPLETED');
      expect(order.paymentMethod).toBe('credit_card');
      expect(order.receipt?.amount.getAmount()).toBe(4500);
      expect(env.acquirer.authorizations[0]?.amount.getAmount()).toBe(4500);
      expect(eventNames(env)).toEqual(['order.placed', 'order.paid']);
    });

    it('should keep the order pending and its stock reserved on a decline', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 3]]);

      const declined = expectOk(await env.workflow.pay(order.id, 'credit_card', declinedCard));

      expect(declined.status).toBe('FAILED');
      expect(declined.status === 'FAILED' && declined.error.reason).toBe('declined');
      expect(order.status).toBe('PENDING');
      expect(order.paymentStatus).toBe('FAILED');
      expect(env.stock.availableQuantity('P')).toBe(7);

      const retried = expectOk(await env.workflow.pay(order.id, 'credit_card', card));

      expect(retried.status).toBe('COMPLETED');
      expect(order.status).toBe('CONFIRMED');
      expect(eventNames(env)).toEqual(['order.placed', 'order.payment_failed', 'order.paid']);
    });

    it('should treat invalid payment info as a failed payment', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      const outcome = expectOk(await env.workflow.pay(order.id, 'wallet', { provider: 'acme-pay' }));

      expect(outcome.status === 'FAILED' && outcome.error.reason).toBe('invalid_payment_info');
      expect(order.paymentStatus).toBe('FAILED');
      expect(env.acquirer.authorizations).toHaveLength(0);
    });

    it('should map a throwing processor to an unreachable failure', async () => {
      const broken: PaymentProcessor = {
        method: 'wallet',
        charge: async () => {
          throw new Error('socket hang up');
        },
        refund: async () => ok(),
      };
      const env = setup({ payments: new PaymentProcessorRegistry([broken]) });
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      const outcome = expectOk(await env.workflow.pay(order.id, 'wallet', {}));

      expect(outcome.status === 'FAILED' && outcome.error.message).toBe('Processor unreachable: socket hang up');
    });

    it('should report an unregistered method as a configuration error', async () => {
      const acquirer = new SimulatedAcquirer();
      const env = setup({
        acquirer,
        payments: new PaymentProcessorRegistry([new CreditCardProcessor(acquirer, { now })]),
      });
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      const result = await env.workflow.pay(order.id, 'net_banking', {});

      expect(!result.ok && result.error).toBeInstanceOf(ConfigurationError);
      expect(order.status).toBe('PENDING');
      expect(order.paymentStatus).toBe('PENDING');
    });

    it('should fail for unknown orders', async () => {
      const env = setup();

      const result = await env.workflow.pay('missing', 'credit_card', card);

      expect(!result.ok && result.error).toBeInstanceOf(OrderNotFoundError);
    });

    it('should charge once when the same order is paid concurrently', async () => {
      const acquirer = new SimulatedAcquirer({ latencyMs: 5 });
      const env = setup({ acquirer });
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      const [first, second] = await Promise.all([
        env.workflow.pay(order.id, 'credit_card', card),
        env.workflow.pay(order.id, 'credit_card', card),
      ]);

      expect(first.ok && first.value.status).toBe('COMPLETED');
      expect(!second.ok && second.error).toBeInstanceOf(InvalidTransitionError);
      expect(acquirer.authorizations).toHaveLength(1);
    });

    it('should reverse the charge when the paid order cannot be stored', async () => {
      const store = new FlakyOrderStore();
      const env = setup({ store });
      const order = await placeOrder(env, 'user-1', [['P', 1]]);
      store.failures = 1;

      await expect(env.workflow.pay(order.id, 'credit_card', card)).rejects.toThrow('disk full');

      expect(env.acquirer.reversals).toEqual([order.receipt?.transactionId]);
    });
  });

  describe('cancel', () => {
    it('should restore stock and block later payment', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 3]]);

      const cancelled = expectOk(await env.workflow.cancel(order.id, 'changed my mind'));

      expect(cancelled.status).toBe('CANCELLED');
      expect(cancelled.cancellationReason).toBe('changed my mind');
      expect(env.stock.availableQuantity('P')).toBe(10);

      const paid = await env.workflow.pay(order.id, 'credit_card', card);
      expect(!paid.ok && paid.error).toBeInstanceOf(InvalidTransitionError);
    });

    it('should restore stock only once', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 3]]);

      await env.workflow.cancel(order.id);
      const again = await env.workflow.cancel(order.id);

      expect(!again.ok && again.error).toMatchObject({ fromStatus: 'CANCELLED', event: 'cancel' });
      expect(env.stock.availableQuantity('P')).toBe(10);
    });

    it('should cancel a confirmed order and keep its payment until refunded', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 2]]);
      await env.workflow.pay(order.id, 'credit_card', card);

      expectOk(await env.workflow.cancel(order.id));

      expect(order.paymentStatus).toBe('COMPLETED');
      expect(env.stock.availableQuantity('P')).toBe(10);
    });

    it('should not cancel shipped orders', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 1]]);
      await env.workflow.pay(order.id, 'credit_card', card);
      await env.workflow.ship(order.id, 'TRK-1');

      const result = await env.workflow.cancel(order.id);

      expect(!result.ok && result.error).toBeInstanceOf(InvalidTransitionError);
      expect(env.stock.availableQuantity('P')).toBe(9);
    });
  });

  describe('ship and deliver', () => {
    it('should move a confirmed order to delivered', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 1]]);
      await env.workflow.pay(order.id, 'credit_card', card);

      expectOk(await env.workflow.ship(order.id, ' TRK-123 '));
      expectOk(await env.workflow.deliver(order.id));

      expect(order.status).toBe('DELIVERED');
      expect(order.trackingNumber).toBe('TRK-123');
      expect(order.history.map((change) => `${change.from}>${change.to}`)).toEqual([
        'PENDING>CONFIRMED',
        'CONFIRMED>SHIPPED',
        'SHIPPED>DELIVERED',
      ]);
      expect(eventNames(env)).toEqual(['order.placed', 'order.paid', 'order.shipped', 'order.delivered']);
    });

    it('should not ship unpaid orders or without a tracking number', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      const unpaid = await env.workflow.ship(order.id, 'TRK-1');
      expect(!unpaid.ok && unpaid.error.message).toBe("Cannot ship an order in status 'PENDING'");

      await env.workflow.pay(order.id, 'credit_card', card);
      const blank = await env.workflow.ship(order.id, '');
      expect(!blank.ok && blank.error.message).toBe('Tracking number is required');
      expect(order.status).toBe('CONFIRMED');
    });

    it('should not deliver an order that was not shipped', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      const result = await env.workflow.deliver(order.id);

      expect(!result.ok && result.error).toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe('refund', () => {
    it('should refund a confirmed order and restore its stock', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 3]]);
      await env.workflow.pay(order.id, 'credit_card', card);

      const refunded = expectOk(await env.workflow.refund(order.id));

      expect(refunded.paymentStatus).toBe('REFUNDED');
      expect(refunded.status).toBe('CONFIRMED');
      expect(env.stock.availableQuantity('P')).toBe(10);
      expect(env.acquirer.reversals).toEqual([order.receipt?.transactionId]);

      const again = await env.workflow.refund(order.id);
      expect(!again.ok && again.error).toBeInstanceOf(InvalidTransitionError);
      expect(env.stock.availableQuantity('P')).toBe(10);
    });

    it('should not release stock twice for a cancelled paid order', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 3]]);
      await env.workflow.pay(order.id, 'credit_card', card);
      await env.workflow.cancel(order.id);

      expectOk(await env.workflow.refund(order.id));

      expect(env.stock.availableQuantity('P')).toBe(10);
      const refundedEvent = env.events.events().find((event) => event.eventName === 'order.refunded');
      expect(refundedEvent?.payload).toEqual({ orderId: order.id, amount: 4500, currency: 'USD', stockReleased: false });
    });

    it('should require a completed payment', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      const result = await env.workflow.refund(order.id);

      expect(!result.ok && result.error).toBeInstanceOf(InvalidTransitionError);
    });

    it('should leave the order paid when the processor rejects the refund', async () => {
      const env = setup({ acquirer: new SimulatedAcquirer({ rejectReversals: true }) });
      const order = await placeOrder(env, 'user-1', [['P', 3]]);
      await env.workflow.pay(order.id, 'credit_card', card);

      const result = await env.workflow.refund(order.id);

      expect(!result.ok && result.error).toMatchObject({ code: 'PAYMENT_ERROR', reason: 'refund_rejected' });
      expect(order.paymentStatus).toBe('COMPLETED');
      expect(env.stock.availableQuantity('P')).toBe(7);
    });
  });

  describe('setShippingCost', () => {
    it('should change the total until the order is paid', async () => {
      const env = setup();
      const order = await placeOrder(env, 'user-1', [['P', 1]]);

      expectOk(await env.workflow.setShippingCost(order.id, Money.create(499)));
      expect(order.total().getAmount()).toBe(1999);

      const paid = expectOk(await env.workflow.pay(order.id, 'credit_card', card));
      expect(paid.status === 'COMPLETED' && paid.receipt.amount.getAmount()).toBe(1999);

      const late = await env.workflow.setShippingCost(order.id, Money.create(0));
      expect(!late.ok && late.error).toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe('queries', () => {
    it('should get and list orders', async () => {
      const env = setup();
      const first = await placeOrder(env, 'user-1', [['P', 1]]);
      const second = await placeOrder(env, 'user-1', [['P', 1]]);
      await placeOrder(env, 'user-2', [['Q', 1]]);

      expect(expectOk(await env.workflow.getOrder(first.id))).toBe(first);
      expect((await env.workflow.listOrders('user-1')).map((order) => order.id)).toEqual([first.id, second.id]);

      const missing = await env.workflow.getOrder('nope');
      expect(!missing.ok && missing.error).toBeInstanceOf(OrderNotFoundError);
    });
  });

  describe('stock conservation', () => {
    it('should account for every unit ever received', async () => {
      const env = setup();
      env.stock.addStock('Q', 2);

      const paid = await placeOrder(env, 'user-1', [['P', 3]]);
      await env.workflow.pay(paid.id, 'credit_card', card);

      const cancelled = await placeOrder(env, 'user-2', [['P', 2]]);
      await env.workflow.cancel(cancelled.id);

      const refunded = await placeOrder(env, 'user-3', [['P', 1], ['Q', 1]]);
      await env.workflow.pay(refunded.id, 'credit_card', card);
      await env.workflow.refund(refunded.id);

      const retrying = await placeOrder(env, 'user-4', [['P', 4], ['Q', 2]]);
      const outcome: PaymentOutcome = expectOk(await env.workflow.pay(retrying.id, 'credit_card', declinedCard));
      expect(outcome.status).toBe('FAILED');

      for (const productId of ['P', 'Q']) {
        const reserved = env.store
          .all()
          .filter((order) => !order.stockReleased)
          .flatMap((order) => order.lines)
          .filter((line) => line.productId === productId)
          .reduce((units, line) => units + line.quantity, 0);

        expect(reserved + env.stock.availableQuantity(productId)).toBe(env.stock.receivedQuantity(productId));
      }
      expect(env.stock.availableQuantity('P')).toBe(3);
      expect(env.stock.availableQuantity('Q')).toBe(1);
    });
  });
});
