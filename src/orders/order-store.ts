/**
 * OrderStore - persistence port for orders
 */

import type { Order } from './order.js';

/**
 * Narrow get/put contract. Adapters for real databases implement this;
 * a rejected `put` makes the workflow compensate and rethrow.
 */
export interface OrderStore {
  get(orderId: string): Promise<Order | undefined>;
  put(order: Order): Promise<void>;
  listByUser(userId: string): Promise<Order[]>;
}

/**
 * In-memory implementation of OrderStore
 */
export class InMemoryOrderStore implements OrderStore {
  private orders: Map<string, Order> = new Map();

  async get(orderId: string): Promise<Order | undefined> {
    return this.orders.get(orderId);
  }

  async put(order: Order): Promise<void> {
    this.orders.set(order.id, order);
  }

  /**
   * Orders of a user, oldest first
   */
  async listByUser(userId: string): Promise<Order[]> {
    const userOrders: Order[] = [];
    for (const order of this.orders.values()) {
      if (order.userId === userId) {
        userOrders.push(order);
      }
    }
    return userOrders;
  }

  // Helpers for tests and conservation checks
  all(): Order[] {
    return Array.from(this.orders.values());
  }

  get size(): number {
    return this.orders.size;
  }

  clear(): void {
    this.orders.clear();
  }
}
