/**
 * StockLedger - sole owner and mutator of per-product available quantity
 */

import { InsufficientStockError, InvalidQuantityError } from '../errors.js';
import { ok, err, type Result } from '../result.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { silentLogger, type Logger } from '../logging/logger.js';

interface StockEntry {
  /** Units that can still be reserved */
  available: number;
  /** Units ever added through restocking */
  received: number;
}

export interface StockLevel {
  productId: string;
  available: number;
  received: number;
}

/**
 * Read-only view handed to carts and catalog/search collaborators
 */
export interface StockReader {
  availableQuantity(productId: string): number;
}

export interface StockLedgerOptions {
  logger?: Logger;
}

/**
 * Per-product stock counters.
 *
 * `reserve`, `release` and `addStock` complete synchronously, so each one is
 * atomic on the event loop: a check-and-decrement can never interleave with
 * another for the same product. Callers whose critical section spans an
 * `await` (order creation persisting to a store) additionally hold the
 * product locks through {@link withProductLocks}.
 *
 * @example
 * ```typescript
 * const ledger = new StockLedger();
 * ledger.addStock('sku-1', 10);
 * ledger.reserve('sku-1', 3); // ok, 7 left
 * ledger.reserve('sku-1', 8); // InsufficientStockError { requested: 8, available: 7 }
 * ```
 */
export class StockLedger implements StockReader {
  private readonly entries = new Map<string, StockEntry>();
  private readonly locks = new KeyedLock();
  private readonly logger: Logger;

  constructor(options: StockLedgerOptions = {}) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Restock a product. Zero is accepted and registers the product.
   *
   * @returns the new available quantity
   */
  addStock(productId: string, quantity: number): Result<number, InvalidQuantityError> {
    if (!Number.isSafeInteger(quantity) || quantity < 0) {
      return err(new InvalidQuantityError(quantity, 'Stock quantity must be a non-negative integer'));
    }

    const entry = this.entry(productId);
    entry.available += quantity;
    entry.received += quantity;

    this.logger.debug('stock.added', { productId, quantity, available: entry.available });
    return ok(entry.available);
  }

  /**
   * Atomically take `quantity` units if that many are available.
   * Fails without side effect otherwise.
   */
  reserve(
    productId: string,
    quantity: number
  ): Result<void, InsufficientStockError | InvalidQuantityError> {
    if (!isPositiveInteger(quantity)) {
      return err(new InvalidQuantityError(quantity, 'Reserved quantity must be a positive integer'));
    }

    const available = this.availableQuantity(productId);
    if (available < quantity) {
      this.logger.debug('stock.reserve_rejected', { productId, requested: quantity, available });
      return err(new InsufficientStockError(productId, quantity, available));
    }

    const entry = this.entry(productId);
    entry.available -= quantity;

    this.logger.debug('stock.reserved', { productId, quantity, available: entry.available });
    return ok();
  }

  /**
   * Return `quantity` units. Calling twice for one event double-counts;
   * the order workflow guards against that.
   *
   * @returns the new available quantity
   */
  release(productId: string, quantity: number): Result<number, InvalidQuantityError> {
    if (!isPositiveInteger(quantity)) {
      return err(new InvalidQuantityError(quantity, 'Released quantity must be a positive integer'));
    }

    const entry = this.entry(productId);
    entry.available += quantity;

    this.logger.debug('stock.released', { productId, quantity, available: entry.available });
    return ok(entry.available);
  }

  /**
   * Snapshot read; a later `reserve` re-checks on its own
   */
  availableQuantity(productId: string): number {
    return this.entries.get(productId)?.available ?? 0;
  }

  receivedQuantity(productId: string): number {
    return this.entries.get(productId)?.received ?? 0;
  }

  has(productId: string): boolean {
    return this.entries.has(productId);
  }

  /**
   * Run `fn` holding the lock of every listed product, taken in ascending
   * product id order.
   */
  withProductLocks<T>(productIds: Iterable<string>, fn: () => T | Promise<T>): Promise<T> {
    return this.locks.runExclusiveMany(productIds, fn);
  }

  levels(): StockLevel[] {
    return Array.from(this.entries, ([productId, entry]) => ({
      productId,
      available: entry.available,
      received: entry.received,
    }));
  }

  private entry(productId: string): StockEntry {
    let entry = this.entries.get(productId);
    if (!entry) {
      entry = { available: 0, received: 0 };
      this.entries.set(productId, entry);
    }
    return entry;
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}
