/**
 * Cart - a user's staging area of (product, quantity) lines
 */

import {
  CurrencyMismatchError,
  InsufficientStockError,
  InvalidQuantityError,
  ProductNotFoundError,
} from '../errors.js';
import { ok, err, type Result } from '../result.js';
import { Money } from '../money.js';
import type { ProductCatalog } from '../catalog/product-catalog.js';
import type { StockReader } from '../inventory/stock-ledger.js';

export interface CartLine {
  readonly productId: string;
  readonly quantity: number;
}

export interface CartDependencies {
  catalog: ProductCatalog;
  stock: StockReader;
  /** Currency of `total()` (default: USD) */
  currency?: string;
}

export type AddItemError =
  | InvalidQuantityError
  | ProductNotFoundError
  | InsufficientStockError
  | CurrencyMismatchError;
export type SetQuantityError = AddItemError;

/**
 * Stock checks made here are advisory: availability can change between an
 * edit and checkout, and order creation checks again by reserving.
 */
export class Cart {
  readonly userId: string;

  /** productId -> quantity, in insertion order */
  private readonly items = new Map<string, number>();
  private readonly catalog: ProductCatalog;
  private readonly stock: StockReader;
  private readonly currency: string;

  constructor(userId: string, deps: CartDependencies) {
    this.userId = userId;
    this.catalog = deps.catalog;
    this.stock = deps.stock;
    this.currency = deps.currency ?? 'USD';
  }

  /**
   * Add units of a product, merging with an existing line
   */
  addItem(productId: string, quantity: number = 1): Result<CartLine, AddItemError> {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      return err(new InvalidQuantityError(quantity, 'Quantity must be a positive integer'));
    }

    const product = this.catalog.findById(productId);
    if (!product || !product.active) {
      return err(new ProductNotFoundError(productId));
    }
    if (product.price.getCurrency() !== this.currency) {
      return err(new CurrencyMismatchError(product.price.getCurrency(), this.currency));
    }

    const requested = (this.items.get(productId) ?? 0) + quantity;
    const available = this.stock.availableQuantity(productId);
    if (requested > available) {
      return err(new InsufficientStockError(productId, requested, available));
    }

    this.items.set(productId, requested);
    return ok({ productId, quantity: requested });
  }

  /**
   * Replace a line's quantity. Zero removes the line.
   *
   * @returns the resulting line, or undefined when it was removed
   */
  setQuantity(productId: string, quantity: number): Result<CartLine | undefined, SetQuantityError> {
    if (!Number.isSafeInteger(quantity) || quantity < 0) {
      return err(new InvalidQuantityError(quantity, 'Quantity cannot be negative'));
    }

    if (quantity === 0) {
      this.items.delete(productId);
      return ok(undefined);
    }

    const product = this.catalog.findById(productId);
    if (!product || !product.active) {
      return err(new ProductNotFoundError(productId));
    }
    if (product.price.getCurrency() !== this.currency) {
      return err(new CurrencyMismatchError(product.price.getCurrency(), this.currency));
    }

    const available = this.stock.availableQuantity(productId);
    if (quantity > available) {
      return err(new InsufficientStockError(productId, quantity, available));
    }

    this.items.set(productId, quantity);
    return ok({ productId, quantity });
  }

  /** @returns whether a line was removed */
  removeItem(productId: string): boolean {
    return this.items.delete(productId);
  }

  clear(): void {
    this.items.clear();
  }

  /**
   * Take converted lines out of the cart. Units added after the lines were
   * snapshotted stay.
   */
  subtract(lines: readonly CartLine[]): void {
    for (const line of lines) {
      const remaining = this.quantityOf(line.productId) - line.quantity;
      if (remaining > 0) {
        this.items.set(line.productId, remaining);
      } else {
        this.items.delete(line.productId);
      }
    }
  }

  quantityOf(productId: string): number {
    return this.items.get(productId) ?? 0;
  }

  lines(): CartLine[] {
    return Array.from(this.items, ([productId, quantity]) => ({ productId, quantity }));
  }

  /**
   * Frozen copy of the lines, safe to hold across awaits
   */
  snapshot(): readonly CartLine[] {
    return Object.freeze(this.lines().map((line) => Object.freeze(line)));
  }

  get isEmpty(): boolean {
    return this.items.size === 0;
  }

  /** Total number of units across all lines */
  get itemCount(): number {
    let count = 0;
    for (const quantity of this.items.values()) {
      count += quantity;
    }
    return count;
  }

  /**
   * Sum of quantity x current catalog price. Lines whose product left the
   * catalog count as zero.
   */
  total(): Money {
    let total = Money.zero(this.currency);
    for (const [productId, quantity] of this.items) {
      const product = this.catalog.findById(productId);
      if (product) {
        total = total.add(product.price.multiply(quantity));
      }
    }
    return total;
  }
}

/**
 * One cart per user, created on first access
 */
export class CartRegistry {
  private readonly carts = new Map<string, Cart>();

  constructor(private readonly deps: CartDependencies) {}

  forUser(userId: string): Cart {
    let cart = this.carts.get(userId);
    if (!cart) {
      cart = new Cart(userId, this.deps);
      this.carts.set(userId, cart);
    }
    return cart;
  }

  get(userId: string): Cart | undefined {
    return this.carts.get(userId);
  }

  discard(userId: string): boolean {
    return this.carts.delete(userId);
  }

  get size(): number {
    return this.carts.size;
  }
}
