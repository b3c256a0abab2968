/**
 * Product catalog - the records the core reads names, prices and
 * availability flags from. Stock counts live in the StockLedger.
 */

import { v4 as uuidv4 } from 'uuid';
import { ProductNotFoundError, StorefrontError } from '../errors.js';
import { ok, err, type Result } from '../result.js';
import type { Money } from '../money.js';

export interface Product {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly price: Money;
  /** Inactive products cannot be added to carts or ordered */
  readonly active: boolean;
  readonly specifications: Readonly<Record<string, string>>;
}

export interface NewProduct {
  id?: string;
  name: string;
  description?: string;
  price: Money;
  active?: boolean;
  specifications?: Record<string, string>;
}

/**
 * Read side of the catalog used by carts and the order workflow
 */
export interface ProductCatalog {
  findById(id: string): Product | undefined;
}

/**
 * In-memory catalog. Products are immutable records; every update
 * replaces the record, so holders of an older record keep what they saw.
 */
export class InMemoryProductCatalog implements ProductCatalog {
  private products: Map<string, Product> = new Map();

  add(input: NewProduct): Product {
    if (input.name.trim().length === 0) {
      throw new StorefrontError('Product name is required');
    }

    const id = input.id ?? uuidv4();
    if (this.products.has(id)) {
      throw new StorefrontError(`Product '${id}' already exists`);
    }

    const product: Product = Object.freeze({
      id,
      name: input.name,
      description: input.description ?? '',
      price: input.price,
      active: input.active ?? true,
      specifications: Object.freeze({ ...input.specifications }),
    });
    this.products.set(id, product);
    return product;
  }

  findById(id: string): Product | undefined {
    return this.products.get(id);
  }

  findByIds(ids: string[]): Product[] {
    return ids
      .map((id) => this.products.get(id))
      .filter((p): p is Product => p !== undefined);
  }

  /**
   * Case-insensitive substring match over name and description
   */
  search(query: string): Product[] {
    const needle = query.trim().toLowerCase();
    return this.all().filter(
      (product) =>
        product.active &&
        (product.name.toLowerCase().includes(needle) ||
          product.description.toLowerCase().includes(needle))
    );
  }

  setPrice(id: string, price: Money): Result<Product, ProductNotFoundError> {
    return this.update(id, { price });
  }

  setActive(id: string, active: boolean): Result<Product, ProductNotFoundError> {
    return this.update(id, { active });
  }

  addSpecification(id: string, key: string, value: string): Result<Product, ProductNotFoundError> {
    const product = this.products.get(id);
    if (!product) {
      return err(new ProductNotFoundError(id));
    }
    return this.update(id, {
      specifications: Object.freeze({ ...product.specifications, [key]: value }),
    });
  }

  all(): Product[] {
    return Array.from(this.products.values());
  }

  // Helper for testing
  clear(): void {
    this.products.clear();
  }

  private update(
    id: string,
    changes: Partial<Omit<Product, 'id'>>
  ): Result<Product, ProductNotFoundError> {
    const product = this.products.get(id);
    if (!product) {
      return err(new ProductNotFoundError(id));
    }
    const updated: Product = Object.freeze({ ...product, ...changes });
    this.products.set(id, updated);
    return ok(updated);
  }
}
