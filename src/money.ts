/**
 * Money Value Object
 * Integer amount in minor units (cents) with an ISO 4217 currency code
 */

import { CurrencyMismatchError, InvalidMoneyError } from './errors.js';

export class Money {
  private constructor(
    private readonly amount: number,
    private readonly currency: string
  ) {
    Object.freeze(this);
  }

  /**
   * Create from minor units, e.g. `Money.create(1999)` is USD 19.99
   */
  static create(amount: number, currency: string = 'USD'): Money {
    if (!Number.isSafeInteger(amount)) {
      throw new InvalidMoneyError(`Amount must be an integer number of minor units, got ${amount}`);
    }
    if (amount < 0) {
      throw new InvalidMoneyError('Amount cannot be negative');
    }
    if (!/^[A-Za-z]{3}$/.test(currency)) {
      throw new InvalidMoneyError(`Invalid currency code: ${currency}`);
    }
    return new Money(amount, currency.toUpperCase());
  }

  /**
   * Create from a major-unit decimal, rounding to the nearest minor unit
   */
  static fromMajor(amount: number, currency: string = 'USD'): Money {
    return Money.create(Math.round(amount * 100), currency);
  }

  static zero(currency: string = 'USD'): Money {
    return Money.create(0, currency);
  }

  getAmount(): number {
    return this.amount;
  }

  getCurrency(): string {
    return this.currency;
  }

  isZero(): boolean {
    return this.amount === 0;
  }

  add(other: Money): Money {
    this.ensureSameCurrency(other);
    return Money.create(this.amount + other.amount, this.currency);
  }

  multiply(factor: number): Money {
    if (!Number.isInteger(factor) || factor < 0) {
      throw new InvalidMoneyError(`Factor must be a non-negative integer, got ${factor}`);
    }
    return Money.create(this.amount * factor, this.currency);
  }

  isGreaterThan(other: Money): boolean {
    this.ensureSameCurrency(other);
    return this.amount > other.amount;
  }

  equals(other: Money): boolean {
    return this.amount === other.amount && this.currency === other.currency;
  }

  /** e.g. `USD 19.99` */
  format(): string {
    const major = Math.floor(this.amount / 100);
    const minor = String(this.amount % 100).padStart(2, '0');
    return `${this.currency} ${major}.${minor}`;
  }

  toString(): string {
    return this.format();
  }

  toJSON() {
    return {
      amount: this.amount,
      currency: this.currency,
    };
  }

  private ensureSameCurrency(other: Money): void {
    if (this.currency !== other.currency) {
      throw new CurrencyMismatchError(this.currency, other.currency);
    }
  }
}

/**
 * Sum amounts of a single currency
 */
export function sum(amounts: Iterable<Money>, currency: string = 'USD'): Money {
  let total = Money.zero(currency);
  for (const amount of amounts) {
    total = total.add(amount);
  }
  return total;
}
