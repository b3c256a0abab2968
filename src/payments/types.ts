/**
 * Payment types shared by processors, the registry and the order workflow
 */

import type { Money } from '../money.js';
import type { PaymentError } from '../errors.js';
import type { Result } from '../result.js';

export const PAYMENT_METHODS = ['credit_card', 'debit_card', 'net_banking', 'wallet'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/**
 * Method-specific fields as supplied by the caller; each processor
 * validates its own shape.
 */
export type PaymentInfo = Record<string, unknown>;

/**
 * Proof of a settled charge. Kept on the order and used for refunds, so it
 * never holds full card or account numbers.
 */
export interface Receipt {
  readonly transactionId: string;
  readonly method: PaymentMethod;
  readonly amount: Money;
  /** Masked account reference, e.g. `**** 3456` */
  readonly reference: string;
  readonly processedAt: Date;
}

/**
 * Capability interface implemented once per payment method
 */
export interface PaymentProcessor {
  readonly method: PaymentMethod;

  charge(amount: Money, info: PaymentInfo): Promise<Result<Receipt, PaymentError>>;

  refund(amount: Money, receipt: Receipt): Promise<Result<void, PaymentError>>;
}

export function isPaymentMethod(value: unknown): value is PaymentMethod {
  return PAYMENT_METHODS.some((method) => method === value);
}
