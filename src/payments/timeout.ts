/**
 * Timeout decorator for payment processors
 */

import { PaymentError } from '../errors.js';
import { err, type Result } from '../result.js';
import type { Money } from '../money.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { PaymentInfo, PaymentMethod, PaymentProcessor, Receipt } from './types.js';

export interface TimeoutOptions {
  logger?: Logger;
}

const TIMED_OUT: unique symbol = Symbol('timed out');

/**
 * Bounds every charge and refund of the wrapped processor. A call that
 * outlives `timeoutMs` resolves to `PaymentError('timeout')`.
 *
 * The caller has already been told the call failed when a late answer
 * arrives, so a charge that settles anyway is reversed through the wrapped
 * processor. A refund that settles late cannot be undone and is logged as
 * an error for reconciliation.
 *
 * @example
 * ```typescript
 * const card = withTimeout(new CreditCardProcessor(acquirer), 5_000, { logger });
 * ```
 */
export class TimeoutPaymentProcessor implements PaymentProcessor {
  readonly method: PaymentMethod;

  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly inner: PaymentProcessor,
    readonly timeoutMs: number,
    options: TimeoutOptions = {}
  ) {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Payment timeout must be a positive number, got ${timeoutMs}`);
    }
    this.method = inner.method;
    this.logger = options.logger ?? silentLogger();
  }

  charge(amount: Money, info: PaymentInfo): Promise<Result<Receipt, PaymentError>> {
    return this.race(this.inner.charge(amount, info), 'charge', (receipt) => this.reverseLateCharge(receipt));
  }

  refund(amount: Money, receipt: Receipt): Promise<Result<void, PaymentError>> {
    return this.race(this.inner.refund(amount, receipt), 'refund', () => {
      this.logger.error('payment.late_refund_settled', {
        method: this.method,
        transactionId: receipt.transactionId,
        amount,
      });
    });
  }

  /**
   * Resolves once every late answer seen so far has been handled
   */
  async settled(): Promise<void> {
    await Promise.all(this.pending);
  }

  private async race<T>(
    call: Promise<Result<T, PaymentError>>,
    operation: 'charge' | 'refund',
    onLateSuccess: (value: T) => void | Promise<void>
  ): Promise<Result<T, PaymentError>> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });

    const outcome = await Promise.race([call, timeout]).finally(() => clearTimeout(timer));

    if (outcome !== TIMED_OUT) {
      return outcome;
    }

    this.logger.warn('payment.timed_out', { method: this.method, operation, timeoutMs: this.timeoutMs });
    this.track(call, operation, onLateSuccess);
    return err(new PaymentError('timeout', `Payment ${operation} exceeded ${this.timeoutMs}ms`));
  }

  private track<T>(
    call: Promise<Result<T, PaymentError>>,
    operation: 'charge' | 'refund',
    onLateSuccess: (value: T) => void | Promise<void>
  ): void {
    const handled = call
      .then(async (late) => {
        if (late.ok) {
          await onLateSuccess(late.value);
        }
      })
      .catch((error: unknown) => {
        this.logger.error('payment.late_answer_failed', { method: this.method, operation, error });
      })
      .finally(() => {
        this.pending.delete(handled);
      });
    this.pending.add(handled);
  }

  private async reverseLateCharge(receipt: Receipt): Promise<void> {
    const reversed = await this.inner.refund(receipt.amount, receipt);
    if (reversed.ok) {
      this.logger.warn('payment.late_charge_reversed', {
        method: this.method,
        transactionId: receipt.transactionId,
        amount: receipt.amount,
      });
      return;
    }
    this.logger.error('payment.late_charge_reversal_failed', {
      method: this.method,
      transactionId: receipt.transactionId,
      error: reversed.error,
    });
  }
}

export function withTimeout(
  processor: PaymentProcessor,
  timeoutMs: number,
  options: TimeoutOptions = {}
): TimeoutPaymentProcessor {
  return new TimeoutPaymentProcessor(processor, timeoutMs, options);
}
