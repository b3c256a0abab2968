/**
 * Payment processors, one per payment method
 *
 * Each variant validates its own payment info and hands settlement to an
 * {@link Acquirer}. The order workflow only sees {@link PaymentProcessor}.
 */

import { z } from 'zod';
import { PaymentError } from '../errors.js';
import { ok, err, type Result } from '../result.js';
import type { Money } from '../money.js';
import type { Acquirer, AuthorizationResult } from './acquirer.js';
import type { PaymentInfo, PaymentMethod, PaymentProcessor, Receipt } from './types.js';

export interface ProcessorOptions {
  /** Clock used for receipts and card expiry (default: system clock) */
  now?: () => Date;
}

// ============================================
// Schemas
// ============================================

const CardNumberSchema = z
  .string()
  .transform((value) => value.replace(/[\s-]/g, ''))
  .pipe(z.string().regex(/^\d{16}$/, 'card number must have 16 digits'));

const ExpirySchema = z
  .string()
  .regex(/^(0[1-9]|1[0-2])\/\d{2}$/, 'expiry must be formatted MM/YY');

export const CreditCardInfoSchema = z.object({
  cardNumber: CardNumberSchema,
  expiry: ExpirySchema,
  cvv: z.string().regex(/^\d{3,4}$/, 'cvv must have 3 or 4 digits'),
  holderName: z.string().trim().min(1).optional(),
});

export const DebitCardInfoSchema = z.object({
  cardNumber: CardNumberSchema,
  expiry: ExpirySchema,
  pin: z.string().regex(/^\d{4,6}$/, 'pin must have 4 to 6 digits'),
});

export const NetBankingInfoSchema = z.object({
  bankCode: z.string().regex(/^[A-Za-z0-9]{4,11}$/, 'bank code must be 4 to 11 letters or digits'),
  accountNumber: z.string().regex(/^\d{6,18}$/, 'account number must have 6 to 18 digits'),
});

export const WalletInfoSchema = z.object({
  provider: z.string().trim().min(1, 'provider is required'),
  walletId: z.string().trim().min(1, 'wallet id is required'),
});

export type CreditCardInfo = z.output<typeof CreditCardInfoSchema>;
export type DebitCardInfo = z.output<typeof DebitCardInfoSchema>;
export type NetBankingInfo = z.output<typeof NetBankingInfoSchema>;
export type WalletInfo = z.output<typeof WalletInfoSchema>;

/**
 * Validate payment info against a schema
 */
export function parsePaymentInfo<S extends z.ZodTypeAny>(
  schema: S,
  info: unknown
): Result<z.output<S>, PaymentError> {
  const parsed = schema.safeParse(info);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return err(new PaymentError('invalid_payment_info', `Invalid payment info: ${issues.join('; ')}`));
  }
  return ok(parsed.data);
}

/**
 * Check a MM/YY expiry against a clock. Cards are valid through the last
 * day of their expiry month.
 */
export function isExpired(expiry: string, now: Date): boolean {
  const [month, year] = expiry.split('/').map(Number);
  if (month === undefined || year === undefined) {
    return true;
  }
  const expiryIndex = (2000 + year) * 12 + (month - 1);
  const currentIndex = now.getUTCFullYear() * 12 + now.getUTCMonth();
  return expiryIndex < currentIndex;
}

// ============================================
// Base processor
// ============================================

/**
 * Shared charge/refund flow: validate, authorize, map the acquirer's answer
 */
export abstract class BasePaymentProcessor<TInfo> implements PaymentProcessor {
  abstract readonly method: PaymentMethod;

  protected readonly now: () => Date;

  constructor(
    protected readonly acquirer: Acquirer,
    options: ProcessorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Validate caller-supplied info */
  protected abstract parse(info: unknown): Result<TInfo, PaymentError>;

  /** Identifier of the funding account sent to the acquirer */
  protected abstract account(info: TInfo): string;

  /** Masked reference stored on the receipt */
  protected abstract reference(info: TInfo): string;

  async charge(amount: Money, info: PaymentInfo): Promise<Result<Receipt, PaymentError>> {
    const parsed = this.parse(info);
    if (!parsed.ok) {
      return parsed;
    }

    let authorization: AuthorizationResult;
    try {
      authorization = await this.acquirer.authorize({
        method: this.method,
        amount,
        account: this.account(parsed.value),
      });
    } catch (error) {
      return err(new PaymentError('unreachable', `Processor unreachable: ${describe(error)}`));
    }

    if (!authorization.approved) {
      return err(new PaymentError('declined', `Payment declined: ${authorization.declineReason}`));
    }

    return ok({
      transactionId: authorization.transactionId,
      method: this.method,
      amount,
      reference: this.reference(parsed.value),
      processedAt: this.now(),
    });
  }

  async refund(amount: Money, receipt: Receipt): Promise<Result<void, PaymentError>> {
    let reversal: AuthorizationResult;
    try {
      reversal = await this.acquirer.reverse(receipt.transactionId, amount);
    } catch (error) {
      return err(new PaymentError('unreachable', `Processor unreachable: ${describe(error)}`));
    }

    if (!reversal.approved) {
      return err(new PaymentError('refund_rejected', `Refund rejected: ${reversal.declineReason}`));
    }
    return ok();
  }
}

// ============================================
// Variants
// ============================================

export class CreditCardProcessor extends BasePaymentProcessor<CreditCardInfo> {
  readonly method = 'credit_card' as const;

  protected parse(info: unknown): Result<CreditCardInfo, PaymentError> {
    const parsed = parsePaymentInfo(CreditCardInfoSchema, info);
    if (parsed.ok && isExpired(parsed.value.expiry, this.now())) {
      return err(new PaymentError('invalid_payment_info', 'Invalid payment info: card has expired'));
    }
    return parsed;
  }

  protected account(info: CreditCardInfo): string {
    return info.cardNumber;
  }

  protected reference(info: CreditCardInfo): string {
    return maskTail(info.cardNumber);
  }
}

export class DebitCardProcessor extends BasePaymentProcessor<DebitCardInfo> {
  readonly method = 'debit_card' as const;

  protected parse(info: unknown): Result<DebitCardInfo, PaymentError> {
    const parsed = parsePaymentInfo(DebitCardInfoSchema, info);
    if (parsed.ok && isExpired(parsed.value.expiry, this.now())) {
      return err(new PaymentError('invalid_payment_info', 'Invalid payment info: card has expired'));
    }
    return parsed;
  }

  protected account(info: DebitCardInfo): string {
    return info.cardNumber;
  }

  protected reference(info: DebitCardInfo): string {
    return maskTail(info.cardNumber);
  }
}

export class NetBankingProcessor extends BasePaymentProcessor<NetBankingInfo> {
  readonly method = 'net_banking' as const;

  protected parse(info: unknown): Result<NetBankingInfo, PaymentError> {
    return parsePaymentInfo(NetBankingInfoSchema, info);
  }

  protected account(info: NetBankingInfo): string {
    return `${info.bankCode.toUpperCase()}:${info.accountNumber}`;
  }

  protected reference(info: NetBankingInfo): string {
    return `${info.bankCode.toUpperCase()} ${maskTail(info.accountNumber)}`;
  }
}

export class WalletProcessor extends BasePaymentProcessor<WalletInfo> {
  readonly method = 'wallet' as const;

  protected parse(info: unknown): Result<WalletInfo, PaymentError> {
    return parsePaymentInfo(WalletInfoSchema, info);
  }

  protected account(info: WalletInfo): string {
    return `${info.provider}:${info.walletId}`;
  }

  protected reference(info: WalletInfo): string {
    return `${info.provider}:${info.walletId}`;
  }
}

/** `4111111111111111` -> `**** 1111` */
function maskTail(digits: string): string {
  return `**** ${digits.slice(-4)}`;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
