/**
 * Acquirer - the network-facing side of payment settlement
 */

import { generateTransactionId } from '../utils/ids.js';
import type { Money } from '../money.js';
import type { PaymentMethod } from './types.js';

export interface AuthorizationRequest {
  method: PaymentMethod;
  amount: Money;
  /** Card number, bank account or wallet id the funds come from */
  account: string;
}

export type AuthorizationResult =
  | { approved: true; transactionId: string }
  | { approved: false; declineReason: string };

/**
 * Port for the remote processor. Implementations may be slow and may throw
 * when the processor cannot be reached.
 */
export interface Acquirer {
  authorize(request: AuthorizationRequest): Promise<AuthorizationResult>;
  reverse(transactionId: string, amount: Money): Promise<AuthorizationResult>;
}

export interface SimulatedAcquirerOptions {
  /** Artificial network delay per call (default: 0) */
  latencyMs?: number;
  /** Accounts that are always declined */
  declinedAccounts?: Iterable<string>;
  /** Custom decline rule; return a reason to decline */
  decline?: (request: AuthorizationRequest) => string | undefined;
  /** Make every reversal fail */
  rejectReversals?: boolean;
}

/**
 * In-process acquirer for local runs and tests
 */
export class SimulatedAcquirer implements Acquirer {
  private readonly latencyMs: number;
  private readonly declinedAccounts: Set<string>;
  private readonly declineRule?: (request: AuthorizationRequest) => string | undefined;
  private readonly rejectReversals: boolean;
  private readonly _authorizations: AuthorizationRequest[] = [];
  private readonly _reversals: string[] = [];

  constructor(options: SimulatedAcquirerOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.declinedAccounts = new Set(options.declinedAccounts);
    this.declineRule = options.decline;
    this.rejectReversals = options.rejectReversals ?? false;
  }

  async authorize(request: AuthorizationRequest): Promise<AuthorizationResult> {
    await this.simulateDelay();
    this._authorizations.push(request);

    if (this.declinedAccounts.has(request.account)) {
      return { approved: false, declineReason: 'Account declined by issuer' };
    }

    const reason = this.declineRule?.(request);
    if (reason !== undefined) {
      return { approved: false, declineReason: reason };
    }

    return { approved: true, transactionId: generateTransactionId('txn') };
  }

  async reverse(transactionId: string, _amount: Money): Promise<AuthorizationResult> {
    await this.simulateDelay();
    this._reversals.push(transactionId);

    if (this.rejectReversals) {
      return { approved: false, declineReason: `Reversal of ${transactionId} rejected` };
    }
    return { approved: true, transactionId: generateTransactionId('ref') };
  }

  /** Authorization requests seen so far */
  get authorizations(): readonly AuthorizationRequest[] {
    return this._authorizations;
  }

  /** Transaction ids reversed so far */
  get reversals(): readonly string[] {
    return this._reversals;
  }

  private simulateDelay(): Promise<void> {
    if (this.latencyMs <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, this.latencyMs));
  }
}
