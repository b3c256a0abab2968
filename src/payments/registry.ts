/**
 * PaymentProcessorRegistry - payment method to processor dispatch
 */

import { ConfigurationError } from '../errors.js';
import type { Acquirer } from './acquirer.js';
import {
  CreditCardProcessor,
  DebitCardProcessor,
  NetBankingProcessor,
  WalletProcessor,
} from './processors.js';
import { withTimeout } from './timeout.js';
import type { Logger } from '../logging/logger.js';
import type { PaymentMethod, PaymentProcessor } from './types.js';

/**
 * Holds at most one processor per method. Adding a method means
 * registering a processor; the order workflow never changes.
 *
 * @example
 * ```typescript
 * const registry = new PaymentProcessorRegistry()
 *   .register(new WalletProcessor(acquirer));
 * registry.get('wallet');
 * ```
 */
export class PaymentProcessorRegistry {
  private readonly processors = new Map<PaymentMethod, PaymentProcessor>();

  constructor(processors: Iterable<PaymentProcessor> = []) {
    for (const processor of processors) {
      this.register(processor);
    }
  }

  /**
   * Register a processor, replacing any previous one for its method
   */
  register(processor: PaymentProcessor): this {
    this.processors.set(processor.method, processor);
    return this;
  }

  deregister(method: PaymentMethod): this {
    this.processors.delete(method);
    return this;
  }

  /**
   * @throws ConfigurationError when no processor handles `method`
   */
  get(method: PaymentMethod): PaymentProcessor {
    const processor = this.processors.get(method);
    if (!processor) {
      throw new ConfigurationError(`No payment processor registered for method '${method}'`);
    }
    return processor;
  }

  find(method: PaymentMethod): PaymentProcessor | undefined {
    return this.processors.get(method);
  }

  has(method: PaymentMethod): boolean {
    return this.processors.has(method);
  }

  methods(): PaymentMethod[] {
    return Array.from(this.processors.keys());
  }

  get size(): number {
    return this.processors.size;
  }
}

export interface DefaultProcessorOptions {
  /** Wrap each processor in a timeout (omit for none) */
  timeoutMs?: number;
  now?: () => Date;
  /** Receives late-settlement reports from the timeout wrappers */
  logger?: Logger;
}

/**
 * Registry with one processor per supported method, all settling through
 * `acquirer`
 */
export function createDefaultProcessors(
  acquirer: Acquirer,
  options: DefaultProcessorOptions = {}
): PaymentProcessorRegistry {
  const processorOptions = { now: options.now };
  const processors: PaymentProcessor[] = [
    new CreditCardProcessor(acquirer, processorOptions),
    new DebitCardProcessor(acquirer, processorOptions),
    new NetBankingProcessor(acquirer, processorOptions),
    new WalletProcessor(acquirer, processorOptions),
  ];

  const { timeoutMs, logger } = options;
  return new PaymentProcessorRegistry(
    timeoutMs === undefined ? processors : processors.map((p) => withTimeout(p, timeoutMs, { logger }))
  );
}
