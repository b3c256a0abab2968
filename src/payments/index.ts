/**
 * Payments
 */

export {
  PAYMENT_METHODS,
  isPaymentMethod,
  type PaymentMethod,
  type PaymentInfo,
  type PaymentProcessor,
  type Receipt,
} from './types.js';

export {
  SimulatedAcquirer,
  type Acquirer,
  type AuthorizationRequest,
  type AuthorizationResult,
  type SimulatedAcquirerOptions,
} from './acquirer.js';

export {
  BasePaymentProcessor,
  CreditCardProcessor,
  DebitCardProcessor,
  NetBankingProcessor,
  WalletProcessor,
  CreditCardInfoSchema,
  DebitCardInfoSchema,
  NetBankingInfoSchema,
  WalletInfoSchema,
  parsePaymentInfo,
  isExpired,
  type CreditCardInfo,
  type DebitCardInfo,
  type NetBankingInfo,
  type WalletInfo,
  type ProcessorOptions,
} from './processors.js';

export { TimeoutPaymentProcessor, withTimeout } from './timeout.js';

export {
  PaymentProcessorRegistry,
  createDefaultProcessors,
  type DefaultProcessorOptions,
} from './registry.js';
