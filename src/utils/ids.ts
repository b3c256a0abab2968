/**
 * Identifier generation
 */

import { v4 as uuidv4, v7 as uuidv7 } from 'uuid';

/**
 * Time-ordered order id (UUID v7), so ids sort by creation time
 */
export function generateOrderId(): string {
  return uuidv7();
}

/**
 * Processor transaction reference
 */
export function generateTransactionId(prefix: 'txn' | 'ref' = 'txn'): string {
  return `${prefix}_${uuidv4()}`;
}

/**
 * Correlation id for tracing one operation through the logs
 */
export function generateCorrelationId(): string {
  return uuidv7();
}
