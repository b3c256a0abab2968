/**
 * storefront-core Global Configuration
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { Money } from './money.js';
import { Logger, type LogLevel } from './logging/logger.js';
import { createFormatter } from './logging/formatters/index.js';
import type { LogFormat, LogFormatter } from './logging/formatters/types.js';

/**
 * Global configuration options
 */
export interface StorefrontConfiguration {
  /** ISO 4217 code used for prices, totals and shipping */
  currency: string;

  /** Shipping cost given to new orders, in minor units */
  defaultShippingCost: number;

  /** Upper bound on a single processor charge or refund */
  paymentTimeoutMs: number;

  // Logging
  logger: {
    output?: NodeJS.WritableStream;
    /** Takes precedence over `format` */
    formatter?: LogFormatter;
    format: LogFormat;
    progname: string;
    level: LogLevel;
    enabled: boolean;
  };
}

/**
 * Default configuration
 */
function createDefaultConfiguration(): StorefrontConfiguration {
  return {
    currency: 'USD',
    defaultShippingCost: 0,
    paymentTimeoutMs: 10_000,
    logger: {
      format: 'line',
      progname: 'storefront',
      level: 'info',
      enabled: true,
    },
  };
}

/**
 * Global configuration instance
 */
let configuration: StorefrontConfiguration = createDefaultConfiguration();

/**
 * Get the current configuration
 */
export function getConfiguration(): StorefrontConfiguration {
  return configuration;
}

/**
 * Configure storefront-core globally
 *
 * @example
 * ```typescript
 * configure((config) => {
 *   config.currency = 'EUR';
 *   config.logger.level = 'debug';
 * });
 * ```
 */
export function configure(fn: (config: StorefrontConfiguration) => void): void {
  fn(configuration);
}

/**
 * Reset configuration to defaults
 */
export function resetConfiguration(): void {
  configuration = createDefaultConfiguration();
}

/**
 * Build a logger from the logging section of a configuration
 */
export function createConfiguredLogger(config: StorefrontConfiguration = configuration): Logger {
  const { output, formatter, format, progname, level, enabled } = config.logger;
  return new Logger({
    output,
    formatter: formatter ?? createFormatter(format),
    progname,
    level,
    enabled,
  });
}

/**
 * Default shipping cost as money in the configured currency
 */
export function defaultShippingCost(config: StorefrontConfiguration = configuration): Money {
  return Money.create(config.defaultShippingCost, config.currency);
}

// ============================================
// Environment
// ============================================

const EnvSchema = z.object({
  STOREFRONT_CURRENCY: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'must be a three-letter currency code')
    .transform((code) => code.toUpperCase())
    .optional(),
  STOREFRONT_SHIPPING_COST: z.coerce.number().int().nonnegative().optional(),
  STOREFRONT_PAYMENT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STOREFRONT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  STOREFRONT_LOG_FORMAT: z.enum(['line', 'json', 'keyvalue']).optional(),
  STOREFRONT_LOG_ENABLED: z
    .enum(['true', 'false', '1', '0'])
    .transform((flag) => flag === 'true' || flag === '1')
    .optional(),
});

export type EnvironmentOverrides = z.infer<typeof EnvSchema>;

/**
 * Parse `STOREFRONT_*` variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnvironment(env: Record<string, string | undefined>): EnvironmentOverrides {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Apply `STOREFRONT_*` variables over the global configuration
 */
export function configureFromEnv(env: Record<string, string | undefined> = process.env): StorefrontConfiguration {
  const overrides = parseEnvironment(env);

  configure((config) => {
    if (overrides.STOREFRONT_CURRENCY !== undefined) config.currency = overrides.STOREFRONT_CURRENCY;
    if (overrides.STOREFRONT_SHIPPING_COST !== undefined) {
      config.defaultShippingCost = overrides.STOREFRONT_SHIPPING_COST;
    }
    if (overrides.STOREFRONT_PAYMENT_TIMEOUT_MS !== undefined) {
      config.paymentTimeoutMs = overrides.STOREFRONT_PAYMENT_TIMEOUT_MS;
    }
    if (overrides.STOREFRONT_LOG_LEVEL !== undefined) config.logger.level = overrides.STOREFRONT_LOG_LEVEL;
    if (overrides.STOREFRONT_LOG_FORMAT !== undefined) config.logger.format = overrides.STOREFRONT_LOG_FORMAT;
    if (overrides.STOREFRONT_LOG_ENABLED !== undefined) config.logger.enabled = overrides.STOREFRONT_LOG_ENABLED;
  });

  return configuration;
}
