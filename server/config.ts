/**
 * Engine Configuration
 *
 * Reads and validates environment variables once, at engine construction.
 * Invalid values fail fast with every problem listed in one message.
 */

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1' || value === 'yes'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  DATABASE_URL: z
    .string()
    .url('DATABASE_URL must be a valid PostgreSQL connection string')
    .optional(),
  ORDER_TRANSITIONS_STRICT: booleanFlag(true),
  ALLOW_OVERPAYMENT: booleanFlag(true),
  ORDER_NUMBER_PREFIX: z.string().regex(/^[A-Z0-9]{1,10}$/, 'ORDER_NUMBER_PREFIX must be 1-10 upper-case letters or digits').default('ORD'),
  PAYMENT_NUMBER_PREFIX: z.string().regex(/^[A-Z0-9]{1,10}$/, 'PAYMENT_NUMBER_PREFIX must be 1-10 upper-case letters or digits').default('PAY'),
});

export interface EngineConfig {
  nodeEnv: 'development' | 'production' | 'test';
  databaseUrl?: string;
  /** Enforce the lifecycle transition table on every transition. */
  strictTransitions: boolean;
  /** Accept payments above the current balance (recorded as credit). */
  allowOverpayment: boolean;
  orderNumberPrefix: string;
  paymentNumberPrefix: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  nodeEnv: 'development',
  strictTransitions: true,
  allowOverpayment: true,
  orderNumberPrefix: 'ORD',
  paymentNumberPrefix: 'PAY',
};

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Blank values behave like unset ones
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(fromZodError(parsed.error, { prefix: 'Invalid engine configuration' }).message);
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    databaseUrl: values.DATABASE_URL,
    strictTransitions: values.ORDER_TRANSITIONS_STRICT,
    allowOverpayment: values.ALLOW_OVERPAYMENT,
    orderNumberPrefix: values.ORDER_NUMBER_PREFIX,
    paymentNumberPrefix: values.PAYMENT_NUMBER_PREFIX,
  };
}

/**
 * Like loadEngineConfig, but also requires DATABASE_URL.
 */
export function loadDatabaseEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig & { databaseUrl: string } {
  const config = loadEngineConfig(env);
  if (!config.databaseUrl) {
    throw new ConfigError('DATABASE_URL must be set (in your environment or .env file) before starting the order engine.');
  }
  return { ...config, databaseUrl: config.databaseUrl };
}
