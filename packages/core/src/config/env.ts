/**
 * Core configuration
 * Environment is loaded once through dotenv and validated with zod.
 */
import dotenv from 'dotenv';
import { z } from 'zod';
import { LEDGER_RULES, VALIDATION_TIMING } from '@weighbill/shared';

const trueLike = new Set(['1', 'true', 'yes', 'y', 'on']);
const falseLike = new Set(['0', 'false', 'no', 'n', 'off']);

export function parseBooleanEnv(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (trueLike.has(normalized)) {
        return true;
      }
      if (falseLike.has(normalized)) {
        return false;
      }
    }
    return value;
  }, z.boolean().default(defaultValue));
}

/**
 * explicit: one multi-statement transaction per operation, never retried.
 * retrying: no explicit transaction; transient store failures are retried.
 */
export const TRANSACTION_MODES = ['explicit', 'retrying'] as const;
export type TransactionMode = (typeof TRANSACTION_MODES)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CUSTOMER_VALIDATION_DEBOUNCE_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(VALIDATION_TIMING.DEBOUNCE_MS),
  CUSTOMER_VALIDATION_SETTLE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(VALIDATION_TIMING.SETTLE_TIMEOUT_MS),
  CUSTOMER_DATABASE_CHECKS: parseBooleanEnv(true),
  LEDGER_TRANSACTION_MODE: z.enum(TRANSACTION_MODES).default('explicit'),
  LEDGER_TRANSIENT_RETRY_COUNT: z.coerce.number().int().min(0).max(10).default(3),
  BULK_PARTIAL_PAYMENT_FRACTION: z.coerce
    .number()
    .gt(0)
    .max(1)
    .default(LEDGER_RULES.DEFAULT_BULK_FRACTION),
  QUICK_PAYMENT_MAX_DEBT_MULTIPLIER: z.coerce
    .number()
    .positive()
    .default(LEDGER_RULES.QUICK_PAYMENT_MAX_DEBT_MULTIPLIER),
});

export type CoreEnv = z.infer<typeof envSchema>;

let cachedEnv: CoreEnv | null = null;
let dotenvLoaded = false;

export function parseCoreEnv(source: NodeJS.ProcessEnv): CoreEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid core configuration: ${issues}`);
  }
  return result.data;
}

export function getCoreEnv(): CoreEnv {
  if (cachedEnv) {
    return cachedEnv;
  }
  if (!dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }
  cachedEnv = parseCoreEnv(process.env);
  return cachedEnv;
}

export function resetCoreEnvCache(): void {
  cachedEnv = null;
}
