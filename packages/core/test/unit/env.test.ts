import { describe, it, expect } from 'vitest';
import { parseCoreEnv } from '../../src/config/env.js';
import { transactionOptionsFromEnv } from '../../src/transactions/transaction.service.js';
import { validationOptionsFromEnv } from '../../src/customers/validation-pipeline.js';

describe('core configuration', () => {
  it('falls back to the documented defaults', () => {
    const env = parseCoreEnv({});

    expect(env.LEDGER_TRANSACTION_MODE).toBe('explicit');
    expect(env.LEDGER_TRANSIENT_RETRY_COUNT).toBe(3);
    expect(env.CUSTOMER_VALIDATION_DEBOUNCE_MS).toBe(750);
    expect(env.CUSTOMER_VALIDATION_SETTLE_TIMEOUT_MS).toBe(5000);
    expect(env.CUSTOMER_DATABASE_CHECKS).toBe(true);
    expect(env.BULK_PARTIAL_PAYMENT_FRACTION).toBe(0.25);
    expect(env.QUICK_PAYMENT_MAX_DEBT_MULTIPLIER).toBe(2);
  });

  it('reads numbers and booleans from strings', () => {
    const env = parseCoreEnv({
      LEDGER_TRANSACTION_MODE: 'retrying',
      LEDGER_TRANSIENT_RETRY_COUNT: '5',
      CUSTOMER_DATABASE_CHECKS: 'off',
      BULK_PARTIAL_PAYMENT_FRACTION: '0.5',
    });

    expect(env.LEDGER_TRANSACTION_MODE).toBe('retrying');
    expect(env.LEDGER_TRANSIENT_RETRY_COUNT).toBe(5);
    expect(env.CUSTOMER_DATABASE_CHECKS).toBe(false);
    expect(env.BULK_PARTIAL_PAYMENT_FRACTION).toBe(0.5);
  });

  it('accepts only one transaction mode', () => {
    expect(() => parseCoreEnv({ LEDGER_TRANSACTION_MODE: 'both' })).toThrow(
      /^Invalid core configuration: LEDGER_TRANSACTION_MODE: /
    );
  });

  it('rejects a bulk fraction of zero', () => {
    expect(() => parseCoreEnv({ BULK_PARTIAL_PAYMENT_FRACTION: '0' })).toThrow(
      /BULK_PARTIAL_PAYMENT_FRACTION/
    );
  });

  it('builds service options from the environment', () => {
    const env = parseCoreEnv({ LEDGER_TRANSACTION_MODE: 'retrying', LEDGER_TRANSIENT_RETRY_COUNT: '2' });

    expect(transactionOptionsFromEnv(env).policy).toEqual({ mode: 'retrying', retryCount: 2 });
    expect(validationOptionsFromEnv(env)).toEqual({
      debounceMs: 750,
      settleTimeoutMs: 5000,
      lookupTimeoutMs: 5000,
      databaseChecks: true,
    });
  });
});
