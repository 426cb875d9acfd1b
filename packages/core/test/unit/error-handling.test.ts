import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  ErrorHandlingService,
  USER_MESSAGES,
} from '../../src/errors/error-handling.service.js';
import {
  ConcurrencyError,
  LedgerValidationError,
  NotFoundError,
  OperationTimeoutError,
  PreconditionError,
  StoreUnavailableError,
  TransientStoreError,
} from '../../src/errors/errors.js';
import { createChildLogger } from '../../src/observability/logger.js';
import { withTimeout } from '../../src/utils/timeout.js';

describe('ErrorHandlingService', () => {
  const service = new ErrorHandlingService(createChildLogger({ module: 'test' }));

  it('maps ledger errors to catalog messages', () => {
    expect(service.getUserMessage(new NotFoundError('truck', 'truck-9'))).toBe(
      'The selected truck no longer exists.'
    );
    expect(service.getUserMessage(new StoreUnavailableError('ECONNREFUSED'))).toBe(
      USER_MESSAGES.STORE_UNAVAILABLE
    );
  });

  it('shows correctable input messages as they are', () => {
    expect(service.getUserMessage(new LedgerValidationError(['first', 'second']))).toBe(
      'first; second'
    );
    expect(service.getUserMessage(new PreconditionError('Please select a truck'))).toBe(
      'Please select a truck'
    );
  });

  it('hides unexpected failures behind a generic message', () => {
    const parsed = z.object({ amount: z.number() }).safeParse({ amount: 'ten' });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(service.getUserMessage(parsed.error)).toBe(USER_MESSAGES.VALIDATION_FAILED);
    }
    expect(service.getUserMessage(new TypeError('x is undefined'))).toBe(USER_MESSAGES.UNEXPECTED);
  });

  it('treats only transient failures as retryable', () => {
    expect(service.isRetryable(new TransientStoreError('deadlock'))).toBe(true);
    expect(service.isRetryable(new ConcurrencyError('row changed'))).toBe(true);
    expect(service.isRetryable(new OperationTimeoutError('save', 100))).toBe(true);
    expect(service.isRetryable(new StoreUnavailableError('down'))).toBe(false);
    expect(service.isRetryable(new Error('boom'))).toBe(false);
  });

  it('logs under an error id and returns it with the message', () => {
    const log = createChildLogger({ module: 'test' });
    const errorSpy = vi.spyOn(log, 'error');
    const warnSpy = vi.spyOn(log, 'warn');
    const handler = new ErrorHandlingService(log);

    const report = handler.handle(new Error('disk full'), 'createInvoiceWithPayment');
    handler.handle(new PreconditionError('Please select a customer'), 'createInvoiceWithPayment');

    expect(report.success).toBe(false);
    expect(report.userMessage).toBe(USER_MESSAGES.UNEXPECTED);
    expect(report.errorId).toMatch(/^[0-9a-f-]{8}$/);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('rejects with the operation name once the time is up', async () => {
    vi.useFakeTimers();
    try {
      const pending = withTimeout(new Promise<never>(() => undefined), 100, 'Customer lookup');
      const assertion = expect(pending).rejects.toThrow('Customer lookup timed out after 100ms');
      await vi.advanceTimersByTimeAsync(100);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('passes through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'Customer lookup')).resolves.toBe(42);
  });
});
