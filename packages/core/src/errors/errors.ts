/**
 * Ledger error taxonomy
 */

export type LedgerErrorCode =
  | 'VALIDATION_FAILED'
  | 'PRECONDITION_FAILED'
  | 'CUSTOMER_NOT_FOUND'
  | 'TRUCK_NOT_FOUND'
  | 'INVOICE_NOT_FOUND'
  | 'CUSTOMER_INACTIVE'
  | 'TRUCK_INACTIVE'
  | 'NO_DEBT'
  | 'DUPLICATE_NAME'
  | 'DUPLICATE_PHONE'
  | 'INVALID_AMOUNT'
  | 'CONCURRENCY_CONFLICT'
  | 'TRANSACTION_ACTIVE'
  | 'STORE_TRANSIENT'
  | 'STORE_UNAVAILABLE'
  | 'OPERATION_TIMEOUT';

export class LedgerError extends Error {
  constructor(
    message: string,
    public code: LedgerErrorCode
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

/** User-correctable input problems */
export class LedgerValidationError extends LedgerError {
  constructor(public messages: string[]) {
    super(messages.join('; '), 'VALIDATION_FAILED');
    this.name = 'LedgerValidationError';
  }
}

/** Missing selection, zero debt, duplicate record; nothing was written */
export class PreconditionError extends LedgerError {
  constructor(message: string, code: LedgerErrorCode = 'PRECONDITION_FAILED') {
    super(message, code);
    this.name = 'PreconditionError';
  }
}

export class NotFoundError extends LedgerError {
  constructor(
    public entity: 'customer' | 'truck' | 'invoice',
    public entityId: string
  ) {
    super(
      `${entity} ${entityId} not found`,
      entity === 'customer'
        ? 'CUSTOMER_NOT_FOUND'
        : entity === 'truck'
          ? 'TRUCK_NOT_FOUND'
          : 'INVOICE_NOT_FOUND'
    );
    this.name = 'NotFoundError';
  }
}

/** A record changed underneath the operation */
export class ConcurrencyError extends LedgerError {
  constructor(message: string) {
    super(message, 'CONCURRENCY_CONFLICT');
    this.name = 'ConcurrencyError';
  }
}

/** Deadlock, lock timeout and similar failures that succeed on retry */
export class TransientStoreError extends LedgerError {
  constructor(message: string) {
    super(message, 'STORE_TRANSIENT');
    this.name = 'TransientStoreError';
  }
}

export class StoreUnavailableError extends LedgerError {
  constructor(message: string) {
    super(message, 'STORE_UNAVAILABLE');
    this.name = 'StoreUnavailableError';
  }
}

export class OperationTimeoutError extends LedgerError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'OPERATION_TIMEOUT');
    this.name = 'OperationTimeoutError';
  }
}
