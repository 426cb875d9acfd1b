/**
 * Error Handling Service
 * Translates failures into user-facing messages and logs the internals
 */
import { randomUUID } from 'crypto';
import { ZodError } from 'zod';
import { operationLogger, type Logger } from '../observability/logger.js';
import {
  LedgerError,
  LedgerValidationError,
  PreconditionError,
  type LedgerErrorCode,
} from './errors.js';

export const USER_MESSAGES: Record<LedgerErrorCode | 'UNEXPECTED', string> = {
  VALIDATION_FAILED: 'Some of the entered data is invalid. Please review it and try again.',
  PRECONDITION_FAILED: 'The operation cannot be completed right now.',
  CUSTOMER_NOT_FOUND: 'The selected customer no longer exists.',
  TRUCK_NOT_FOUND: 'The selected truck no longer exists.',
  INVOICE_NOT_FOUND: 'The invoice could not be found.',
  CUSTOMER_INACTIVE: 'The selected customer is no longer active.',
  TRUCK_INACTIVE: 'The selected truck is no longer active.',
  NO_DEBT: 'The customer has no outstanding debt.',
  DUPLICATE_NAME: 'A customer with this name already exists.',
  DUPLICATE_PHONE: 'This phone number is already registered.',
  INVALID_AMOUNT: 'The amount entered is not valid.',
  CONCURRENCY_CONFLICT: 'The data was changed by someone else. Reload and try again.',
  TRANSACTION_ACTIVE: 'Another operation is still in progress.',
  STORE_TRANSIENT: 'The database is busy. Please try again in a moment.',
  STORE_UNAVAILABLE: 'Cannot reach the database. Check the connection and try again.',
  OPERATION_TIMEOUT: 'The operation took too long. Please try again.',
  UNEXPECTED: 'An unexpected error occurred. Please try again.',
};

const RETRYABLE_CODES: ReadonlySet<LedgerErrorCode> = new Set<LedgerErrorCode>([
  'STORE_TRANSIENT',
  'CONCURRENCY_CONFLICT',
  'OPERATION_TIMEOUT',
]);

export interface ErrorReport {
  success: false;
  userMessage: string;
  errorId: string;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof LedgerError && RETRYABLE_CODES.has(error.code);
}

export class ErrorHandlingService {
  constructor(private log?: Logger) {}

  /**
   * Log the failure under a short id and return what the user should see
   */
  handle(error: unknown, context: string): ErrorReport {
    const errorId = randomUUID().slice(0, 8);
    const userMessage = this.getUserMessage(error);
    const level = error instanceof LedgerValidationError || error instanceof PreconditionError
      ? 'warn'
      : 'error';

    const log = this.log ?? operationLogger();
    log[level](
      {
        errorId,
        context,
        code: error instanceof LedgerError ? error.code : undefined,
        err: error,
      },
      `${context} failed`
    );

    return { success: false, userMessage, errorId };
  }

  getUserMessage(error: unknown): string {
    // Messages we compose for correctable input are safe to show as-is
    if (error instanceof LedgerValidationError || error instanceof PreconditionError) {
      return error.message;
    }
    if (error instanceof LedgerError) {
      return USER_MESSAGES[error.code];
    }
    if (error instanceof ZodError) {
      return USER_MESSAGES.VALIDATION_FAILED;
    }
    return USER_MESSAGES.UNEXPECTED;
  }

  isRetryable(error: unknown): boolean {
    return isRetryableError(error);
  }
}
