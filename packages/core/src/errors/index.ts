export {
  LedgerError,
  LedgerValidationError,
  PreconditionError,
  NotFoundError,
  ConcurrencyError,
  TransientStoreError,
  StoreUnavailableError,
  OperationTimeoutError,
} from './errors.js';
export type { LedgerErrorCode } from './errors.js';
export { ErrorHandlingService, USER_MESSAGES, isRetryableError } from './error-handling.service.js';
export type { ErrorReport } from './error-handling.service.js';
