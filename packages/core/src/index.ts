/**
 * @weighbill/core
 * Invoice calculation, debt ledger, transaction orchestration, customer validation
 */

// Config
export { getCoreEnv, parseCoreEnv, resetCoreEnvCache, parseBooleanEnv, TRANSACTION_MODES } from './config/env.js';
export type { CoreEnv, TransactionMode } from './config/env.js';

// Observability
export { logger, createChildLogger, operationLogger } from './observability/logger.js';
export type { Logger, LogContext } from './observability/logger.js';
export { runWithOperation, getOperation } from './observability/operation-context.js';
export type { OperationContext } from './observability/operation-context.js';

// Money
export * from './money/decimal.js';

// Errors
export * from './errors/index.js';

// Invoicing
export * from './invoicing/index.js';

// Debt Ledger
export * from './ledger/index.js';

// Stores
export * from './stores/index.js';

// Transactions
export * from './transactions/index.js';

// Customers
export * from './customers/index.js';

// Utils
export { withTimeout } from './utils/timeout.js';
