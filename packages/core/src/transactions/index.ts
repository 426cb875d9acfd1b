export { TransactionService, transactionOptionsFromEnv } from './transaction.service.js';
export type {
  TransactionServiceOptions,
  CustomerRef,
  InvoiceForEdit,
} from './transaction.service.js';
export { TransactionRunner } from './transaction-runner.js';
export type { TransactionPolicy } from './transaction-runner.js';
