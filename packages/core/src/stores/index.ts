export type {
  CustomerStore,
  TruckStore,
  InvoiceStore,
  PaymentStore,
  LedgerStores,
  TransactionScope,
  UnitOfWork,
  AuditEntry,
  ChangeRecord,
  NewCustomer,
  CustomerChanges,
  NewInvoice,
  NewPayment,
} from './types.js';
export { InMemoryLedgerDatabase } from './memory/memory-database.js';
export type { MemoryDatabaseOptions, CustomerSeed } from './memory/memory-database.js';
