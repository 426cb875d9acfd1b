export { DebtLedger } from './debt-ledger.js';
export { BalanceReconciliationService } from './reconciliation.service.js';
export type { LedgerReason, BalanceChange, RecalculationResult } from './types.js';
