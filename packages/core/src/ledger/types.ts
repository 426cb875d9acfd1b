/**
 * Debt Ledger Types
 */
import type { Decimal } from 'decimal.js';

/** Why a customer's balance moved */
export type LedgerReason =
  | 'INVOICE_DEBIT'
  | 'INVOICE_REVERSAL'
  | 'PAYMENT_CREDIT'
  | 'BALANCE_CORRECTION';

export interface BalanceChange {
  customerId: string;
  reason: LedgerReason;
  delta: Decimal;
  previousBalance: Decimal;
  newBalance: Decimal;
}

export interface RecalculationResult {
  customerId: string;
  storedBalance: Decimal;
  calculatedBalance: Decimal;
  corrected: boolean;
}
