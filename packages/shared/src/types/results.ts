/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * RESULT TYPES
 * What each ledger operation hands back to presentation code
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { Decimal } from 'decimal.js';
import type { Customer, Invoice, Payment } from './ledger.js';

// ═══════════════════════════════════════════════════════════════════════════════
// PAGING & FILTERS
// ═══════════════════════════════════════════════════════════════════════════════

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}

export interface CustomerFilter {
  /** Case-insensitive match on name or phone */
  term?: string;
  /** Only customers whose totalDebt is above zero */
  withDebtOnly?: boolean;
  sortBy?: 'name' | 'debtDesc';
}

export interface DateRange {
  from: Date;
  to: Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSACTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface TransactionResult {
  success: boolean;
  invoice?: Invoice;
  payment?: Payment;
  amountDue: Decimal;
  paymentReceived: Decimal;
  remainingBalance: Decimal;
  isOverpayment: boolean;
  overpaymentAmount: Decimal;
  message: string;
  /** Field- or item-scoped validation messages */
  errors?: string[];
  error?: string;
  errorId?: string;
}

export interface PaymentResult {
  success: boolean;
  payment?: Payment;
  previousBalance?: Decimal;
  newBalance?: Decimal;
  message: string;
  error?: string;
  errorId?: string;
}

export interface BulkResult {
  success: boolean;
  processedCount: number;
  skippedCount: number;
  totalAmount: Decimal;
  failedCustomers: string[];
  message: string;
  errorId?: string;
}

export interface TransactionSummary {
  customerId: string;
  customerName: string;
  currentBalance: Decimal;
  totalSales: Decimal;
  totalPayments: Decimal;
  lastPaymentAmount: Decimal | null;
  lastPaymentDate: Date | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPORTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface PaymentsSummary {
  totalAmount: Decimal;
  count: number;
}

export interface BalanceDiscrepancy {
  customer: Customer;
  storedBalance: Decimal;
  calculatedBalance: Decimal;
  difference: Decimal;
}
