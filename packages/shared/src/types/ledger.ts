/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * LEDGER TYPES
 * Customers, invoices, line items and payments as the core sees them
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { Decimal } from 'decimal.js';
import type { PaymentMethod } from '../constants/ledger.js';

/** Anything decimal.js accepts: number, numeric string or Decimal */
export type DecimalInput = Decimal.Value;

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOMERS & TRUCKS
// ═══════════════════════════════════════════════════════════════════════════════

export interface Customer {
  id: string;
  name: string;
  phone: string | null;
  address: string | null;
  /** Positive = customer owes money, negative = credit balance */
  totalDebt: Decimal;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Truck {
  id: string;
  truckNumber: string;
  driverName: string;
  isActive: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LINE ITEMS
// ═══════════════════════════════════════════════════════════════════════════════

/** One weighed batch as entered at the scale */
export interface LineItemInput {
  grossWeight: DecimalInput;
  cagesCount: number;
  cageWeight: DecimalInput;
  unitPrice: DecimalInput;
  discountPercentage: DecimalInput;
}

export interface ComputedLineItem {
  grossWeight: Decimal;
  cagesCount: number;
  cageWeight: Decimal;
  unitPrice: Decimal;
  discountPercentage: Decimal;
  cagesWeight: Decimal;
  netWeight: Decimal;
  totalAmount: Decimal;
  discountAmount: Decimal;
  finalAmount: Decimal;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INVOICES
// ═══════════════════════════════════════════════════════════════════════════════

/** Invoice-level totals reduced from all line items */
export interface InvoiceAggregate {
  grossWeight: Decimal;
  cagesWeight: Decimal;
  cagesCount: number;
  netWeight: Decimal;
  unitPrice: Decimal;
  discountPercentage: Decimal;
  totalAmount: Decimal;
  discountAmount: Decimal;
  finalAmount: Decimal;
}

export interface InvoiceBalances {
  previousBalance: Decimal;
  currentBalance: Decimal;
}

export interface Invoice extends Omit<InvoiceAggregate, 'discountAmount'>, InvoiceBalances {
  id: string;
  invoiceNumber: string;
  invoiceDate: Date;
  customerId: string;
  truckId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface InvoiceWithDetails extends Invoice {
  customer: Customer;
  truck: Truck;
  payments: Payment[];
}

/** In-memory invoice before commit; carries a placeholder number */
export interface InvoiceDraft {
  invoiceNumber: string;
  invoiceDate: Date;
  customerId: string | null;
  truckId: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAYMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface Payment {
  id: string;
  customerId: string;
  /** Null for on-account payments */
  invoiceId: string | null;
  amount: Decimal;
  paymentMethod: PaymentMethod;
  paymentDate: Date;
  notes: string | null;
  createdAt: Date;
}
