/**
 * Invoice Calculator
 * Pure numeric transforms between line items, invoice fields and balances
 */
import type {
  DecimalInput,
  Invoice,
  InvoiceAggregate,
  InvoiceBalances,
  LineItemInput,
} from '@weighbill/shared';
import type { Decimal } from 'decimal.js';
import {
  add,
  div,
  eq,
  gt,
  gte,
  lt,
  max,
  mul,
  parseDecimal,
  round2,
  sub,
  zero,
} from '../money/decimal.js';

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD FORMULAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Never negative; a cage weight above gross is rejected by validation */
export function netWeight(grossWeight: DecimalInput, cagesWeight: DecimalInput): Decimal {
  return max(0, sub(grossWeight, cagesWeight));
}

export function totalAmount(net: DecimalInput, unitPrice: DecimalInput): Decimal {
  return mul(net, unitPrice);
}

/** Discount amount for a percentage of an amount */
export function applyDiscount(amount: DecimalInput, discountPercentage: DecimalInput): Decimal {
  return div(mul(amount, discountPercentage), 100);
}

export function finalAmount(total: DecimalInput, discountPercentage: DecimalInput): Decimal {
  return max(0, sub(total, applyDiscount(total, discountPercentage)));
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

interface ParsedLineItem {
  grossWeight: Decimal;
  cagesCount: number;
  cageWeight: Decimal;
  unitPrice: Decimal;
  discountPercentage: Decimal;
}

const NUMERIC_FIELDS = [
  ['grossWeight', 'gross weight'],
  ['cageWeight', 'cage weight'],
  ['unitPrice', 'unit price'],
  ['discountPercentage', 'discount'],
] as const;

/** Parse one item, or report each field that is not a number */
function parseLineItem(item: LineItemInput, label: string): ParsedLineItem | string[] {
  const errors: string[] = [];
  const values = NUMERIC_FIELDS.map(([field, name]) => {
    const value = parseDecimal(item[field]);
    if (!value) {
      errors.push(`${label}: ${name} must be a number`);
    }
    return value;
  });
  if (!Number.isInteger(item.cagesCount) || item.cagesCount < 0) {
    errors.push(`${label}: cages count must be a whole number`);
  }

  const [grossWeight, cageWeight, unitPrice, discountPercentage] = values;
  if (errors.length > 0 || !grossWeight || !cageWeight || !unitPrice || !discountPercentage) {
    return errors;
  }
  return { grossWeight, cagesCount: item.cagesCount, cageWeight, unitPrice, discountPercentage };
}

/** A row that carries a sale: weight, cages and a price */
function isComplete(item: ParsedLineItem): boolean {
  return gt(item.grossWeight, 0) && item.cagesCount > 0 && gt(item.unitPrice, 0);
}

/**
 * Returns one message per broken rule, prefixed with the 1-based item
 * position. An empty array means the items can be invoiced.
 *
 * Blank or unfinished rows are allowed next to a complete one; they
 * aggregate to zero.
 */
export function validateLineItems(items: readonly LineItemInput[]): string[] {
  if (items.length === 0) {
    return ['At least one line item is required'];
  }

  const errors: string[] = [];
  let hasCompleteItem = false;

  items.forEach((item, index) => {
    const label = `Item ${index + 1}`;
    const parsed = parseLineItem(item, label);
    if (Array.isArray(parsed)) {
      errors.push(...parsed);
      return;
    }

    if (isComplete(parsed)) {
      hasCompleteItem = true;
    }
    if (lt(parsed.discountPercentage, 0) || gt(parsed.discountPercentage, 100)) {
      errors.push(`${label}: discount must be between 0 and 100`);
    }
    const cagesWeight = mul(parsed.cagesCount, parsed.cageWeight);
    if (gt(parsed.grossWeight, 0) && gte(cagesWeight, parsed.grossWeight)) {
      errors.push(`${label}: cages weight cannot be greater than or equal to gross weight`);
    }
  });

  if (!hasCompleteItem && errors.length === 0) {
    errors.push('At least one line item needs a gross weight, cages and a unit price');
  }

  return errors;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED FIELDS
// ═══════════════════════════════════════════════════════════════════════════════

/** Round the aggregate to the 2 places it is stored with */
export function buildInvoiceFields(aggregate: InvoiceAggregate): InvoiceAggregate {
  return {
    grossWeight: round2(aggregate.grossWeight),
    cagesWeight: round2(aggregate.cagesWeight),
    cagesCount: aggregate.cagesCount,
    netWeight: round2(aggregate.netWeight),
    unitPrice: round2(aggregate.unitPrice),
    discountPercentage: round2(aggregate.discountPercentage),
    totalAmount: round2(aggregate.totalAmount),
    discountAmount: round2(aggregate.discountAmount),
    finalAmount: round2(aggregate.finalAmount),
  };
}

/**
 * previousBalance is the customer's debt read once at the start of the
 * operation, before the invoice's own effect.
 */
export function snapshotBalances(
  previousBalance: DecimalInput,
  invoiceFinalAmount: DecimalInput
): InvoiceBalances {
  return {
    previousBalance: round2(previousBalance),
    currentBalance: round2(add(previousBalance, invoiceFinalAmount)),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// EDIT RECONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

type StoredInvoiceFields = Pick<
  Invoice,
  | 'grossWeight'
  | 'cagesWeight'
  | 'cagesCount'
  | 'netWeight'
  | 'unitPrice'
  | 'discountPercentage'
  | 'totalAmount'
  | 'finalAmount'
>;

/**
 * Rebuild a stored invoice as one representative line item for editing.
 * Per-item prices and discounts are not recoverable; the item reproduces
 * the invoice's totals, not its original lines.
 *
 * Price and discount come from the stored amounts rather than the rounded
 * averages, so re-aggregating gives back the same finalAmount.
 */
export function reconstructLineItem(invoice: StoredInvoiceFields): LineItemInput {
  const unitPrice = gt(invoice.netWeight, 0)
    ? div(invoice.totalAmount, invoice.netWeight)
    : invoice.unitPrice;
  const discountPercentage = gt(invoice.totalAmount, 0)
    ? mul(div(sub(invoice.totalAmount, invoice.finalAmount), invoice.totalAmount), 100)
    : invoice.discountPercentage;

  return {
    grossWeight: invoice.grossWeight,
    cagesCount: invoice.cagesCount,
    cageWeight: invoice.cagesCount > 0 ? div(invoice.cagesWeight, invoice.cagesCount) : zero(),
    unitPrice,
    discountPercentage,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SETTLEMENT
// ═══════════════════════════════════════════════════════════════════════════════

export interface SettlementSummary {
  remainingBalance: Decimal;
  isOverpayment: boolean;
  overpaymentAmount: Decimal;
  isFullyPaid: boolean;
}

export function settlementSummary(
  invoiceFinalAmount: DecimalInput,
  paymentAmount: DecimalInput
): SettlementSummary {
  const remainingBalance = max(0, sub(invoiceFinalAmount, paymentAmount));
  const isOverpayment = gt(paymentAmount, invoiceFinalAmount);
  return {
    remainingBalance,
    isOverpayment,
    overpaymentAmount: max(0, sub(paymentAmount, invoiceFinalAmount)),
    isFullyPaid: eq(remainingBalance, 0),
  };
}
