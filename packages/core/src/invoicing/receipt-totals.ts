/**
 * Receipt totals shown on the confirmation screen and printed receipt
 */
import type { InvoiceAggregate, InvoiceBalances } from '@weighbill/shared';
import type { Decimal } from 'decimal.js';
import { LEDGER_RULES } from '@weighbill/shared';
import { approxEq, gte, lte, sub } from '../money/decimal.js';

export interface ReceiptTotals {
  totalGrossWeight: Decimal;
  totalCagesCount: number;
  totalCagesWeight: Decimal;
  totalNetWeight: Decimal;
  totalAmountBeforeDiscount: Decimal;
  totalDiscountAmount: Decimal;
  finalTotalAmount: Decimal;
  weightedAverageUnitPrice: Decimal;
  averageDiscountPercentage: Decimal;
  previousBalance: Decimal;
  currentBalance: Decimal;
}

export function buildReceiptTotals(
  aggregate: InvoiceAggregate,
  balances: InvoiceBalances
): ReceiptTotals {
  return {
    totalGrossWeight: aggregate.grossWeight,
    totalCagesCount: aggregate.cagesCount,
    totalCagesWeight: aggregate.cagesWeight,
    totalNetWeight: aggregate.netWeight,
    totalAmountBeforeDiscount: aggregate.totalAmount,
    totalDiscountAmount: aggregate.discountAmount,
    finalTotalAmount: aggregate.finalAmount,
    weightedAverageUnitPrice: aggregate.unitPrice,
    averageDiscountPercentage: aggregate.discountPercentage,
    previousBalance: balances.previousBalance,
    currentBalance: balances.currentBalance,
  };
}

/** Totals add up: total - discount = final, nothing negative */
export function isReceiptConsistent(totals: ReceiptTotals): boolean {
  return (
    gte(totals.totalNetWeight, 0) &&
    gte(totals.finalTotalAmount, 0) &&
    lte(totals.totalDiscountAmount, totals.totalAmountBeforeDiscount) &&
    approxEq(
      sub(totals.totalAmountBeforeDiscount, totals.totalDiscountAmount),
      totals.finalTotalAmount,
      LEDGER_RULES.BALANCE_TOLERANCE
    )
  );
}
