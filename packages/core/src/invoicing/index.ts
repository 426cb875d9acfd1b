export { computeLineItem, aggregateLineItems } from './line-items.js';
export {
  netWeight,
  totalAmount,
  applyDiscount,
  finalAmount,
  validateLineItems,
  buildInvoiceFields,
  snapshotBalances,
  reconstructLineItem,
  settlementSummary,
} from './calculator.js';
export type { SettlementSummary } from './calculator.js';
export { buildReceiptTotals, isReceiptConsistent } from './receipt-totals.js';
export type { ReceiptTotals } from './receipt-totals.js';
export {
  formatDatePrefix,
  nextInvoiceNumber,
  isDraftNumber,
  createInvoiceDraft,
} from './numbering.js';
