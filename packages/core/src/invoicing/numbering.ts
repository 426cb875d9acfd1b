/**
 * Invoice numbering
 * Drafts carry a placeholder; the real yyyyMMdd#### number is assigned at commit.
 */
import { randomUUID } from 'crypto';
import type { InvoiceDraft } from '@weighbill/shared';
import { LEDGER_RULES } from '@weighbill/shared';

export function formatDatePrefix(date: Date): string {
  const year = date.getFullYear().toString();
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Next number for the day of `date`, given the highest number already
 * issued that day (null when none was).
 */
export function nextInvoiceNumber(date: Date, lastNumberForDay: string | null): string {
  const prefix = formatDatePrefix(date);
  let sequence = 1;

  if (lastNumberForDay && lastNumberForDay.startsWith(prefix)) {
    const previous = Number.parseInt(lastNumberForDay.slice(prefix.length), 10);
    if (Number.isFinite(previous)) {
      sequence = previous + 1;
    }
  }

  return `${prefix}${sequence.toString().padStart(LEDGER_RULES.INVOICE_SEQUENCE_DIGITS, '0')}`;
}

export function isDraftNumber(invoiceNumber: string): boolean {
  return invoiceNumber.startsWith(LEDGER_RULES.DRAFT_NUMBER_PREFIX);
}

export function createInvoiceDraft(
  input: Partial<Omit<InvoiceDraft, 'invoiceNumber'>> = {}
): InvoiceDraft {
  return {
    invoiceNumber: `${LEDGER_RULES.DRAFT_NUMBER_PREFIX}${randomUUID().slice(0, 8)}`,
    invoiceDate: input.invoiceDate ?? new Date(),
    customerId: input.customerId ?? null,
    truckId: input.truckId ?? null,
  };
}
