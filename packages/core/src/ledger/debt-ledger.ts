/**
 * Debt Ledger
 * The only code that moves a customer's totalDebt. Every call runs on the
 * caller's transaction scope so a balance change commits with its cause.
 * Positive = customer owes money, negative = credit balance.
 */
import type { Customer, DecimalInput, Invoice, InvoiceBalances, Payment } from '@weighbill/shared';
import type { Decimal } from 'decimal.js';
import { NotFoundError, PreconditionError } from '../errors/errors.js';
import { snapshotBalances } from '../invoicing/calculator.js';
import { round2 } from '../money/decimal.js';
import { operationLogger } from '../observability/logger.js';
import type { LedgerStores } from '../stores/types.js';
import type { BalanceChange, LedgerReason } from './types.js';

type CustomerScope = Pick<LedgerStores, 'customers'>;

export class DebtLedger {
  // ═══════════════════════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════════════════════

  /** Active customer or a precondition failure */
  async requireCustomer(scope: CustomerScope, customerId: string): Promise<Customer> {
    const customer = await scope.customers.getById(customerId);
    if (!customer) {
      throw new NotFoundError('customer', customerId);
    }
    if (!customer.isActive) {
      throw new PreconditionError(`Customer ${customer.name} is inactive`, 'CUSTOMER_INACTIVE');
    }
    return customer;
  }

  /** Debt of an active customer, as of the scope's snapshot */
  async readBalance(scope: CustomerScope, customerId: string): Promise<Decimal> {
    const customer = await this.requireCustomer(scope, customerId);
    return customer.totalDebt;
  }

  /** previous/current balance pair an invoice is stamped with */
  snapshotForInvoice(priorDebt: DecimalInput, invoiceFinalAmount: DecimalInput): InvoiceBalances {
    return snapshotBalances(priorDebt, invoiceFinalAmount);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // MUTATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async applyDelta(
    scope: CustomerScope,
    customerId: string,
    delta: DecimalInput,
    reason: LedgerReason
  ): Promise<BalanceChange> {
    const rounded = round2(delta);
    const updated = await scope.customers.updateBalance(customerId, rounded);
    const previousBalance = updated.totalDebt.sub(rounded);

    operationLogger({ customerId }).debug(
      {
        reason,
        delta: rounded.toFixed(2),
        previousBalance: previousBalance.toFixed(2),
        newBalance: updated.totalDebt.toFixed(2),
      },
      'Customer balance updated'
    );

    return {
      customerId,
      reason,
      delta: rounded,
      previousBalance,
      newBalance: updated.totalDebt,
    };
  }

  recordInvoiceDebit(scope: CustomerScope, invoice: Invoice): Promise<BalanceChange> {
    return this.applyDelta(scope, invoice.customerId, invoice.finalAmount, 'INVOICE_DEBIT');
  }

  /** Removes an invoice's earlier effect before it is re-applied on edit */
  reverseInvoiceDebit(scope: CustomerScope, invoice: Invoice): Promise<BalanceChange> {
    return this.applyDelta(scope, invoice.customerId, invoice.finalAmount.neg(), 'INVOICE_REVERSAL');
  }

  recordPaymentCredit(scope: CustomerScope, payment: Payment): Promise<BalanceChange> {
    return this.applyDelta(scope, payment.customerId, payment.amount.neg(), 'PAYMENT_CREDIT');
  }
}
