/**
 * Transaction Service
 * Runs invoice, payment and bulk settlement flows as units of work: the
 * invoice or payment write and its balance change commit together or not
 * at all. Bulk flows isolate each customer and commit the survivors.
 */
import type {
  ActorTag,
  BulkResult,
  Customer,
  DateRange,
  DecimalInput,
  Invoice,
  InvoiceDraft,
  InvoiceWithDetails,
  LineItemInput,
  Payment,
  PaymentInput,
  PaymentMethod,
  PaymentResult,
  PaymentsSummary,
  QuickPaymentRequest,
  TransactionResult,
  TransactionSummary,
} from '@weighbill/shared';
import {
  ACTOR_TAGS,
  LEDGER_RULES,
  PAYMENT_NOTES,
  PaymentInputSchema,
  QuickPaymentRequestSchema,
} from '@weighbill/shared';
import type { Decimal } from 'decimal.js';
import { getCoreEnv, type CoreEnv } from '../config/env.js';
import { ErrorHandlingService } from '../errors/error-handling.service.js';
import {
  LedgerValidationError,
  NotFoundError,
  PreconditionError,
} from '../errors/errors.js';
import {
  buildInvoiceFields,
  reconstructLineItem,
  settlementSummary,
  validateLineItems,
} from '../invoicing/calculator.js';
import { aggregateLineItems } from '../invoicing/line-items.js';
import { buildReceiptTotals, isReceiptConsistent } from '../invoicing/receipt-totals.js';
import { DebtLedger } from '../ledger/debt-ledger.js';
import {
  add,
  dec,
  div,
  gt,
  lt,
  max,
  min,
  mul,
  parseDecimal,
  round2,
  sum,
  toString2,
  zero,
} from '../money/decimal.js';
import { operationLogger } from '../observability/logger.js';
import { runWithOperation } from '../observability/operation-context.js';
import type { LedgerStores, NewInvoice, TransactionScope, UnitOfWork } from '../stores/types.js';
import { TransactionRunner, type TransactionPolicy } from './transaction-runner.js';

export interface TransactionServiceOptions {
  policy: TransactionPolicy;
  /** Quick payments are clamped to debt × this */
  quickPaymentMaxDebtMultiplier: number;
  /** Default share of each debt paid by a bulk partial payment */
  bulkPartialFraction: number;
  now: () => Date;
}

export type CustomerRef = Pick<Customer, 'id' | 'name'>;

export interface InvoiceForEdit {
  invoice: InvoiceWithDetails;
  lineItems: LineItemInput[];
}

type PricedInvoice = Omit<NewInvoice, 'invoiceNumber' | 'invoiceDate' | 'customerId' | 'truckId'>;

interface BulkOutcome {
  processedCount: number;
  skippedCount: number;
  totalAmount: Decimal;
  failedCustomers: string[];
}

const MESSAGES = {
  SELECT_CUSTOMER: 'Please select a customer',
  SELECT_TRUCK: 'Please select a truck',
  NEGATIVE_PAYMENT: 'Payment amount cannot be negative',
  UNREADABLE_PAYMENT: 'Payment amount must be a number',
  INVALID_ITEMS: 'Please correct the invoice line items',
  INCONSISTENT_TOTALS: 'Invoice totals do not add up',
  INVALID_PAYMENT: 'Payment details are invalid',
  NON_POSITIVE_PAYMENT: 'Payment amount must be greater than zero',
  INVALID_FRACTION: 'Payment fraction must be greater than 0 and at most 1',
  NOTHING_TO_SETTLE: 'No customers with outstanding debt to process',
} as const;

export function transactionOptionsFromEnv(env: CoreEnv = getCoreEnv()): TransactionServiceOptions {
  return {
    policy: {
      mode: env.LEDGER_TRANSACTION_MODE,
      retryCount: env.LEDGER_TRANSIENT_RETRY_COUNT,
    },
    quickPaymentMaxDebtMultiplier: env.QUICK_PAYMENT_MAX_DEBT_MULTIPLIER,
    bulkPartialFraction: env.BULK_PARTIAL_PAYMENT_FRACTION,
    now: () => new Date(),
  };
}

export class TransactionService {
  private options: TransactionServiceOptions;
  private runner: TransactionRunner;

  constructor(
    private unitOfWork: UnitOfWork,
    options: Partial<TransactionServiceOptions> = {},
    private ledger: DebtLedger = new DebtLedger(),
    private errors: ErrorHandlingService = new ErrorHandlingService()
  ) {
    this.options = { ...transactionOptionsFromEnv(), ...options };
    this.runner = new TransactionRunner(unitOfWork, this.options.policy);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INVOICES
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Commit a drafted invoice and, when paymentAmount > 0, a payment linked
   * to it. The applied payment is capped at what the customer owes after
   * the invoice; remainingBalance is measured against the invoice alone.
   */
  createInvoiceWithPayment(
    draft: InvoiceDraft,
    lineItems: readonly LineItemInput[],
    paymentAmount: DecimalInput = 0,
    paymentMethod: PaymentMethod = 'CASH',
    notes?: string
  ): Promise<TransactionResult> {
    return runWithOperation('createInvoiceWithPayment', ACTOR_TAGS.POS_USER, async () => {
      const received = parseDecimal(paymentAmount);
      if (!received) return this.rejected(MESSAGES.UNREADABLE_PAYMENT, zero());
      const { customerId, truckId } = draft;

      if (!customerId) return this.rejected(MESSAGES.SELECT_CUSTOMER, received);
      if (!truckId) return this.rejected(MESSAGES.SELECT_TRUCK, received);
      if (received.isNegative()) return this.rejected(MESSAGES.NEGATIVE_PAYMENT, received);

      const itemErrors = validateLineItems(lineItems);
      if (itemErrors.length > 0) {
        return this.rejected(MESSAGES.INVALID_ITEMS, received, itemErrors);
      }

      try {
        const { invoice, payment } = await this.runner.run(ACTOR_TAGS.POS_USER, async (scope) => {
          // Read once; the invoice's own effect must not leak into previousBalance
          const priorDebt = await this.ledger.readBalance(scope, customerId);
          await this.requireTruck(scope, truckId);
          const priced = this.priceInvoice(lineItems, priorDebt);

          const invoice = await scope.invoices.create({
            invoiceNumber: await scope.invoices.generateNextNumber(draft.invoiceDate),
            invoiceDate: draft.invoiceDate,
            customerId,
            truckId,
            ...priced,
          });
          await this.ledger.recordInvoiceDebit(scope, invoice);

          const payment = await this.applyInvoicePayment(
            scope,
            invoice,
            priorDebt,
            received,
            paymentMethod,
            notes
          );
          return { invoice, payment };
        });

        return this.completed(invoice, payment, received, 'saved');
      } catch (error) {
        return this.failed(error, 'createInvoiceWithPayment', received);
      }
    });
  }

  createInvoiceOnly(
    draft: InvoiceDraft,
    lineItems: readonly LineItemInput[]
  ): Promise<TransactionResult> {
    return this.createInvoiceWithPayment(draft, lineItems, 0);
  }

  /**
   * Re-price an existing invoice. Its previous finalAmount is reversed out
   * of the customer's balance before the new one is applied; number,
   * customer and truck are kept.
   */
  updateInvoice(
    invoiceId: string,
    lineItems: readonly LineItemInput[],
    paymentAmount: DecimalInput = 0,
    paymentMethod: PaymentMethod = 'CASH',
    notes?: string
  ): Promise<TransactionResult> {
    return runWithOperation('updateInvoice', ACTOR_TAGS.INVOICE_UPDATE, async () => {
      const received = parseDecimal(paymentAmount);
      if (!received) return this.rejected(MESSAGES.UNREADABLE_PAYMENT, zero());
      if (received.isNegative()) return this.rejected(MESSAGES.NEGATIVE_PAYMENT, received);

      const itemErrors = validateLineItems(lineItems);
      if (itemErrors.length > 0) {
        return this.rejected(MESSAGES.INVALID_ITEMS, received, itemErrors);
      }

      try {
        const { invoice, payment } = await this.runner.run(
          ACTOR_TAGS.INVOICE_UPDATE,
          async (scope) => {
            const existing = await scope.invoices.getById(invoiceId);
            if (!existing) {
              throw new NotFoundError('invoice', invoiceId);
            }

            const reversal = await this.ledger.reverseInvoiceDebit(scope, existing);
            const priorDebt = reversal.newBalance;

            const invoice = await scope.invoices.update({
              ...existing,
              ...this.priceInvoice(lineItems, priorDebt),
            });
            await this.ledger.recordInvoiceDebit(scope, invoice);

            const payment = await this.applyInvoicePayment(
              scope,
              invoice,
              priorDebt,
              received,
              paymentMethod,
              notes
            );
            return { invoice, payment };
          }
        );

        return this.completed(invoice, payment, received, 'updated');
      } catch (error) {
        return this.failed(error, 'updateInvoice', received);
      }
    });
  }

  /**
   * Stored invoice plus the single representative line item it is edited
   * through. The original lines are not kept, only their aggregate.
   */
  async loadInvoiceForEdit(invoiceId: string): Promise<InvoiceForEdit | null> {
    const invoice = await this.unitOfWork.stores.invoices.getWithDetails(invoiceId);
    if (!invoice) return null;
    return { invoice, lineItems: [reconstructLineItem(invoice)] };
  }

  searchInvoices(term: string, range?: DateRange): Promise<Invoice[]> {
    return this.unitOfWork.stores.invoices.search(term, range);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // PAYMENTS
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * On-account payment of the full debt, an explicit amount or a
   * percentage of the debt, clamped to [0, multiplier × debt].
   */
  quickPayment(
    customerId: string,
    request: QuickPaymentRequest,
    paymentMethod: PaymentMethod = 'CASH'
  ): Promise<PaymentResult> {
    return runWithOperation('quickPayment', ACTOR_TAGS.QUICK_PAYMENT, async () => {
      const parsed = QuickPaymentRequestSchema.safeParse(request);
      if (!parsed.success) {
        return this.paymentRejected(MESSAGES.INVALID_PAYMENT);
      }

      try {
        const { payment, change } = await this.runner.run(
          ACTOR_TAGS.QUICK_PAYMENT,
          async (scope) => {
            const customer = await this.ledger.requireCustomer(scope, customerId);
            if (!gt(customer.totalDebt, 0)) {
              throw new PreconditionError(`${customer.name} has no outstanding debt`, 'NO_DEBT');
            }

            const amount = this.quickPaymentAmount(customer.totalDebt, parsed.data);
            if (!gt(amount, 0)) {
              throw new PreconditionError(MESSAGES.NON_POSITIVE_PAYMENT, 'INVALID_AMOUNT');
            }

            const payment = await scope.payments.create({
              customerId,
              invoiceId: null,
              amount,
              paymentMethod,
              paymentDate: this.options.now(),
              notes: PAYMENT_NOTES.QUICK,
            });
            const change = await this.ledger.recordPaymentCredit(scope, payment);
            return { payment, change };
          }
        );

        operationLogger({ customerId }).info(
          { amount: payment.amount.toFixed(2), newBalance: change.newBalance.toFixed(2) },
          'Quick payment recorded'
        );

        return {
          success: true,
          payment,
          previousBalance: change.previousBalance,
          newBalance: change.newBalance,
          message: `Payment of ${toString2(payment.amount)} recorded; balance ${toString2(change.newBalance)}`,
        };
      } catch (error) {
        return this.paymentFailed(error, 'quickPayment');
      }
    });
  }

  /**
   * Payment entered on its own, optionally against one of the customer's
   * invoices. Paying past the debt leaves a credit balance.
   */
  recordPayment(input: PaymentInput): Promise<PaymentResult> {
    return runWithOperation('recordPayment', ACTOR_TAGS.PAYMENT_ONLY, async () => {
      const parsed = PaymentInputSchema.safeParse(input);
      if (!parsed.success) {
        return this.paymentRejected(MESSAGES.INVALID_PAYMENT);
      }

      const { customerId, invoiceId, paymentMethod, notes } = parsed.data;
      const amount = round2(parsed.data.amount);
      if (!gt(amount, 0)) {
        return this.paymentRejected(MESSAGES.NON_POSITIVE_PAYMENT);
      }

      try {
        const { payment, change } = await this.runner.run(
          ACTOR_TAGS.PAYMENT_ONLY,
          async (scope) => {
            const customer = await this.ledger.requireCustomer(scope, customerId);
            if (invoiceId) {
              const invoice = await scope.invoices.getById(invoiceId);
              if (!invoice || invoice.customerId !== customerId) {
                throw new NotFoundError('invoice', invoiceId);
              }
            }

            if (gt(amount, customer.totalDebt)) {
              operationLogger({ customerId }).warn(
                { amount: amount.toFixed(2), totalDebt: customer.totalDebt.toFixed(2) },
                'Payment exceeds outstanding debt'
              );
            }

            const payment = await scope.payments.create({
              customerId,
              invoiceId: invoiceId ?? null,
              amount,
              paymentMethod,
              paymentDate: this.options.now(),
              notes: notes || null,
            });
            const change = await this.ledger.recordPaymentCredit(scope, payment);
            return { payment, change };
          }
        );

        return {
          success: true,
          payment,
          previousBalance: change.previousBalance,
          newBalance: change.newBalance,
          message: `Payment of ${toString2(payment.amount)} recorded; balance ${toString2(change.newBalance)}`,
        };
      } catch (error) {
        return this.paymentFailed(error, 'recordPayment');
      }
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // BULK SETTLEMENT
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Pay off each customer's whole debt. Without a list, every active
   * customer with debt is settled.
   */
  bulkSettleDebt(customers?: readonly CustomerRef[]): Promise<BulkResult> {
    return this.runBulk(
      'bulkSettleDebt',
      ACTOR_TAGS.BULK_DEBT_SETTLEMENT,
      (scope) => (customers ? Promise.resolve(customers) : this.debtors(scope)),
      (debt) => debt,
      PAYMENT_NOTES.FULL_SETTLEMENT
    );
  }

  /**
   * Pay round(debt × fraction, 2) for each customer. Without a list, the
   * customers with the highest debt are taken.
   */
  bulkPartialPayment(
    customers?: readonly CustomerRef[],
    fraction: number = this.options.bulkPartialFraction
  ): Promise<BulkResult> {
    if (!(fraction > 0 && fraction <= 1)) {
      return Promise.resolve({
        ...this.emptyBulk(),
        success: false,
        message: MESSAGES.INVALID_FRACTION,
      });
    }

    return this.runBulk(
      'bulkPartialPayment',
      ACTOR_TAGS.BULK_PAYMENTS,
      (scope) =>
        customers
          ? Promise.resolve(customers)
          : this.debtors(scope, LEDGER_RULES.BULK_PARTIAL_LIMIT),
      (debt) => mul(debt, fraction),
      PAYMENT_NOTES.PARTIAL_SETTLEMENT
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SUMMARIES
  // ═══════════════════════════════════════════════════════════════════════════════

  async getTransactionSummary(customerId: string): Promise<TransactionSummary | null> {
    const { customers, invoices, payments } = this.unitOfWork.stores;
    const customer = await customers.getById(customerId);
    if (!customer) return null;

    const [customerInvoices, customerPayments] = await Promise.all([
      invoices.listByCustomer(customerId),
      payments.listByCustomer(customerId),
    ]);
    const lastPayment = customerPayments[0];

    return {
      customerId,
      customerName: customer.name,
      currentBalance: customer.totalDebt,
      totalSales: sum(customerInvoices.map((invoice) => invoice.finalAmount)),
      totalPayments: sum(customerPayments.map((payment) => payment.amount)),
      lastPaymentAmount: lastPayment ? lastPayment.amount : null,
      lastPaymentDate: lastPayment ? lastPayment.paymentDate : null,
    };
  }

  getPaymentsSummary(range: DateRange): Promise<PaymentsSummary> {
    return this.unitOfWork.stores.payments.summaryInRange(range.from, range.to);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  private priceInvoice(lineItems: readonly LineItemInput[], priorDebt: Decimal): PricedInvoice {
    const fields = buildInvoiceFields(aggregateLineItems(lineItems));
    const balances = this.ledger.snapshotForInvoice(priorDebt, fields.finalAmount);

    if (!isReceiptConsistent(buildReceiptTotals(fields, balances))) {
      throw new LedgerValidationError([MESSAGES.INCONSISTENT_TOTALS]);
    }

    return {
      grossWeight: fields.grossWeight,
      cagesWeight: fields.cagesWeight,
      cagesCount: fields.cagesCount,
      netWeight: fields.netWeight,
      unitPrice: fields.unitPrice,
      discountPercentage: fields.discountPercentage,
      totalAmount: fields.totalAmount,
      finalAmount: fields.finalAmount,
      previousBalance: balances.previousBalance,
      currentBalance: balances.currentBalance,
    };
  }

  private async requireTruck(scope: LedgerStores, truckId: string): Promise<void> {
    const truck = await scope.trucks.getById(truckId);
    if (!truck) {
      throw new NotFoundError('truck', truckId);
    }
    if (!truck.isActive) {
      throw new PreconditionError(`Truck ${truck.truckNumber} is inactive`, 'TRUCK_INACTIVE');
    }
  }

  /**
   * Payment recorded against a fresh invoice. Anything tendered beyond
   * invoice + prior balance is not recorded; a prior credit lowers the cap.
   */
  private async applyInvoicePayment(
    scope: TransactionScope,
    invoice: Invoice,
    priorDebt: Decimal,
    received: Decimal,
    paymentMethod: PaymentMethod,
    notes: string | undefined
  ): Promise<Payment | undefined> {
    if (!gt(received, 0)) return undefined;

    const applied = round2(min(received, add(invoice.finalAmount, priorDebt)));
    if (!gt(applied, 0)) return undefined;

    const payment = await scope.payments.create({
      customerId: invoice.customerId,
      invoiceId: invoice.id,
      amount: applied,
      paymentMethod,
      paymentDate: this.options.now(),
      notes: notes?.trim() || this.invoicePaymentNote(invoice.finalAmount, received),
    });
    await this.ledger.recordPaymentCredit(scope, payment);

    if (gt(received, applied)) {
      operationLogger({ customerId: invoice.customerId, invoiceId: invoice.id }).warn(
        { received: received.toFixed(2), applied: applied.toFixed(2) },
        'Payment exceeds invoice and outstanding debt'
      );
    }
    return payment;
  }

  private invoicePaymentNote(finalAmount: Decimal, received: Decimal): string {
    if (gt(received, finalAmount)) {
      return `${PAYMENT_NOTES.WITH_INVOICE}${PAYMENT_NOTES.OVERPAYMENT_SUFFIX}`;
    }
    if (lt(received, finalAmount)) {
      return `${PAYMENT_NOTES.WITH_INVOICE}${PAYMENT_NOTES.PARTIAL_SUFFIX}`;
    }
    return PAYMENT_NOTES.WITH_INVOICE;
  }

  /** percentage is on a 0-100 scale: 25 pays a quarter of the debt */
  private quickPaymentAmount(debt: Decimal, request: QuickPaymentRequest): Decimal {
    const requested =
      request.kind === 'full'
        ? debt
        : request.kind === 'amount'
          ? dec(request.amount)
          : div(mul(debt, request.percentage), 100);
    const ceiling = mul(debt, this.options.quickPaymentMaxDebtMultiplier);
    return round2(min(max(requested, 0), ceiling));
  }

  private async debtors(scope: LedgerStores, limit?: number): Promise<Customer[]> {
    const pageSize = limit ?? Math.max(await scope.customers.countActive(), 1);
    const page = await scope.customers.findActive(
      { withDebtOnly: true, sortBy: 'debtDesc' },
      { page: 1, pageSize }
    );
    return page.items;
  }

  private runBulk(
    operation: string,
    actorTag: ActorTag,
    selectTargets: (scope: TransactionScope) => Promise<readonly CustomerRef[]>,
    amountFor: (debt: Decimal) => Decimal,
    notes: string
  ): Promise<BulkResult> {
    return runWithOperation(operation, actorTag, async () => {
      const log = operationLogger();

      try {
        const outcome = await this.runner.run(actorTag, async (scope) => {
          const targets = await selectTargets(scope);
          const batch: BulkOutcome = this.emptyBulk();

          for (const target of targets) {
            try {
              const payment = await scope.savepoint(() =>
                this.settleCustomer(scope, target.id, amountFor, notes)
              );
              if (payment) {
                batch.processedCount++;
                batch.totalAmount = add(batch.totalAmount, payment.amount);
              } else {
                batch.skippedCount++;
              }
            } catch (error) {
              batch.failedCustomers.push(target.name);
              log.warn({ err: error, customerId: target.id }, 'Bulk payment failed for customer');
            }
          }
          return batch;
        });

        log.info(
          {
            processedCount: outcome.processedCount,
            skippedCount: outcome.skippedCount,
            failedCount: outcome.failedCustomers.length,
            totalAmount: outcome.totalAmount.toFixed(2),
          },
          'Bulk payment batch committed'
        );

        return { success: true, ...outcome, message: this.describeBulk(outcome) };
      } catch (error) {
        const report = this.errors.handle(error, operation);
        return {
          ...this.emptyBulk(),
          success: false,
          message: report.userMessage,
          errorId: report.errorId,
        };
      }
    });
  }

  /** Null when the customer no longer owes anything */
  private async settleCustomer(
    scope: TransactionScope,
    customerId: string,
    amountFor: (debt: Decimal) => Decimal,
    notes: string
  ): Promise<Payment | null> {
    const customer = await this.ledger.requireCustomer(scope, customerId);
    if (!gt(customer.totalDebt, 0)) return null;

    const amount = round2(amountFor(customer.totalDebt));
    if (!gt(amount, 0)) return null;

    const payment = await scope.payments.create({
      customerId,
      invoiceId: null,
      amount,
      paymentMethod: 'CASH',
      paymentDate: this.options.now(),
      notes,
    });
    await this.ledger.recordPaymentCredit(scope, payment);
    return payment;
  }

  private emptyBulk(): BulkOutcome {
    return { processedCount: 0, skippedCount: 0, totalAmount: zero(), failedCustomers: [] };
  }

  private describeBulk(outcome: BulkOutcome): string {
    if (outcome.processedCount === 0 && outcome.failedCustomers.length === 0) {
      return MESSAGES.NOTHING_TO_SETTLE;
    }
    const summary = `Processed ${outcome.processedCount} customer(s), total ${toString2(outcome.totalAmount)}`;
    return outcome.failedCustomers.length > 0
      ? `${summary}; failed: ${outcome.failedCustomers.join(', ')}`
      : summary;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // RESULTS
  // ═══════════════════════════════════════════════════════════════════════════════

  private completed(
    invoice: Invoice,
    payment: Payment | undefined,
    received: Decimal,
    verb: 'saved' | 'updated'
  ): TransactionResult {
    const settlement = settlementSummary(invoice.finalAmount, received);
    const parts = [`Invoice ${invoice.invoiceNumber} ${verb}: ${toString2(invoice.finalAmount)}`];

    if (payment) {
      parts.push(`payment received ${toString2(payment.amount)}`);
    }
    if (settlement.isOverpayment) {
      parts.push(`overpaid by ${toString2(settlement.overpaymentAmount)}`);
    } else if (settlement.isFullyPaid) {
      parts.push('fully paid');
    } else {
      parts.push(`remaining ${toString2(settlement.remainingBalance)}`);
    }

    operationLogger({ customerId: invoice.customerId, invoiceId: invoice.id }).info(
      {
        invoiceNumber: invoice.invoiceNumber,
        finalAmount: invoice.finalAmount.toFixed(2),
        paymentAmount: payment ? payment.amount.toFixed(2) : null,
      },
      `Invoice ${verb}`
    );

    return {
      success: true,
      invoice,
      payment,
      amountDue: invoice.finalAmount,
      paymentReceived: received,
      remainingBalance: settlement.remainingBalance,
      isOverpayment: settlement.isOverpayment,
      overpaymentAmount: settlement.overpaymentAmount,
      message: parts.join('; '),
    };
  }

  private rejected(message: string, received: Decimal, errors?: string[]): TransactionResult {
    return {
      success: false,
      amountDue: zero(),
      paymentReceived: received,
      remainingBalance: zero(),
      isOverpayment: false,
      overpaymentAmount: zero(),
      message,
      errors,
      error: message,
    };
  }

  private failed(error: unknown, context: string, received: Decimal): TransactionResult {
    if (error instanceof LedgerValidationError) {
      return this.rejected(MESSAGES.INVALID_ITEMS, received, error.messages);
    }
    const report = this.errors.handle(error, context);
    return { ...this.rejected(report.userMessage, received), errorId: report.errorId };
  }

  private paymentRejected(message: string): PaymentResult {
    return { success: false, message, error: message };
  }

  private paymentFailed(error: unknown, context: string): PaymentResult {
    const report = this.errors.handle(error, context);
    return { ...this.paymentRejected(report.userMessage), errorId: report.errorId };
  }
}
