import { describe, it, expect, beforeEach, vi } from 'vitest';
import { USER_MESSAGES } from '../../src/errors/error-handling.service.js';
import type { InMemoryLedgerDatabase } from '../../src/stores/memory/memory-database.js';
import { MemoryPaymentStore } from '../../src/stores/memory/memory-stores.js';
import type { TransactionService } from '../../src/transactions/transaction.service.js';
import {
  FIXED_NOW,
  createTestDatabase,
  createTransactionService,
  debtOf,
  draftFor,
  lineItem,
  mockCustomer,
  mockDebtor,
} from './mocks.js';

describe('TransactionService', () => {
  let database: InMemoryLedgerDatabase;
  let service: TransactionService;

  beforeEach(() => {
    database = createTestDatabase();
    service = createTransactionService(database);
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // INVOICE WITH PAYMENT
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('createInvoiceWithPayment', () => {
    it('settles an invoice paid in full', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem()], 300);

      expect(result.success).toBe(true);
      expect(result.invoice?.invoiceNumber).toBe('202403050001');
      expect(result.remainingBalance.toNumber()).toBe(0);
      expect(result.isOverpayment).toBe(false);
      expect(result.payment?.amount.toFixed(2)).toBe('300.00');
      expect(result.payment?.notes).toBe('Payment with invoice');
      expect(result.message).toBe(
        'Invoice 202403050001 saved: 300.00; payment received 300.00; fully paid'
      );
      expect(await debtOf(database, mockCustomer.id)).toBe('0.00');
    });

    it('flags an overpayment and caps what is recorded', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem()], 400);

      expect(result.remainingBalance.toNumber()).toBe(0);
      expect(result.isOverpayment).toBe(true);
      expect(result.overpaymentAmount.toNumber()).toBe(100);
      expect(result.payment?.amount.toFixed(2)).toBe('300.00');
      expect(result.payment?.notes).toBe('Payment with invoice (includes overpayment)');
      expect(result.message).toBe(
        'Invoice 202403050001 saved: 300.00; payment received 300.00; overpaid by 100.00'
      );
      expect(await debtOf(database, mockCustomer.id)).toBe('0.00');
    });

    it('lets an overpayment pay down existing debt', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(mockDebtor.id), [lineItem()], 400);

      expect(result.payment?.amount.toFixed(2)).toBe('400.00');
      expect(result.invoice?.previousBalance.toFixed(2)).toBe('100.00');
      expect(result.invoice?.currentBalance.toFixed(2)).toBe('400.00');
      expect(await debtOf(database, mockDebtor.id)).toBe('0.00');
    });

    it('lowers the recorded payment by an existing credit', async () => {
      database.seedCustomer({ id: 'cust-3', name: 'Riverside Deli', totalDebt: -100 });

      const result = await service.createInvoiceWithPayment(draftFor('cust-3'), [lineItem()], 300);

      expect(result.success).toBe(true);
      expect(result.payment?.amount.toFixed(2)).toBe('200.00');
      expect(result.invoice?.previousBalance.toFixed(2)).toBe('-100.00');
      expect(result.invoice?.currentBalance.toFixed(2)).toBe('200.00');
      expect(result.message).toBe(
        'Invoice 202403050001 saved: 300.00; payment received 200.00; fully paid'
      );
      expect(await debtOf(database, 'cust-3')).toBe('0.00');
    });

    it('adds the unpaid part of a partial payment to the debt', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem()], 100);

      expect(result.remainingBalance.toNumber()).toBe(200);
      expect(result.payment?.notes).toBe('Payment with invoice (partial payment)');
      expect(result.message).toBe(
        'Invoice 202403050001 saved: 300.00; payment received 100.00; remaining 200.00'
      );
      expect(await debtOf(database, mockCustomer.id)).toBe('200.00');
    });

    it('stamps the invoice with the debt carried forward', async () => {
      // net 100 × 2.50 = 250.00 on top of 100.00 already owed
      const result = await service.createInvoiceOnly(draftFor(mockDebtor.id), [
        lineItem({ unitPrice: 2.5 }),
      ]);

      expect(result.invoice?.previousBalance.toFixed(2)).toBe('100.00');
      expect(result.invoice?.currentBalance.toFixed(2)).toBe('350.00');
      expect(result.payment).toBeUndefined();
      expect(await debtOf(database, mockDebtor.id)).toBe('350.00');
    });

    it('keeps user notes on the linked payment', async () => {
      const result = await service.createInvoiceWithPayment(
        draftFor(),
        [lineItem()],
        300,
        'TRANSFER',
        '  bank ref 77  '
      );

      expect(result.payment?.notes).toBe('bank ref 77');
      expect(result.payment?.paymentMethod).toBe('TRANSFER');
      expect(result.payment?.invoiceId).toBe(result.invoice?.id);
    });

    it('numbers invoices of the same day in sequence', async () => {
      await service.createInvoiceOnly(draftFor(), [lineItem()]);
      const second = await service.createInvoiceOnly(draftFor(), [lineItem()]);

      expect(second.invoice?.invoiceNumber).toBe('202403050002');
    });

    it('rejects a draft without a truck before touching the store', async () => {
      const draft = { ...draftFor(), truckId: null };
      const result = await service.createInvoiceWithPayment(draft, [lineItem()], 0);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Please select a truck');
      expect(database.auditLog).toHaveLength(0);
    });

    it('rejects a negative payment', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem()], -5);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Payment amount cannot be negative');
    });

    it('returns the line item errors', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(), [
        lineItem({ grossWeight: 50, cagesCount: 6, cageWeight: 10 }),
      ]);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Please correct the invoice line items');
      expect(result.errors).toEqual([
        'Item 1: cages weight cannot be greater than or equal to gross weight',
      ]);
    });

    it('accepts a blank row next to a complete one', async () => {
      const blank = { grossWeight: 0, cagesCount: 0, cageWeight: 0, unitPrice: 0, discountPercentage: 0 };

      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem(), blank], 0);

      expect(result.success).toBe(true);
      expect(result.invoice?.finalAmount.toFixed(2)).toBe('300.00');
      expect(result.invoice?.cagesCount).toBe(5);
      expect(await debtOf(database, mockCustomer.id)).toBe('300.00');
    });

    it('reports an empty weight field as an item error', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem({ grossWeight: '' })]);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Please correct the invoice line items');
      expect(result.errors).toEqual(['Item 1: gross weight must be a number']);
    });

    it('rejects a payment amount that is not a number', async () => {
      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem()], '');

      expect(result.success).toBe(false);
      expect(result.message).toBe('Payment amount must be a number');
      expect(result.paymentReceived.toNumber()).toBe(0);
      expect(database.auditLog).toHaveLength(0);
    });

    it('refuses an inactive truck', async () => {
      database.seedTruck({ id: 'truck-2', truckNumber: 'T-200', isActive: false });
      const draft = { ...draftFor(), truckId: 'truck-2' };

      const result = await service.createInvoiceOnly(draft, [lineItem()]);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Truck T-200 is inactive');
      expect(await database.stores.invoices.search('')).toEqual([]);
    });

    it('reports a customer that no longer exists', async () => {
      const result = await service.createInvoiceOnly(draftFor('cust-gone'), [lineItem()]);

      expect(result.success).toBe(false);
      expect(result.message).toBe(USER_MESSAGES.CUSTOMER_NOT_FOUND);
      expect(result.errorId).toHaveLength(8);
    });

    it('rolls back the invoice and balance when the payment write fails', async () => {
      vi.spyOn(MemoryPaymentStore.prototype, 'create').mockRejectedValue(new Error('disk full'));

      const result = await service.createInvoiceWithPayment(draftFor(), [lineItem()], 300);

      expect(result.success).toBe(false);
      expect(result.message).toBe(USER_MESSAGES.UNEXPECTED);
      expect(await database.stores.invoices.search('')).toEqual([]);
      expect(await debtOf(database, mockCustomer.id)).toBe('0.00');
      expect(database.auditLog).toHaveLength(0);
    });

    it('records the actor tag with the committed changes', async () => {
      await service.createInvoiceWithPayment(draftFor(), [lineItem()], 300);

      expect(database.auditLog).toHaveLength(1);
      expect(database.auditLog[0].actorTag).toBe('POS_USER');
      expect(database.auditLog[0].operationId).toHaveLength(8);
      expect(database.auditLog[0].changes.map((change) => change.entity)).toEqual([
        'invoice',
        'customer',
        'payment',
        'customer',
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // UPDATE & EDIT
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('updateInvoice', () => {
    it('reverses the old amount before applying the new one', async () => {
      const created = await service.createInvoiceOnly(draftFor(mockDebtor.id), [
        lineItem({ unitPrice: 2.5 }),
      ]);
      expect(await debtOf(database, mockDebtor.id)).toBe('350.00');

      const result = await service.updateInvoice(created.invoice?.id ?? '', [lineItem()]);

      expect(result.success).toBe(true);
      expect(result.invoice?.invoiceNumber).toBe('202403050001');
      expect(result.invoice?.previousBalance.toFixed(2)).toBe('100.00');
      expect(result.invoice?.currentBalance.toFixed(2)).toBe('400.00');
      expect(result.message).toBe('Invoice 202403050001 updated: 300.00; remaining 300.00');
      expect(await debtOf(database, mockDebtor.id)).toBe('400.00');
      expect(database.auditLog[1].actorTag).toBe('INVOICE_UPDATE');
    });

    it('reports a missing invoice', async () => {
      const result = await service.updateInvoice('inv-gone', [lineItem()]);

      expect(result.success).toBe(false);
      expect(result.message).toBe(USER_MESSAGES.INVOICE_NOT_FOUND);
    });

    it('rejects a payment amount that is not a number', async () => {
      const created = await service.createInvoiceOnly(draftFor(), [lineItem()]);

      const result = await service.updateInvoice(created.invoice?.id ?? '', [lineItem()], 'ten');

      expect(result.success).toBe(false);
      expect(result.message).toBe('Payment amount must be a number');
      expect(database.auditLog).toHaveLength(1);
    });

    it('loads an invoice as one representative line item', async () => {
      const created = await service.createInvoiceOnly(draftFor(), [lineItem()]);

      const loaded = await service.loadInvoiceForEdit(created.invoice?.id ?? '');

      expect(loaded?.invoice.customer.name).toBe(mockCustomer.name);
      expect(loaded?.invoice.truck.truckNumber).toBe('T-100');
      expect(loaded?.lineItems).toHaveLength(1);
      expect(loaded?.lineItems[0].cagesCount).toBe(5);
      expect(String(loaded?.lineItems[0].cageWeight)).toBe('2');
    });

    it('finds invoices by customer name', async () => {
      await service.createInvoiceOnly(draftFor(), [lineItem()]);
      await service.createInvoiceOnly(draftFor(mockDebtor.id), [lineItem()]);

      const found = await service.searchInvoices('hilltop');

      expect(found).toHaveLength(1);
      expect(found[0].customerId).toBe(mockDebtor.id);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // PAYMENTS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('quickPayment', () => {
    it('pays a percentage of the debt', async () => {
      const result = await service.quickPayment(mockDebtor.id, { kind: 'percentage', percentage: 25 });

      expect(result.success).toBe(true);
      expect(result.payment?.amount.toFixed(2)).toBe('25.00');
      expect(result.payment?.notes).toBe('Quick payment');
      expect(result.previousBalance?.toFixed(2)).toBe('100.00');
      expect(result.newBalance?.toFixed(2)).toBe('75.00');
      expect(result.message).toBe('Payment of 25.00 recorded; balance 75.00');
    });

    it('pays the full debt', async () => {
      const result = await service.quickPayment(mockDebtor.id, { kind: 'full' });

      expect(result.newBalance?.toFixed(2)).toBe('0.00');
    });

    it('clamps an amount above twice the debt', async () => {
      const result = await service.quickPayment(mockDebtor.id, { kind: 'amount', amount: 500 });

      expect(result.payment?.amount.toFixed(2)).toBe('200.00');
      expect(result.newBalance?.toFixed(2)).toBe('-100.00');
    });

    it('refuses a payment that clamps to zero', async () => {
      const result = await service.quickPayment(mockDebtor.id, { kind: 'amount', amount: -5 });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Payment amount must be greater than zero');
      expect(await debtOf(database, mockDebtor.id)).toBe('100.00');
    });

    it('refuses a customer without debt', async () => {
      const result = await service.quickPayment(mockCustomer.id, { kind: 'full' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Green Valley Market has no outstanding debt');
    });

    it('refuses a percentage above 100', async () => {
      const result = await service.quickPayment(mockDebtor.id, { kind: 'percentage', percentage: 150 });

      expect(result.message).toBe('Payment details are invalid');
    });
  });

  describe('recordPayment', () => {
    it('leaves a credit balance when paying past the debt', async () => {
      const result = await service.recordPayment({ customerId: mockCustomer.id, amount: '50' });

      expect(result.success).toBe(true);
      expect(result.payment?.invoiceId).toBeNull();
      expect(result.payment?.notes).toBeNull();
      expect(result.payment?.paymentMethod).toBe('CASH');
      expect(result.newBalance?.toFixed(2)).toBe('-50.00');
      expect(database.auditLog[0].actorTag).toBe('PAYMENT_ONLY');
    });

    it('rejects an invoice that belongs to another customer', async () => {
      const created = await service.createInvoiceOnly(draftFor(mockDebtor.id), [lineItem()]);

      const result = await service.recordPayment({
        customerId: mockCustomer.id,
        amount: 10,
        invoiceId: created.invoice?.id,
      });

      expect(result.success).toBe(false);
      expect(result.message).toBe(USER_MESSAGES.INVOICE_NOT_FOUND);
    });

    it('rejects a zero amount', async () => {
      const result = await service.recordPayment({ customerId: mockCustomer.id, amount: 0 });

      expect(result.message).toBe('Payment amount must be greater than zero');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // SUMMARIES
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('summaries', () => {
    it('summarises a customer from invoices and payments', async () => {
      await service.createInvoiceWithPayment(draftFor(), [lineItem()], 100);

      const summary = await service.getTransactionSummary(mockCustomer.id);

      expect(summary?.totalSales.toFixed(2)).toBe('300.00');
      expect(summary?.totalPayments.toFixed(2)).toBe('100.00');
      expect(summary?.currentBalance.toFixed(2)).toBe('200.00');
      expect(summary?.lastPaymentAmount?.toFixed(2)).toBe('100.00');
      expect(summary?.lastPaymentDate).toEqual(FIXED_NOW);
    });

    it('returns null for an unknown customer', async () => {
      expect(await service.getTransactionSummary('cust-gone')).toBeNull();
    });

    it('totals payments within a date range', async () => {
      await service.createInvoiceWithPayment(draftFor(), [lineItem()], 100);
      await service.quickPayment(mockDebtor.id, { kind: 'amount', amount: 40 });

      const inRange = await service.getPaymentsSummary({
        from: new Date(2024, 2, 5),
        to: new Date(2024, 2, 6),
      });
      const outOfRange = await service.getPaymentsSummary({
        from: new Date(2024, 2, 6),
        to: new Date(2024, 2, 7),
      });

      expect(inRange.count).toBe(2);
      expect(inRange.totalAmount.toFixed(2)).toBe('140.00');
      expect(outOfRange.count).toBe(0);
    });
  });
});
