/**
 * Memory Stores
 * Map-backed store implementations over a swappable state reference
 */
import { randomUUID } from 'crypto';
import type {
  Customer,
  CustomerFilter,
  DateRange,
  Invoice,
  InvoiceWithDetails,
  Page,
  PageRequest,
  Payment,
  PaymentsSummary,
  Truck,
} from '@weighbill/shared';
import { normalizePhone } from '@weighbill/shared';
import type { Decimal } from 'decimal.js';
import { NotFoundError } from '../../errors/errors.js';
import { formatDatePrefix, nextInvoiceNumber } from '../../invoicing/numbering.js';
import { sum, zero } from '../../money/decimal.js';
import type {
  CustomerChanges,
  CustomerStore,
  InvoiceStore,
  NewCustomer,
  NewInvoice,
  NewPayment,
  PaymentStore,
  TruckStore,
} from '../types.js';
import type { StateRef } from './state.js';

const normalizeName = (name: string) => name.trim().toLocaleLowerCase();

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOMERS
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryCustomerStore implements CustomerStore {
  constructor(private ref: StateRef) {}

  async getById(id: string): Promise<Customer | null> {
    return this.ref.state.customers.get(id) ?? null;
  }

  async getByName(name: string, excludeId?: string): Promise<Customer | null> {
    const wanted = normalizeName(name);
    return (
      this.active().find(
        (customer) => customer.id !== excludeId && normalizeName(customer.name) === wanted
      ) ?? null
    );
  }

  async getByPhone(phone: string, excludeId?: string): Promise<Customer | null> {
    const wanted = normalizePhone(phone);
    return (
      this.active().find(
        (customer) =>
          customer.id !== excludeId &&
          customer.phone !== null &&
          normalizePhone(customer.phone) === wanted
      ) ?? null
    );
  }

  async create(input: NewCustomer): Promise<Customer> {
    const now = this.ref.now();
    const customer: Customer = {
      id: randomUUID(),
      name: input.name,
      phone: input.phone,
      address: input.address,
      totalDebt: zero(),
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.ref.state.customers.set(customer.id, customer);
    this.ref.changes.push({ entity: 'customer', entityId: customer.id, action: 'create' });
    return customer;
  }

  async update(id: string, changes: CustomerChanges): Promise<Customer> {
    const updated: Customer = { ...this.require(id), ...changes, updatedAt: this.ref.now() };
    this.ref.state.customers.set(id, updated);
    this.ref.changes.push({ entity: 'customer', entityId: id, action: 'update' });
    return updated;
  }

  async delete(id: string): Promise<void> {
    this.require(id);
    this.ref.state.customers.delete(id);
    this.ref.changes.push({ entity: 'customer', entityId: id, action: 'delete' });
  }

  async updateBalance(id: string, delta: Decimal): Promise<Customer> {
    const customer = this.require(id);
    const updated: Customer = {
      ...customer,
      totalDebt: customer.totalDebt.add(delta),
      updatedAt: this.ref.now(),
    };
    this.ref.state.customers.set(id, updated);
    this.ref.changes.push({ entity: 'customer', entityId: id, action: 'update' });
    return updated;
  }

  async findActive(filter: CustomerFilter, page: PageRequest): Promise<Page<Customer>> {
    const term = filter.term ? filter.term.trim().toLocaleLowerCase() : '';
    const matches = this.active().filter((customer) => {
      if (filter.withDebtOnly && !customer.totalDebt.greaterThan(0)) {
        return false;
      }
      if (!term) {
        return true;
      }
      return (
        customer.name.toLocaleLowerCase().includes(term) ||
        (customer.phone ?? '').includes(term)
      );
    });

    matches.sort((a, b) =>
      filter.sortBy === 'debtDesc'
        ? b.totalDebt.comparedTo(a.totalDebt)
        : a.name.localeCompare(b.name)
    );

    const start = (page.page - 1) * page.pageSize;
    return {
      items: matches.slice(start, start + page.pageSize),
      total: matches.length,
      page: page.page,
      pageSize: page.pageSize,
    };
  }

  async countActive(): Promise<number> {
    return this.active().length;
  }

  async hasTransactions(id: string): Promise<boolean> {
    const { invoices, payments } = this.ref.state;
    return (
      [...invoices.values()].some((invoice) => invoice.customerId === id) ||
      [...payments.values()].some((payment) => payment.customerId === id)
    );
  }

  private active(): Customer[] {
    return [...this.ref.state.customers.values()].filter((customer) => customer.isActive);
  }

  private require(id: string): Customer {
    const customer = this.ref.state.customers.get(id);
    if (!customer) {
      throw new NotFoundError('customer', id);
    }
    return customer;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRUCKS
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryTruckStore implements TruckStore {
  constructor(private ref: StateRef) {}

  async getById(id: string): Promise<Truck | null> {
    return this.ref.state.trucks.get(id) ?? null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// INVOICES
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryInvoiceStore implements InvoiceStore {
  constructor(private ref: StateRef) {}

  async generateNextNumber(date: Date): Promise<string> {
    const prefix = formatDatePrefix(date);
    let last: string | null = null;
    let lastSequence = 0;

    for (const invoice of this.ref.state.invoices.values()) {
      if (!invoice.invoiceNumber.startsWith(prefix)) continue;
      const sequence = Number.parseInt(invoice.invoiceNumber.slice(prefix.length), 10);
      if (Number.isFinite(sequence) && sequence > lastSequence) {
        lastSequence = sequence;
        last = invoice.invoiceNumber;
      }
    }

    return nextInvoiceNumber(date, last);
  }

  async create(input: NewInvoice): Promise<Invoice> {
    const now = this.ref.now();
    const invoice: Invoice = { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
    this.ref.state.invoices.set(invoice.id, invoice);
    this.ref.changes.push({ entity: 'invoice', entityId: invoice.id, action: 'create' });
    return invoice;
  }

  async update(invoice: Invoice): Promise<Invoice> {
    if (!this.ref.state.invoices.has(invoice.id)) {
      throw new NotFoundError('invoice', invoice.id);
    }
    const updated: Invoice = { ...invoice, updatedAt: this.ref.now() };
    this.ref.state.invoices.set(invoice.id, updated);
    this.ref.changes.push({ entity: 'invoice', entityId: invoice.id, action: 'update' });
    return updated;
  }

  async getById(id: string): Promise<Invoice | null> {
    return this.ref.state.invoices.get(id) ?? null;
  }

  async getWithDetails(id: string): Promise<InvoiceWithDetails | null> {
    const { invoices, customers, trucks, payments } = this.ref.state;
    const invoice = invoices.get(id);
    if (!invoice) return null;

    const customer = customers.get(invoice.customerId);
    const truck = trucks.get(invoice.truckId);
    if (!customer || !truck) return null;

    return {
      ...invoice,
      customer,
      truck,
      payments: [...payments.values()].filter((payment) => payment.invoiceId === id),
    };
  }

  async search(term: string, range?: DateRange): Promise<Invoice[]> {
    const wanted = term.trim().toLocaleLowerCase();
    const { customers } = this.ref.state;

    return [...this.ref.state.invoices.values()]
      .filter((invoice) => {
        if (range && (invoice.invoiceDate < range.from || invoice.invoiceDate > range.to)) {
          return false;
        }
        if (!wanted) return true;
        const customerName = customers.get(invoice.customerId)?.name.toLocaleLowerCase() ?? '';
        return invoice.invoiceNumber.toLocaleLowerCase().includes(wanted) || customerName.includes(wanted);
      })
      .sort((a, b) => b.invoiceDate.getTime() - a.invoiceDate.getTime());
  }

  async listByCustomer(customerId: string): Promise<Invoice[]> {
    return [...this.ref.state.invoices.values()]
      .filter((invoice) => invoice.customerId === customerId)
      .sort((a, b) => b.invoiceDate.getTime() - a.invoiceDate.getTime());
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAYMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryPaymentStore implements PaymentStore {
  constructor(private ref: StateRef) {}

  async create(input: NewPayment): Promise<Payment> {
    const payment: Payment = { ...input, id: randomUUID(), createdAt: this.ref.now() };
    this.ref.state.payments.set(payment.id, payment);
    this.ref.changes.push({ entity: 'payment', entityId: payment.id, action: 'create' });
    return payment;
  }

  async listByCustomer(customerId: string): Promise<Payment[]> {
    return [...this.ref.state.payments.values()]
      .filter((payment) => payment.customerId === customerId)
      .sort((a, b) => b.paymentDate.getTime() - a.paymentDate.getTime());
  }

  async summaryInRange(start: Date, end: Date): Promise<PaymentsSummary> {
    const inRange = [...this.ref.state.payments.values()].filter(
      (payment) => payment.paymentDate >= start && payment.paymentDate <= end
    );
    return {
      totalAmount: sum(inRange.map((payment) => payment.amount)),
      count: inRange.length,
    };
  }
}
