/**
 * Store contracts
 * Repository-shaped interfaces the core persists through
 */
import type {
  ActorTag,
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
import type { Decimal } from 'decimal.js';

// ═══════════════════════════════════════════════════════════════════════════════
// WRITE MODELS
// ═══════════════════════════════════════════════════════════════════════════════

export interface NewCustomer {
  name: string;
  phone: string | null;
  address: string | null;
}

export type CustomerChanges = Partial<NewCustomer & { isActive: boolean }>;

export type NewInvoice = Omit<Invoice, 'id' | 'createdAt' | 'updatedAt'>;

export type NewPayment = Omit<Payment, 'id' | 'createdAt'>;

// ═══════════════════════════════════════════════════════════════════════════════
// STORES
// ═══════════════════════════════════════════════════════════════════════════════

export interface CustomerStore {
  getById(id: string): Promise<Customer | null>;
  /** Case-insensitive exact match, ignoring the customer being edited */
  getByName(name: string, excludeId?: string): Promise<Customer | null>;
  getByPhone(phone: string, excludeId?: string): Promise<Customer | null>;
  create(customer: NewCustomer): Promise<Customer>;
  update(id: string, changes: CustomerChanges): Promise<Customer>;
  /** Hard delete; callers check hasTransactions first */
  delete(id: string): Promise<void>;
  /** Adds delta to totalDebt and returns the updated customer */
  updateBalance(id: string, delta: Decimal): Promise<Customer>;
  findActive(filter: CustomerFilter, page: PageRequest): Promise<Page<Customer>>;
  countActive(): Promise<number>;
  hasTransactions(id: string): Promise<boolean>;
}

export interface TruckStore {
  getById(id: string): Promise<Truck | null>;
}

export interface InvoiceStore {
  /** Next yyyyMMdd#### number for the day of `date` */
  generateNextNumber(date: Date): Promise<string>;
  create(invoice: NewInvoice): Promise<Invoice>;
  update(invoice: Invoice): Promise<Invoice>;
  getById(id: string): Promise<Invoice | null>;
  getWithDetails(id: string): Promise<InvoiceWithDetails | null>;
  /** Matches invoice number or customer name; newest first */
  search(term: string, range?: DateRange): Promise<Invoice[]>;
  listByCustomer(customerId: string): Promise<Invoice[]>;
}

export interface PaymentStore {
  create(payment: NewPayment): Promise<Payment>;
  /** Newest first */
  listByCustomer(customerId: string): Promise<Payment[]>;
  /** Inclusive of both ends */
  summaryInRange(start: Date, end: Date): Promise<PaymentsSummary>;
}

export interface LedgerStores {
  customers: CustomerStore;
  trucks: TruckStore;
  invoices: InvoiceStore;
  payments: PaymentStore;
}

// ═══════════════════════════════════════════════════════════════════════════════
// UNIT OF WORK
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Stores bound to one open unit of work. Writes stay invisible to other
 * readers until saveChanges.
 */
export interface TransactionScope extends LedgerStores {
  /**
   * Runs `work`; if it throws, only the writes made inside it are
   * discarded and the error is rethrown.
   */
  savepoint<T>(work: () => Promise<T>): Promise<T>;
  /** Commits every pending write atomically under an audit label */
  saveChanges(actorTag: ActorTag): Promise<void>;
  /** Discards pending writes; a no-op once the scope has ended */
  rollback(): Promise<void>;
}

export interface UnitOfWork {
  /** Reads committed state only */
  readonly stores: LedgerStores;
  begin(): Promise<TransactionScope>;
}

export interface AuditEntry {
  actorTag: ActorTag;
  operationId: string | null;
  committedAt: Date;
  changes: ChangeRecord[];
}

export interface ChangeRecord {
  entity: 'customer' | 'invoice' | 'payment';
  entityId: string;
  action: 'create' | 'update' | 'delete';
}
