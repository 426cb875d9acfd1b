/**
 * In-memory ledger database
 * Single-process unit of work: one open scope at a time, commit swaps the
 * committed state in one step so readers never see half an operation.
 */
import type { ActorTag, Customer, DecimalInput, Truck } from '@weighbill/shared';
import { operationLogger } from '../../observability/logger.js';
import { getOperation } from '../../observability/operation-context.js';
import { dec } from '../../money/decimal.js';
import type {
  AuditEntry,
  CustomerStore,
  InvoiceStore,
  LedgerStores,
  PaymentStore,
  TransactionScope,
  TruckStore,
  UnitOfWork,
} from '../types.js';
import {
  MemoryCustomerStore,
  MemoryInvoiceStore,
  MemoryPaymentStore,
  MemoryTruckStore,
} from './memory-stores.js';
import { cloneState, emptyState, type StateRef } from './state.js';

export interface MemoryDatabaseOptions {
  now?: () => Date;
}

export interface CustomerSeed {
  id: string;
  name: string;
  phone?: string | null;
  address?: string | null;
  totalDebt?: DecimalInput;
  isActive?: boolean;
}

export class InMemoryLedgerDatabase implements UnitOfWork {
  readonly stores: LedgerStores;
  readonly auditLog: AuditEntry[] = [];

  private committed: StateRef;
  private lock: Promise<void> = Promise.resolve();
  private now: () => Date;

  constructor(options: MemoryDatabaseOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.committed = { state: emptyState(), changes: [], now: this.now };
    this.stores = createStores(this.committed);
  }

  async begin(): Promise<TransactionScope> {
    const release = await this.acquire();
    const ref: StateRef = {
      state: cloneState(this.committed.state),
      changes: [],
      now: this.now,
    };
    return new MemoryTransactionScope(ref, {
      commit: (actorTag) => this.commit(ref, actorTag),
      release,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SEEDING
  // ═══════════════════════════════════════════════════════════════════════════════

  seedCustomer(seed: CustomerSeed): Customer {
    const now = this.now();
    const customer: Customer = {
      id: seed.id,
      name: seed.name,
      phone: seed.phone ?? null,
      address: seed.address ?? null,
      totalDebt: dec(seed.totalDebt ?? 0),
      isActive: seed.isActive ?? true,
      createdAt: now,
      updatedAt: now,
    };
    this.committed.state.customers.set(customer.id, customer);
    return customer;
  }

  seedTruck(seed: Pick<Truck, 'id' | 'truckNumber'> & Partial<Truck>): Truck {
    const truck: Truck = {
      driverName: '',
      isActive: true,
      ...seed,
    };
    this.committed.state.trucks.set(truck.id, truck);
    return truck;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════════

  private commit(ref: StateRef, actorTag: ActorTag): void {
    this.committed.state = ref.state;
    const entry: AuditEntry = {
      actorTag,
      operationId: getOperation()?.operationId ?? null,
      committedAt: this.now(),
      changes: [...ref.changes],
    };
    this.auditLog.push(entry);
    operationLogger().debug(
      { actorTag, changes: entry.changes.length },
      'Unit of work committed'
    );
  }

  /** Promise-chain mutex; resolves with the release function */
  private async acquire(): Promise<() => void> {
    const previous = this.lock;
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.lock = previous.then(() => next);
    await previous;
    return release;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSACTION SCOPE
// ═══════════════════════════════════════════════════════════════════════════════

interface ScopeHooks {
  commit(actorTag: ActorTag): void;
  release(): void;
}

class MemoryTransactionScope implements TransactionScope {
  readonly customers: CustomerStore;
  readonly trucks: TruckStore;
  readonly invoices: InvoiceStore;
  readonly payments: PaymentStore;

  private ended = false;

  constructor(
    private ref: StateRef,
    private hooks: ScopeHooks
  ) {
    const stores = createStores(ref);
    this.customers = stores.customers;
    this.trucks = stores.trucks;
    this.invoices = stores.invoices;
    this.payments = stores.payments;
  }

  async savepoint<T>(work: () => Promise<T>): Promise<T> {
    this.assertOpen();
    const snapshot = cloneState(this.ref.state);
    const changeCount = this.ref.changes.length;
    try {
      return await work();
    } catch (error) {
      this.ref.state = snapshot;
      this.ref.changes.length = changeCount;
      throw error;
    }
  }

  async saveChanges(actorTag: ActorTag): Promise<void> {
    this.assertOpen();
    this.hooks.commit(actorTag);
    this.end();
  }

  async rollback(): Promise<void> {
    if (this.ended) return;
    this.end();
  }

  private end(): void {
    this.ended = true;
    this.hooks.release();
  }

  private assertOpen(): void {
    if (this.ended) {
      throw new Error('Transaction scope has already ended');
    }
  }
}

function createStores(ref: StateRef): LedgerStores {
  return {
    customers: new MemoryCustomerStore(ref),
    trucks: new MemoryTruckStore(ref),
    invoices: new MemoryInvoiceStore(ref),
    payments: new MemoryPaymentStore(ref),
  };
}
