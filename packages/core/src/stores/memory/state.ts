import type { Customer, Invoice, Payment, Truck } from '@weighbill/shared';
import type { ChangeRecord } from '../types.js';

export interface LedgerState {
  customers: Map<string, Customer>;
  trucks: Map<string, Truck>;
  invoices: Map<string, Invoice>;
  payments: Map<string, Payment>;
}

/**
 * What a set of memory stores reads and writes through. Entities are
 * replaced on write, never mutated, so copying the maps is a snapshot.
 */
export interface StateRef {
  state: LedgerState;
  changes: ChangeRecord[];
  now: () => Date;
}

export function emptyState(): LedgerState {
  return {
    customers: new Map(),
    trucks: new Map(),
    invoices: new Map(),
    payments: new Map(),
  };
}

export function cloneState(state: LedgerState): LedgerState {
  return {
    customers: new Map(state.customers),
    trucks: new Map(state.trucks),
    invoices: new Map(state.invoices),
    payments: new Map(state.payments),
  };
}
