/**
 * Operation Context using AsyncLocalStorage
 * Carries the id and actor tag of the ledger operation in progress
 */
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface OperationContext {
  operationId: string;
  operation: string;
  actor: string;
  startedAt: Date;
}

const storage = new AsyncLocalStorage<OperationContext>();

export function runWithOperation<T>(
  operation: string,
  actor: string,
  fn: () => T
): T {
  const context: OperationContext = {
    operationId: randomUUID().slice(0, 8),
    operation,
    actor,
    startedAt: new Date(),
  };
  return storage.run(context, fn);
}

export function getOperation(): OperationContext | undefined {
  return storage.getStore();
}

