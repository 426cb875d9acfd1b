/**
 * Transaction Runner
 * Wraps a unit of work in begin / saveChanges / rollback under one of two
 * exclusive policies:
 *   explicit  - the operation is one transaction and is never retried
 *   retrying  - transient store failures re-run the whole operation
 */
import type { ActorTag } from '@weighbill/shared';
import type { TransactionMode } from '../config/env.js';
import { isRetryableError } from '../errors/error-handling.service.js';
import { operationLogger } from '../observability/logger.js';
import type { TransactionScope, UnitOfWork } from '../stores/types.js';

export interface TransactionPolicy {
  mode: TransactionMode;
  /** Extra attempts in retrying mode; ignored in explicit mode */
  retryCount: number;
}

export class TransactionRunner {
  constructor(
    private unitOfWork: UnitOfWork,
    private policy: TransactionPolicy
  ) {}

  get maxAttempts(): number {
    return this.policy.mode === 'retrying' ? this.policy.retryCount + 1 : 1;
  }

  async run<T>(actorTag: ActorTag, work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const scope = await this.unitOfWork.begin();
      try {
        const result = await work(scope);
        await scope.saveChanges(actorTag);
        return result;
      } catch (error) {
        await scope.rollback();
        if (attempt >= this.maxAttempts || !isRetryableError(error)) {
          throw error;
        }
        operationLogger().warn(
          { err: error, attempt, maxAttempts: this.maxAttempts, actorTag },
          'Transient store failure, retrying unit of work'
        );
      }
    }
  }
}
