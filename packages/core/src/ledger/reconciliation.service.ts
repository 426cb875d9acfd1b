/**
 * Balance Reconciliation Service
 * Compares each stored totalDebt with what invoices and payments imply:
 * Σ invoice.finalAmount − Σ payment.amount
 */
import type { BalanceDiscrepancy } from '@weighbill/shared';
import { ACTOR_TAGS, LEDGER_RULES } from '@weighbill/shared';
import type { Decimal } from 'decimal.js';
import { NotFoundError } from '../errors/errors.js';
import { approxEq, sub, sum } from '../money/decimal.js';
import { runWithOperation } from '../observability/operation-context.js';
import { operationLogger } from '../observability/logger.js';
import type { LedgerStores, UnitOfWork } from '../stores/types.js';
import type { TransactionRunner } from '../transactions/transaction-runner.js';
import { DebtLedger } from './debt-ledger.js';
import type { RecalculationResult } from './types.js';

export class BalanceReconciliationService {
  constructor(
    private unitOfWork: UnitOfWork,
    private runner: TransactionRunner,
    private ledger: DebtLedger = new DebtLedger()
  ) {}

  async calculateBalance(stores: LedgerStores, customerId: string): Promise<Decimal> {
    const [invoices, payments] = await Promise.all([
      stores.invoices.listByCustomer(customerId),
      stores.payments.listByCustomer(customerId),
    ]);
    return sub(
      sum(invoices.map((invoice) => invoice.finalAmount)),
      sum(payments.map((payment) => payment.amount))
    );
  }

  /**
   * Active customers whose stored balance is off by more than the tolerance
   */
  async findDiscrepancies(): Promise<BalanceDiscrepancy[]> {
    const stores = this.unitOfWork.stores;
    const total = await stores.customers.countActive();
    const { items } = await stores.customers.findActive({}, { page: 1, pageSize: Math.max(total, 1) });

    const discrepancies: BalanceDiscrepancy[] = [];
    for (const customer of items) {
      const calculatedBalance = await this.calculateBalance(stores, customer.id);
      if (!approxEq(customer.totalDebt, calculatedBalance, LEDGER_RULES.BALANCE_TOLERANCE)) {
        discrepancies.push({
          customer,
          storedBalance: customer.totalDebt,
          calculatedBalance,
          difference: sub(customer.totalDebt, calculatedBalance),
        });
      }
    }
    return discrepancies;
  }

  /**
   * Rebuild one customer's balance from history, correcting it through the
   * ledger when it drifted beyond the tolerance.
   */
  recalculateBalance(customerId: string): Promise<RecalculationResult> {
    return runWithOperation('recalculateBalance', ACTOR_TAGS.BALANCE_RECALCULATION, () =>
      this.runner.run(ACTOR_TAGS.BALANCE_RECALCULATION, async (scope) => {
        const customer = await scope.customers.getById(customerId);
        if (!customer) {
          throw new NotFoundError('customer', customerId);
        }

        const calculatedBalance = await this.calculateBalance(scope, customerId);
        const corrected = !approxEq(
          customer.totalDebt,
          calculatedBalance,
          LEDGER_RULES.BALANCE_TOLERANCE
        );

        if (corrected) {
          await this.ledger.applyDelta(
            scope,
            customerId,
            sub(calculatedBalance, customer.totalDebt),
            'BALANCE_CORRECTION'
          );
          operationLogger({ customerId }).warn(
            {
              storedBalance: customer.totalDebt.toFixed(2),
              calculatedBalance: calculatedBalance.toFixed(2),
            },
            'Customer balance corrected'
          );
        }

        return {
          customerId,
          storedBalance: customer.totalDebt,
          calculatedBalance,
          corrected,
        };
      })
    );
  }
}
