/**
 * Customer Service
 * Registration, edits and removal of ledger participants
 */
import type {
  Customer,
  CustomerFilter,
  CustomerInput,
  Page,
  PageRequest,
  ParsedCustomerInput,
} from '@weighbill/shared';
import { ACTOR_TAGS, CustomerInputSchema } from '@weighbill/shared';
import { ErrorHandlingService } from '../errors/error-handling.service.js';
import { NotFoundError, PreconditionError } from '../errors/errors.js';
import { operationLogger } from '../observability/logger.js';
import { runWithOperation } from '../observability/operation-context.js';
import type { LedgerStores, UnitOfWork } from '../stores/types.js';
import { TransactionRunner, type TransactionPolicy } from '../transactions/transaction-runner.js';
import { transactionOptionsFromEnv } from '../transactions/transaction.service.js';
import { FIELD_MESSAGES } from './field-rules.js';
import type { CustomerValidationPipeline } from './validation-pipeline.js';

export interface CustomerSaveResult {
  success: boolean;
  customer?: Customer;
  message: string;
  errors?: string[];
  errorId?: string;
}

export interface CustomerRemovalResult {
  success: boolean;
  /** Customers with history are deactivated instead of deleted */
  outcome?: 'deleted' | 'deactivated';
  message: string;
  errorId?: string;
}

const INVALID_INPUT = 'Please correct the highlighted fields';

export class CustomerService {
  private runner: TransactionRunner;

  constructor(
    private unitOfWork: UnitOfWork,
    policy: TransactionPolicy = transactionOptionsFromEnv().policy,
    private errors: ErrorHandlingService = new ErrorHandlingService()
  ) {
    this.runner = new TransactionRunner(unitOfWork, policy);
  }

  registerCustomer(input: CustomerInput): Promise<CustomerSaveResult> {
    return runWithOperation('registerCustomer', ACTOR_TAGS.POS_USER, async () => {
      const parsed = CustomerInputSchema.safeParse(input);
      if (!parsed.success) {
        return { success: false, message: INVALID_INPUT, errors: parsed.error.issues.map((i) => i.message) };
      }

      try {
        const customer = await this.runner.run(ACTOR_TAGS.POS_USER, async (scope) => {
          await this.assertUnique(scope, parsed.data);
          return scope.customers.create({
            name: parsed.data.name,
            phone: parsed.data.phone ?? null,
            address: parsed.data.address ?? null,
          });
        });

        operationLogger({ customerId: customer.id }).info('Customer registered');
        return { success: true, customer, message: `Customer ${customer.name} saved` };
      } catch (error) {
        return this.failed(error, 'registerCustomer');
      }
    });
  }

  updateCustomer(id: string, input: CustomerInput): Promise<CustomerSaveResult> {
    return runWithOperation('updateCustomer', ACTOR_TAGS.POS_USER, async () => {
      const parsed = CustomerInputSchema.safeParse(input);
      if (!parsed.success) {
        return { success: false, message: INVALID_INPUT, errors: parsed.error.issues.map((i) => i.message) };
      }

      try {
        const customer = await this.runner.run(ACTOR_TAGS.POS_USER, async (scope) => {
          await this.requireCustomer(scope, id);
          await this.assertUnique(scope, parsed.data, id);
          return scope.customers.update(id, {
            name: parsed.data.name,
            phone: parsed.data.phone ?? null,
            address: parsed.data.address ?? null,
          });
        });

        return { success: true, customer, message: `Customer ${customer.name} updated` };
      } catch (error) {
        return this.failed(error, 'updateCustomer');
      }
    });
  }

  deactivateCustomer(id: string): Promise<CustomerRemovalResult> {
    return runWithOperation<Promise<CustomerRemovalResult>>('deactivateCustomer', ACTOR_TAGS.POS_USER, async () => {
      try {
        const customer = await this.runner.run(ACTOR_TAGS.POS_USER, async (scope) => {
          await this.requireCustomer(scope, id);
          return scope.customers.update(id, { isActive: false });
        });
        return { success: true, outcome: 'deactivated', message: `Customer ${customer.name} deactivated` };
      } catch (error) {
        const report = this.errors.handle(error, 'deactivateCustomer');
        return { success: false, message: report.userMessage, errorId: report.errorId };
      }
    });
  }

  /**
   * Hard delete only when no invoice or payment references the customer;
   * otherwise the customer is deactivated.
   */
  deleteCustomer(id: string): Promise<CustomerRemovalResult> {
    return runWithOperation('deleteCustomer', ACTOR_TAGS.POS_USER, async () => {
      try {
        const { customer, outcome } = await this.runner.run(ACTOR_TAGS.POS_USER, async (scope) => {
          const customer = await this.requireCustomer(scope, id);
          if (await scope.customers.hasTransactions(id)) {
            await scope.customers.update(id, { isActive: false });
            return { customer, outcome: 'deactivated' as const };
          }
          await scope.customers.delete(id);
          return { customer, outcome: 'deleted' as const };
        });

        return { success: true, outcome, message: `Customer ${customer.name} ${outcome}` };
      } catch (error) {
        const report = this.errors.handle(error, 'deleteCustomer');
        return { success: false, message: report.userMessage, errorId: report.errorId };
      }
    });
  }

  listActiveCustomers(filter: CustomerFilter, page: PageRequest): Promise<Page<Customer>> {
    return this.unitOfWork.stores.customers.findActive(filter, page);
  }

  /**
   * Save whatever the validation pipeline holds, once its final
   * re-validation pass allows it.
   */
  async submitForm(pipeline: CustomerValidationPipeline): Promise<CustomerSaveResult> {
    if (!(await pipeline.validateForSubmit())) {
      return { success: false, message: INVALID_INPUT, errors: pipeline.getState().errorMessages };
    }

    pipeline.setSaving(true);
    try {
      const values = pipeline.values();
      const editingId = pipeline.getState().editingCustomerId;
      return editingId
        ? await this.updateCustomer(editingId, values)
        : await this.registerCustomer(values);
    } finally {
      pipeline.setSaving(false);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  private async requireCustomer(scope: LedgerStores, id: string): Promise<Customer> {
    const customer = await scope.customers.getById(id);
    if (!customer) {
      throw new NotFoundError('customer', id);
    }
    return customer;
  }

  private async assertUnique(
    scope: LedgerStores,
    input: ParsedCustomerInput,
    excludeId?: string
  ): Promise<void> {
    if (await scope.customers.getByName(input.name, excludeId)) {
      throw new PreconditionError(FIELD_MESSAGES.NAME_TAKEN, 'DUPLICATE_NAME');
    }
    if (input.phone && (await scope.customers.getByPhone(input.phone, excludeId))) {
      throw new PreconditionError(FIELD_MESSAGES.PHONE_TAKEN, 'DUPLICATE_PHONE');
    }
  }

  private failed(error: unknown, context: string): CustomerSaveResult {
    const report = this.errors.handle(error, context);
    return { success: false, message: report.userMessage, errorId: report.errorId };
  }
}
