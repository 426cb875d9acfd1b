import { describe, it, expect, beforeEach } from 'vitest';
import { CustomerService } from '../../src/customers/customer.service.js';
import {
  CustomerValidationPipeline,
  databaseChecks,
} from '../../src/customers/validation-pipeline.js';
import type { InMemoryLedgerDatabase } from '../../src/stores/memory/memory-database.js';
import {
  createTestDatabase,
  createTransactionService,
  draftFor,
  lineItem,
  mockCustomer,
  mockDebtor,
} from './mocks.js';

describe('CustomerService', () => {
  let database: InMemoryLedgerDatabase;
  let service: CustomerService;

  beforeEach(() => {
    databaseChecks.reset();
    database = createTestDatabase();
    service = new CustomerService(database, { mode: 'explicit', retryCount: 0 });
  });

  describe('registerCustomer', () => {
    it('stores a trimmed customer with no debt', async () => {
      const result = await service.registerCustomer({ name: '  Riverside Farm  ', phone: '050 111 2222' });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Customer Riverside Farm saved');
      expect(result.customer?.name).toBe('Riverside Farm');
      expect(result.customer?.phone).toBe('050 111 2222');
      expect(result.customer?.address).toBeNull();
      expect(result.customer?.totalDebt.toNumber()).toBe(0);
      expect(database.auditLog[0].actorTag).toBe('POS_USER');
    });

    it('rejects a name already in use, ignoring case', async () => {
      const result = await service.registerCustomer({ name: 'green valley market' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('A customer with this name already exists');
    });

    it('rejects a phone already in use, ignoring separators', async () => {
      const result = await service.registerCustomer({ name: 'Riverside Farm', phone: '050-123-4567' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('This phone number is already registered');
    });

    it('returns field errors for invalid input', async () => {
      const result = await service.registerCustomer({ name: 'A', phone: 'call me' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Please correct the highlighted fields');
      expect(result.errors).toEqual([
        'Customer name must be at least 2 characters',
        'Invalid phone number format',
      ]);
    });
  });

  describe('updateCustomer', () => {
    it('lets a customer keep their own name and phone', async () => {
      const result = await service.updateCustomer(mockCustomer.id, {
        name: mockCustomer.name,
        phone: '050 123 4567',
        address: 'Market Street 4',
      });

      expect(result.success).toBe(true);
      expect(result.customer?.address).toBe('Market Street 4');
      expect(result.message).toBe('Customer Green Valley Market updated');
    });

    it('rejects taking another customer name', async () => {
      const result = await service.updateCustomer(mockCustomer.id, { name: mockDebtor.name });

      expect(result.message).toBe('A customer with this name already exists');
    });
  });

  describe('removal', () => {
    it('deletes a customer without history', async () => {
      const result = await service.deleteCustomer(mockCustomer.id);

      expect(result.outcome).toBe('deleted');
      expect(result.message).toBe('Customer Green Valley Market deleted');
      expect(await database.stores.customers.getById(mockCustomer.id)).toBeNull();
    });

    it('deactivates a customer with invoices instead of deleting', async () => {
      await createTransactionService(database).createInvoiceOnly(draftFor(), [lineItem()]);

      const result = await service.deleteCustomer(mockCustomer.id);

      expect(result.outcome).toBe('deactivated');
      expect((await database.stores.customers.getById(mockCustomer.id))?.isActive).toBe(false);
      expect(await database.stores.customers.countActive()).toBe(1);
    });

    it('lists active customers by name', async () => {
      await service.deactivateCustomer(mockDebtor.id);

      const page = await service.listActiveCustomers({}, { page: 1, pageSize: 20 });

      expect(page.items.map((customer) => customer.name)).toEqual(['Green Valley Market']);
    });
  });

  describe('submitForm', () => {
    it('saves what the validation pipeline holds', async () => {
      const pipeline = new CustomerValidationPipeline(database.stores.customers, {
        debounceMs: 0,
        settleTimeoutMs: 5000,
        lookupTimeoutMs: 5000,
        databaseChecks: true,
      });
      pipeline.setField('name', 'Riverside Farm');
      pipeline.setField('phone', '0509998888');

      const result = await service.submitForm(pipeline);

      expect(result.success).toBe(true);
      expect(result.customer?.phone).toBe('0509998888');
      expect(pipeline.getState().isSaving).toBe(false);
      expect(await database.stores.customers.countActive()).toBe(3);
    });

    it('refuses a form that fails re-validation', async () => {
      const pipeline = new CustomerValidationPipeline(database.stores.customers, {
        debounceMs: 0,
        settleTimeoutMs: 5000,
        lookupTimeoutMs: 5000,
        databaseChecks: true,
      });
      pipeline.setField('name', 'Hilltop Grocers');

      const result = await service.submitForm(pipeline);

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['A customer with this name already exists']);
      expect(await database.stores.customers.countActive()).toBe(2);
    });
  });
});
