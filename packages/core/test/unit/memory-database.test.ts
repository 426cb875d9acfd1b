import { describe, it, expect, beforeEach } from 'vitest';
import { dec } from '../../src/money/decimal.js';
import type { InMemoryLedgerDatabase } from '../../src/stores/memory/memory-database.js';
import { createTestDatabase, debtOf, mockCustomer, mockDebtor } from './mocks.js';

describe('InMemoryLedgerDatabase', () => {
  let database: InMemoryLedgerDatabase;

  beforeEach(() => {
    database = createTestDatabase();
  });

  it('hides uncommitted writes from readers', async () => {
    const scope = await database.begin();
    await scope.customers.updateBalance(mockCustomer.id, dec(25));

    expect(await debtOf(database, mockCustomer.id)).toBe('0.00');
    expect((await scope.customers.getById(mockCustomer.id))?.totalDebt.toFixed(2)).toBe('25.00');

    await scope.saveChanges('POS_USER');

    expect(await debtOf(database, mockCustomer.id)).toBe('25.00');
  });

  it('discards everything on rollback', async () => {
    const scope = await database.begin();
    await scope.customers.updateBalance(mockCustomer.id, dec(25));
    await scope.rollback();

    expect(await debtOf(database, mockCustomer.id)).toBe('0.00');
    expect(database.auditLog).toHaveLength(0);
  });

  it('undoes only the failed savepoint', async () => {
    const scope = await database.begin();
    await scope.customers.updateBalance(mockCustomer.id, dec(5));

    await expect(
      scope.savepoint(async () => {
        await scope.customers.updateBalance(mockDebtor.id, dec(-100));
        throw new Error('stop');
      })
    ).rejects.toThrow('stop');
    await scope.saveChanges('POS_USER');

    expect(await debtOf(database, mockCustomer.id)).toBe('5.00');
    expect(await debtOf(database, mockDebtor.id)).toBe('100.00');
    expect(database.auditLog[0].changes).toHaveLength(1);
  });

  it('lets one unit of work run at a time', async () => {
    const first = await database.begin();
    let secondStarted = false;
    const second = database.begin().then((scope) => {
      secondStarted = true;
      return scope;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(secondStarted).toBe(false);

    await first.rollback();
    const scope = await second;
    expect(secondStarted).toBe(true);
    await scope.rollback();
  });

  it('refuses work on an ended scope', async () => {
    const scope = await database.begin();
    await scope.saveChanges('POS_USER');

    await expect(scope.saveChanges('POS_USER')).rejects.toThrow('Transaction scope has already ended');
  });

  it('matches names case-insensitively and phones ignoring separators', async () => {
    const { customers } = database.stores;

    expect((await customers.getByName('  green valley MARKET '))?.id).toBe(mockCustomer.id);
    expect((await customers.getByPhone('050-123-4567'))?.id).toBe(mockCustomer.id);
    expect(await customers.getByName('Green Valley Market', mockCustomer.id)).toBeNull();
  });

  it('pages active customers by debt', async () => {
    const page = await database.stores.customers.findActive(
      { withDebtOnly: true, sortBy: 'debtDesc' },
      { page: 1, pageSize: 10 }
    );

    expect(page.total).toBe(1);
    expect(page.items.map((customer) => customer.id)).toEqual([mockDebtor.id]);
  });
});
