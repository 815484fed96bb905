import { describe, it, expect } from 'vitest';
import { LedgerSnapshot } from './ledger-snapshot.js';
import type { LedgerContents } from './ledger-snapshot.js';
import { LedgerContractError } from '../insights/errors.js';
import { makeCustomer, makeProduct, makeSale, makeSupplier } from '../insights/test-fixtures.js';

function contents(overrides: Partial<LedgerContents> = {}): LedgerContents {
  return {
    sales: [],
    purchases: [],
    returns: [],
    invoices: [],
    inventory: [],
    products: [],
    customers: [],
    suppliers: [],
    ...overrides,
  };
}

describe('LedgerSnapshot', () => {
  it('looks up products, customers and suppliers by id', () => {
    const snapshot = new LedgerSnapshot(
      contents({
        products: [makeProduct({ id: 'P1', name: 'Mug' })],
        customers: [makeCustomer('C1', 'Acme Ltd')],
        suppliers: [makeSupplier('S1', 'Northwind')],
      })
    );

    expect(snapshot.getProduct('P1')?.name).toBe('Mug');
    expect(snapshot.getCustomer('C1')?.name).toBe('Acme Ltd');
    expect(snapshot.getSupplier('S1')?.name).toBe('Northwind');
    expect(snapshot.getProduct('P9')).toBeNull();
  });

  it('copies and freezes the collections', () => {
    const sales = [makeSale()];
    const snapshot = new LedgerSnapshot(contents({ sales }));

    sales.push(makeSale());

    expect(snapshot.sales).toHaveLength(1);
    expect(Object.isFrozen(snapshot.sales)).toBe(true);
  });

  it('rejects a missing collection', () => {
    const broken: LedgerContents = JSON.parse('{"sales":[]}');

    expect(() => new LedgerSnapshot(broken)).toThrow(LedgerContractError);
    expect(() => new LedgerSnapshot(broken)).toThrow('Ledger collection "purchases" is missing');
  });
});
