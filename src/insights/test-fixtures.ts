/**
 * Test Fixtures
 *
 * Builders for ledger records used across the engine's tests.
 */

import type {
  Customer,
  InventoryItem,
  Invoice,
  LineItem,
  Product,
  Purchase,
  Sale,
  SaleReturn,
  Supplier,
} from '../types/ledger.js';
import { LedgerSnapshot } from '../ledger/ledger-snapshot.js';
import type { LedgerContents } from '../ledger/ledger-snapshot.js';

let seq = 0;
function nextId(prefix: string): string {
  seq += 1;
  return `${prefix}-${seq}`;
}

export function makeLineItem(overrides: Partial<LineItem> = {}): LineItem {
  return {
    productId: null,
    description: 'Item',
    quantity: 1,
    unitPrice: 100,
    discount: 0,
    taxRate: 0,
    ...overrides,
  };
}

export function makeSale(overrides: Partial<Sale> = {}): Sale {
  return {
    id: nextId('SAL'),
    date: new Date(2026, 0, 15),
    effectiveAmountUSD: 100,
    lineItems: [],
    customerId: null,
    ...overrides,
  };
}

export function makePurchase(overrides: Partial<Purchase> = {}): Purchase {
  return {
    id: nextId('PUR'),
    date: new Date(2026, 0, 15),
    effectiveAmountUSD: 100,
    lineItems: [],
    supplierId: null,
    ...overrides,
  };
}

export function makeReturn(overrides: Partial<SaleReturn> = {}): SaleReturn {
  return {
    id: nextId('RET'),
    originalTransactionId: null,
    returnDate: new Date(2026, 0, 15),
    items: [],
    ...overrides,
  };
}

export function makeInvoice(overrides: Partial<Invoice> = {}): Invoice {
  return {
    id: nextId('INV'),
    customerId: null,
    issueDate: new Date(2026, 0, 1),
    dueDate: new Date(2026, 0, 31),
    status: 'sent',
    balance: 500,
    effectiveBalanceUSD: 500,
    ...overrides,
  };
}

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    id: nextId('PRD'),
    name: 'Widget',
    unitPrice: 100,
    costPrice: 60,
    ...overrides,
  };
}

export function makeInventory(overrides: Partial<InventoryItem> = {}): InventoryItem {
  return { productId: 'PRD-0', inStock: 10, reorderPoint: 0, ...overrides };
}

export function makeCustomer(id: string, name: string): Customer {
  return { id, name };
}

export function makeSupplier(id: string, name: string): Supplier {
  return { id, name };
}

export function makeCompany(overrides: Partial<LedgerContents> = {}): LedgerSnapshot {
  return new LedgerSnapshot({
    sales: [],
    purchases: [],
    returns: [],
    invoices: [],
    inventory: [],
    products: [],
    customers: [],
    suppliers: [],
    ...overrides,
  });
}

/** One sale per day from `start` for `days` days, each for `amount`. */
export function dailySales(start: Date, days: number, amount: number): Sale[] {
  const out: Sale[] = [];
  for (let i = 0; i < days; i++) {
    const date = new Date(start.getFullYear(), start.getMonth(), start.getDate() + i);
    out.push(makeSale({ date, effectiveAmountUSD: amount }));
  }
  return out;
}
