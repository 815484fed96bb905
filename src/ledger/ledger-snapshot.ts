/**
 * Ledger Snapshot
 *
 * In-memory CompanyData built once per load. Lookups are Map-backed;
 * collections are frozen copies so analysis can never mutate the books.
 */

import type {
  CompanyData,
  Customer,
  InventoryItem,
  Invoice,
  Product,
  Purchase,
  Sale,
  SaleReturn,
  Supplier,
} from '../types/ledger.js';
import { LedgerContractError } from '../insights/errors.js';

export interface LedgerContents {
  sales: Sale[];
  purchases: Purchase[];
  returns: SaleReturn[];
  invoices: Invoice[];
  inventory: InventoryItem[];
  products: Product[];
  customers: Customer[];
  suppliers: Supplier[];
}

const COLLECTIONS = [
  'sales',
  'purchases',
  'returns',
  'invoices',
  'inventory',
  'products',
  'customers',
  'suppliers',
] as const satisfies ReadonlyArray<keyof LedgerContents>;

export class LedgerSnapshot implements CompanyData {
  readonly sales: readonly Sale[];
  readonly purchases: readonly Purchase[];
  readonly returns: readonly SaleReturn[];
  readonly invoices: readonly Invoice[];
  readonly inventory: readonly InventoryItem[];

  private products: Map<string, Product>;
  private customers: Map<string, Customer>;
  private suppliers: Map<string, Supplier>;

  constructor(contents: LedgerContents) {
    for (const name of COLLECTIONS) {
      // Collections arrive from untyped JSON in the loader; catch holes early.
      if (!Array.isArray(contents[name])) {
        throw new LedgerContractError(`Ledger collection "${name}" is missing`);
      }
    }

    this.sales = Object.freeze([...contents.sales]);
    this.purchases = Object.freeze([...contents.purchases]);
    this.returns = Object.freeze([...contents.returns]);
    this.invoices = Object.freeze([...contents.invoices]);
    this.inventory = Object.freeze([...contents.inventory]);
    this.products = new Map(contents.products.map((p) => [p.id, p]));
    this.customers = new Map(contents.customers.map((c) => [c.id, c]));
    this.suppliers = new Map(contents.suppliers.map((s) => [s.id, s]));
  }

  getProduct(id: string): Product | null {
    return this.products.get(id) ?? null;
  }

  getCustomer(id: string): Customer | null {
    return this.customers.get(id) ?? null;
  }

  getSupplier(id: string): Supplier | null {
    return this.suppliers.get(id) ?? null;
  }
}
