/**
 * Ledger Types
 *
 * Read-only view of a company's books as consumed by the insights engine.
 * Monetary amounts are already normalized to the reporting currency.
 */

export interface LineItem {
  productId: string | null;
  description: string;
  quantity: number;
  unitPrice: number;
  discount: number;
  taxRate: number;
}

/** Fields shared by sales and purchases. */
export interface Transaction {
  id: string;
  date: Date;
  /** Transaction total converted to USD by the currency collaborator. */
  effectiveAmountUSD: number;
  lineItems: LineItem[];
}

export interface Sale extends Transaction {
  customerId: string | null;
}

export interface Purchase extends Transaction {
  supplierId: string | null;
}

export interface ReturnItem {
  productId: string | null;
  quantity: number;
}

export interface SaleReturn {
  id: string;
  originalTransactionId: string | null;
  returnDate: Date;
  items: ReturnItem[];
}

export const INVOICE_STATUSES = [
  'draft',
  'pending',
  'sent',
  'viewed',
  'partial',
  'paid',
  'overdue',
  'cancelled',
] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export interface Invoice {
  id: string;
  customerId: string | null;
  issueDate: Date;
  dueDate: Date;
  status: InvoiceStatus;
  balance: number;
  effectiveBalanceUSD: number;
}

export interface InventoryItem {
  productId: string;
  inStock: number;
  reorderPoint: number;
}

export interface Product {
  id: string;
  name: string;
  unitPrice: number;
  costPrice: number;
}

export interface Customer {
  id: string;
  name: string;
}

export interface Supplier {
  id: string;
  name: string;
}

/**
 * Everything the engine reads. Lookups return null for unknown ids;
 * callers omit the name rather than fail.
 */
export interface CompanyData {
  readonly sales: readonly Sale[];
  readonly purchases: readonly Purchase[];
  readonly returns: readonly SaleReturn[];
  readonly invoices: readonly Invoice[];
  readonly inventory: readonly InventoryItem[];
  getProduct(id: string): Product | null;
  getCustomer(id: string): Customer | null;
  getSupplier(id: string): Supplier | null;
}

/** Line total after discount and tax. */
export function lineItemAmount(item: LineItem): number {
  return (item.quantity * item.unitPrice - item.discount) * (1 + item.taxRate);
}
