/**
 * Zod schemas for validating ledger exports read from disk and the
 * arguments passed to MCP tools and CLI commands.
 *
 * The ledger schemas mirror the interfaces in src/types/ledger.ts but use
 * .default() so partial exports don't crash the engine. Dates arrive as
 * YYYY-MM-DD (or full ISO 8601) strings and leave as local Dates.
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { INVOICE_STATUSES } from './types/ledger.js';
import { FORECAST_METHODS } from './insights/forecast/forecast-engine.js';
import { LedgerContractError } from './insights/errors.js';

const DateSchema = z
  .string()
  .refine((value) => isValid(parseISO(value)), { message: 'Expected a YYYY-MM-DD date' })
  .transform((value) => parseISO(value));

const MoneySchema = z.number().finite();
const RefSchema = z.string().min(1).nullable().default(null);

const LineItemSchema = z.object({
  productId: RefSchema,
  description: z.string().default(''),
  quantity: z.number().finite().default(1),
  unitPrice: MoneySchema.default(0),
  discount: MoneySchema.default(0),
  taxRate: z.number().min(0).default(0),
});

const TransactionFields = {
  id: z.string().min(1),
  date: DateSchema,
  effectiveAmountUSD: MoneySchema,
  lineItems: z.array(LineItemSchema).default([]),
};

const SaleSchema = z.object({ ...TransactionFields, customerId: RefSchema });
const PurchaseSchema = z.object({ ...TransactionFields, supplierId: RefSchema });

const ReturnSchema = z.object({
  id: z.string().min(1),
  originalTransactionId: RefSchema,
  returnDate: DateSchema,
  items: z
    .array(z.object({ productId: RefSchema, quantity: z.number().finite().default(1) }))
    .default([]),
});

const InvoiceSchema = z
  .object({
    id: z.string().min(1),
    customerId: RefSchema,
    issueDate: DateSchema,
    dueDate: DateSchema,
    status: z.enum(INVOICE_STATUSES).default('sent'),
    balance: MoneySchema.default(0),
    effectiveBalanceUSD: MoneySchema.optional(),
  })
  .transform((invoice) => ({
    ...invoice,
    effectiveBalanceUSD: invoice.effectiveBalanceUSD ?? invoice.balance,
  }));

const InventoryItemSchema = z.object({
  productId: z.string().min(1),
  inStock: z.number().finite().default(0),
  reorderPoint: z.number().finite().default(0),
});

const ProductSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  unitPrice: MoneySchema.default(0),
  costPrice: MoneySchema.default(0),
});

const PartySchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
});

export const LedgerSchema = z.object({
  sales: z.array(SaleSchema).default([]),
  purchases: z.array(PurchaseSchema).default([]),
  returns: z.array(ReturnSchema).default([]),
  invoices: z.array(InvoiceSchema).default([]),
  inventory: z.array(InventoryItemSchema).default([]),
  products: z.array(ProductSchema).default([]),
  customers: z.array(PartySchema).default([]),
  suppliers: z.array(PartySchema).default([]),
});

export type LedgerInput = z.input<typeof LedgerSchema>;

// ─── Tool Arguments ─────────────────────────────────────────

/** Numbers are coerced so CLI flags and MCP arguments share one schema. */
export const AnalysisArgsSchema = z.object({
  ledgerPath: z.string().min(1).optional(),
  startDate: z.string().min(1).optional(),
  endDate: z.string().min(1).optional(),
  days: z.coerce.number().int().positive().max(3660).optional(),
});

export const ForecastArgsSchema = AnalysisArgsSchema.extend({
  periods: z.coerce.number().int().min(1).max(12).optional(),
  method: z.enum(FORECAST_METHODS).optional(),
});

export type AnalysisArgs = z.infer<typeof AnalysisArgsSchema>;
export type ForecastArgs = z.infer<typeof ForecastArgsSchema>;

/** Validate tool or command arguments; throws LedgerContractError naming the first bad field. */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new LedgerContractError(`Invalid arguments: ${describeIssue(result.error)}`);
  }
  return result.data;
}

/** First issue as "path.to.field: message". */
export function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return error.message;
  const where = issue.path.join('.');
  return where ? `${where}: ${issue.message}` : issue.message;
}
