/**
 * Settings Manager
 *
 * Reads ~/.ledgerlens/config.json and validates it with Zod. The file is
 * optional: without it every setting takes its default.
 */

import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { LedgerLensConfig } from './types.js';
import { resolvePaths } from './paths.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const percent = z.number().positive().max(100).optional();

const ThresholdConfigSchema = z
  .object({
    minimumTransactions: z.number().int().positive().optional(),
    significantChangePercent: percent,
    volumeChangePercent: percent,
    dayOfWeekMinSales: z.number().int().positive().optional(),
    dayOfWeekLiftRatio: z.number().min(1).optional(),
    seasonalMinMonths: z.number().int().min(2).max(12).optional(),
    seasonalLiftRatio: z.number().min(1).optional(),
    zScoreThreshold: z.number().positive().optional(),
    expenseBaselineMinWeeks: z.number().int().min(2).optional(),
    revenueBaselineMinPoints: z.number().int().min(2).optional(),
    largeTransactionZScore: z.number().positive().optional(),
    largeTransactionMinSales: z.number().int().min(2).optional(),
    returnRateMinSales: z.number().int().positive().optional(),
    returnRateMarginPoints: percent,
    inventoryRunwayDays: z.number().positive().optional(),
    inactiveCustomerDays: z.number().int().positive().optional(),
    overdueWarningDays: z.number().int().nonnegative().optional(),
    supplierConcentrationPercent: percent,
    customerConcentrationPercent: percent,
    lowMarginPercent: z.number().optional(),
    strongMarginPercent: z.number().optional(),
  })
  .optional();

const SettingsSchema = z.object({
  currency: z.string().length(3).default('USD'),
  locale: z.string().min(2).default('en-US'),
  thresholds: ThresholdConfigSchema,
});

const LedgerLensConfigSchema = z.object({
  version: z.literal(1),
  ledgerPath: z.string().min(1).optional(),
  settings: SettingsSchema.default({}),
});

export { LedgerLensConfigSchema };

// ─── Read ───────────────────────────────────────────────────

/**
 * Read and validate config from ~/.ledgerlens/config.json.
 * Returns null if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readConfig(): LedgerLensConfig | null {
  const filePath = resolvePaths().config;
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return LedgerLensConfigSchema.parse(parsed);
}

/** Config from disk, or defaults when none has been written yet. */
export function loadConfig(): LedgerLensConfig {
  return readConfig() ?? LedgerLensConfigSchema.parse({ version: 1 });
}
