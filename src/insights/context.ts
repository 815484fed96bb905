/**
 * Analysis Context
 *
 * Options every analyzer accepts, resolved once per call so that
 * "now", thresholds and currency formatting stay consistent across
 * sub-analyses.
 */

import type { ThresholdConfig } from '../config/thresholds.js';
import { resolveThresholds } from '../config/thresholds.js';
import type { MoneyFormat } from './money.js';
import { DEFAULT_MONEY_FORMAT, formatMoney } from './money.js';

export interface AnalysisOptions {
  /** Reference date for trailing windows and overdue checks. Defaults to the wall clock. */
  now?: Date;
  thresholds?: ThresholdConfig;
  money?: MoneyFormat;
  /** Mean accuracy (0-100) of past forecasts, when tracked. */
  historicalAccuracy?: number | null;
  signal?: AbortSignal;
}

export interface AnalysisContext {
  now: Date;
  t: Required<ThresholdConfig>;
  historicalAccuracy: number | null;
  formatCurrency: (amount: number) => string;
}

export function resolveContext(opts: AnalysisOptions = {}): AnalysisContext {
  const money = opts.money ?? DEFAULT_MONEY_FORMAT;
  return {
    now: opts.now ?? new Date(),
    t: resolveThresholds(opts.thresholds),
    historicalAccuracy: opts.historicalAccuracy ?? null,
    formatCurrency: (amount) => formatMoney(amount, money),
  };
}
