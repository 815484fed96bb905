/**
 * Data Sufficiency Check
 *
 * Gates every analysis on a minimum number of in-range transactions.
 * Pure function — no I/O.
 */

import { differenceInCalendarMonths } from 'date-fns';
import type { CompanyData } from '../types/ledger.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import { isInRange } from '../orchestrator/date-range.js';
import type { ThresholdConfig } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';

export interface SufficiencyResult {
  hasSufficientData: boolean;
  message: string | null;
  transactionCount: number;
  /** Inclusive calendar months between the earliest and latest in-range transaction. */
  monthsOfData: number;
}

export function checkDataSufficiency(
  data: CompanyData,
  range: AnalysisDateRange,
  thresholds?: Required<ThresholdConfig>
): SufficiencyResult {
  const t = thresholds ?? DEFAULT_THRESHOLDS;
  const dates = [...data.sales, ...data.purchases]
    .map((tx) => tx.date)
    .filter((date) => isInRange(date, range));

  const count = dates.length;
  if (count < t.minimumTransactions) {
    return {
      hasSufficientData: false,
      message: `Need at least ${t.minimumTransactions} transactions for meaningful insights. Currently have ${count}.`,
      transactionCount: count,
      monthsOfData: 0,
    };
  }

  let min = dates[0]!;
  let max = dates[0]!;
  for (const date of dates) {
    if (date < min) min = date;
    if (date > max) max = date;
  }

  return {
    hasSufficientData: true,
    message: null,
    transactionCount: count,
    monthsOfData: differenceInCalendarMonths(max, min) + 1,
  };
}
