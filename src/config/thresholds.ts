/**
 * Configurable Thresholds
 *
 * Defines every analysis threshold in one place.
 * Users can override any subset via config.json settings.thresholds.
 * Missing overrides fall back to defaults.
 */

export interface ThresholdConfig {
  minimumTransactions?: number;
  significantChangePercent?: number;
  volumeChangePercent?: number;
  dayOfWeekMinSales?: number;
  dayOfWeekLiftRatio?: number;
  seasonalMinMonths?: number;
  seasonalLiftRatio?: number;
  zScoreThreshold?: number;
  expenseBaselineMinWeeks?: number;
  revenueBaselineMinPoints?: number;
  largeTransactionZScore?: number;
  largeTransactionMinSales?: number;
  returnRateMinSales?: number;
  returnRateMarginPoints?: number;
  inventoryRunwayDays?: number;
  inactiveCustomerDays?: number;
  overdueWarningDays?: number;
  supplierConcentrationPercent?: number;
  customerConcentrationPercent?: number;
  lowMarginPercent?: number;
  strongMarginPercent?: number;
}

export const DEFAULT_THRESHOLDS: Required<ThresholdConfig> = {
  minimumTransactions: 5,
  significantChangePercent: 15,
  volumeChangePercent: 20,
  dayOfWeekMinSales: 14,
  dayOfWeekLiftRatio: 1.3,
  seasonalMinMonths: 6,
  seasonalLiftRatio: 1.25,
  zScoreThreshold: 2,
  expenseBaselineMinWeeks: 4,
  revenueBaselineMinPoints: 5,
  largeTransactionZScore: 3,
  largeTransactionMinSales: 5,
  returnRateMinSales: 10,
  returnRateMarginPoints: 3,
  inventoryRunwayDays: 14,
  inactiveCustomerDays: 60,
  overdueWarningDays: 30,
  supplierConcentrationPercent: 60,
  customerConcentrationPercent: 40,
  lowMarginPercent: 10,
  strongMarginPercent: 30,
};

/**
 * Merge user overrides onto defaults.
 * Returns a fully-resolved config with no optional fields.
 */
export function resolveThresholds(overrides?: ThresholdConfig): Required<ThresholdConfig> {
  if (!overrides) return { ...DEFAULT_THRESHOLDS };
  return { ...DEFAULT_THRESHOLDS, ...overrides };
}
