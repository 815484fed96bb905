import { describe, it, expect } from 'vitest';
import { resolveThresholds, DEFAULT_THRESHOLDS } from './thresholds.js';
import type { ThresholdConfig } from './thresholds.js';

describe('thresholds', () => {
  describe('DEFAULT_THRESHOLDS', () => {
    it('requires 5 transactions before analysing', () => {
      expect(DEFAULT_THRESHOLDS.minimumTransactions).toBe(5);
    });

    it('flags period-over-period changes of 15% or more', () => {
      expect(DEFAULT_THRESHOLDS.significantChangePercent).toBe(15);
      expect(DEFAULT_THRESHOLDS.volumeChangePercent).toBe(20);
    });

    it('uses a 2-sigma anomaly threshold and 3-sigma for single sales', () => {
      expect(DEFAULT_THRESHOLDS.zScoreThreshold).toBe(2);
      expect(DEFAULT_THRESHOLDS.largeTransactionZScore).toBe(3);
    });

    it('has the recommendation cut-offs', () => {
      expect(DEFAULT_THRESHOLDS.inactiveCustomerDays).toBe(60);
      expect(DEFAULT_THRESHOLDS.overdueWarningDays).toBe(30);
      expect(DEFAULT_THRESHOLDS.supplierConcentrationPercent).toBe(60);
      expect(DEFAULT_THRESHOLDS.customerConcentrationPercent).toBe(40);
      expect(DEFAULT_THRESHOLDS.lowMarginPercent).toBe(10);
      expect(DEFAULT_THRESHOLDS.strongMarginPercent).toBe(30);
    });
  });

  describe('resolveThresholds', () => {
    it('returns defaults when no overrides provided', () => {
      expect(resolveThresholds()).toEqual(DEFAULT_THRESHOLDS);
    });

    it('applies partial overrides while keeping other defaults', () => {
      const overrides: ThresholdConfig = {
        significantChangePercent: 25,
        inactiveCustomerDays: 90,
      };
      const result = resolveThresholds(overrides);

      expect(result.significantChangePercent).toBe(25);
      expect(result.inactiveCustomerDays).toBe(90);
      expect(result.zScoreThreshold).toBe(DEFAULT_THRESHOLDS.zScoreThreshold);
      expect(result.lowMarginPercent).toBe(DEFAULT_THRESHOLDS.lowMarginPercent);
    });

    it('returns a copy rather than the shared defaults', () => {
      const result = resolveThresholds();
      expect(result).not.toBe(DEFAULT_THRESHOLDS);
    });

    it('does not mutate DEFAULT_THRESHOLDS', () => {
      const original = { ...DEFAULT_THRESHOLDS };
      resolveThresholds({ minimumTransactions: 99 });
      expect(DEFAULT_THRESHOLDS).toEqual(original);
    });
  });
});
