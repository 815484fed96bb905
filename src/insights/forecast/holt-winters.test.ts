import { describe, it, expect } from 'vitest';
import { autoHoltWinters, chooseSeasonalMode, holtWinters, trendDirection } from './holt-winters.js';

/** Two identical years: January at half, December at double the rest. */
function twoYears(): number[] {
  const factors = [0.5, 0.8, 0.8, 0.8, 0.8, 0.8, 0.8, 0.8, 0.8, 0.8, 0.8, 2.0];
  return [...factors, ...factors].map((f) => 1000 * f);
}

describe('holtWinters', () => {
  it('reproduces a stable multiplicative year', () => {
    const result = holtWinters(twoYears(), 12, 12, 'multiplicative', { startMonth: 0 });

    expect(result.method).toBe('Holt-Winters Multiplicative');
    expect(result.forecasts[0]).toBeCloseTo(500, 6);
    expect(result.forecasts[1]).toBeCloseTo(800, 6);
    expect(result.forecasts[11]).toBeCloseTo(2000, 6);
    expect(result.seasonalPattern).toMatchObject({
      seasonLength: 12,
      seasonalStrength: 1,
      trendDirection: 'stable',
      isMultiplicative: true,
      description: 'A strong yearly pattern detected. Peak in December, lowest in January.',
    });
  });

  it('names months from the series start', () => {
    // Same data starting in July: position 11 is June, position 0 is July.
    const result = holtWinters(twoYears(), 12, 1, 'multiplicative', { startMonth: 6 });

    expect(result.seasonalPattern.description).toBe(
      'A strong yearly pattern detected. Peak in June, lowest in July.'
    );
  });

  it('describes shorter cycles by position', () => {
    const values = [100, 100, 400, 100, 100, 400, 100, 100, 400];
    const result = holtWinters(values, 3, 1, 'multiplicative');

    expect(result.seasonalPattern.description).toMatch(
      /^A strong 3-month cycle detected\. Peak at month 3 of the cycle/
    );
  });

  it('switches to additive when a value is not positive', () => {
    const values = [0, 10, 0, 10, 0, 10];
    expect(holtWinters(values, 2, 1, 'multiplicative').method).toBe('Holt-Winters Additive');
  });

  it('falls back to smoothing plus slope below two seasons', () => {
    const result = holtWinters([100, 120, 140], 4, 2, 'additive');

    // level 100 → 106 → 116.2; slope (140 - 100) / 2
    expect(result.method).toBe('Simple Exponential Smoothing');
    expect(result.forecasts[0]).toBeCloseTo(136.2, 6);
    expect(result.forecasts[1]).toBeCloseTo(156.2, 6);
    expect(result.seasonalPattern.seasonalStrength).toBe(0);
    expect(result.seasonalPattern.trendDirection).toBe('increasing');
    expect(result.seasonalPattern.description).toBe('Insufficient data for seasonal analysis.');
  });

  it('reports no data for an empty series', () => {
    const result = holtWinters([], 12, 2, 'additive');

    expect(result.method).toBe('No Data');
    expect(result.forecasts).toEqual([0, 0]);
  });

  it('never forecasts below zero', () => {
    const falling = [900, 700, 800, 600, 700, 500, 600, 400, 500, 300, 400, 200];
    const result = holtWinters(falling, 2, 12, 'additive');

    for (const value of result.forecasts) {
      expect(value).toBeGreaterThanOrEqual(0);
    }
  });
});

describe('chooseSeasonalMode', () => {
  it('picks multiplicative when relative spread is constant per position', () => {
    expect(chooseSeasonalMode([100, 200, 300, 400, 110, 220, 330, 440], 4)).toBe('multiplicative');
  });

  it('picks additive when relative spread varies by position', () => {
    expect(chooseSeasonalMode([1, 100, 100, 100], 2)).toBe('additive');
  });

  it('picks additive when any value is zero', () => {
    expect(chooseSeasonalMode([0, 100, 100, 100], 2)).toBe('additive');
  });
});

describe('autoHoltWinters', () => {
  it('uses the detected form', () => {
    expect(autoHoltWinters(twoYears(), 12, 1).method).toBe('Holt-Winters Multiplicative');
  });

  it('falls back below two seasons', () => {
    expect(autoHoltWinters([100, 200], 12, 1).method).toBe('Simple Exponential Smoothing');
  });
});

describe('trendDirection', () => {
  it('uses a ±0.01 dead band', () => {
    expect(trendDirection(0.02)).toBe('increasing');
    expect(trendDirection(0.01)).toBe('stable');
    expect(trendDirection(-0.01)).toBe('stable');
    expect(trendDirection(-0.5)).toBe('decreasing');
  });
});
