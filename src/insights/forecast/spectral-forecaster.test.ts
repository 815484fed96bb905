import { describe, it, expect } from 'vitest';
import { spectralForecast, spectralWindow } from './spectral-forecaster.js';
import { ForecastMethodError } from '../errors.js';

describe('spectralWindow', () => {
  it('is a quarter of the series between 2 and 6', () => {
    expect(spectralWindow(4)).toBe(2);
    expect(spectralWindow(16)).toBe(4);
    expect(spectralWindow(48)).toBe(6);
  });
});

describe('spectralForecast', () => {
  it('continues a constant series with one component', () => {
    const result = spectralForecast(new Array<number>(24).fill(100), 3);

    expect(result.window).toBe(6);
    expect(result.components).toBe(1);
    expect(result.values).toHaveLength(3);
    for (const value of result.values) {
      expect(value).toBeCloseTo(100, 6);
    }
    expect(result.residualStd).toBeCloseTo(0, 6);
  });

  it('extends a geometric series exactly', () => {
    // 16 growing by half each month; one component, recurrence x[t] = 1.5 * x[t-1]
    const series = Array.from({ length: 8 }, (_, t) => 16 * 1.5 ** t);
    const result = spectralForecast(series, 2);

    expect(result.window).toBe(2);
    expect(result.components).toBe(1);
    expect(result.values[0]).toBeCloseTo(410.0625, 6);
    expect(result.values[1]).toBeCloseTo(615.09375, 6);
    expect(result.residualStd).toBeCloseTo(0, 6);
  });

  it('keeps bounds around a non-negative forecast', () => {
    const series = Array.from({ length: 24 }, (_, t) => 100 + (t % 3) * 15 + t);
    const result = spectralForecast(series, 4);

    result.values.forEach((value, i) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(result.lowerBounds[i]).toBeLessThanOrEqual(value);
      expect(result.upperBounds[i]).toBeGreaterThanOrEqual(value);
      expect(result.lowerBounds[i]).toBeGreaterThanOrEqual(0);
    });
  });

  it('rejects non-finite values', () => {
    expect(() => spectralForecast([1, 2, Number.NaN, 4, 5, 6], 1)).toThrow(ForecastMethodError);
  });

  it('rejects series that are too short', () => {
    expect(() => spectralForecast([1, 2, 3], 1)).toThrow('Spectral: needs at least 4 points, got 3');
  });

  it('rejects a series with no energy', () => {
    expect(() => spectralForecast(new Array<number>(12).fill(0), 1)).toThrow(
      'Spectral: series has no signal energy'
    );
  });
});
