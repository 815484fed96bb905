/**
 * Regression + Smoothing Forecaster
 *
 * Ordinary least squares on the period index blended with single
 * exponential smoothing. The smoother acts as a stabilizer: its result is
 * the current smoothed level, not a projection.
 */

import { linearRegression } from 'simple-statistics';
import { describeSeries } from '../statistics.js';

export const SMOOTHING_ALPHA = 0.3;

export interface LinearFit {
  slope: number;
  intercept: number;
}

/** Least-squares line through (i, values[i]). Null for fewer than two points. */
export function fitLine(values: readonly number[]): LinearFit | null {
  if (values.length < 2) return null;
  const { m, b } = linearRegression(values.map((y, x) => [x, y]));
  if (!Number.isFinite(m) || !Number.isFinite(b)) return null;
  return { slope: m, intercept: b };
}

/**
 * Regression forecast at index `values.length + ahead - 1`, clamped to ≥ 0.
 * Falls back to the last observation when no line can be fitted.
 */
export function linearRegressionForecast(values: readonly number[], ahead = 1): number {
  if (values.length === 0) return 0;
  const fit = fitLine(values);
  if (!fit) return values[values.length - 1]!;
  return Math.max(0, fit.slope * (values.length + ahead - 1) + fit.intercept);
}

/** Final smoothed level, seeded at the first value. */
export function exponentialSmoothing(values: readonly number[], alpha = SMOOTHING_ALPHA): number {
  if (values.length === 0) return 0;
  let level = values[0]!;
  for (let i = 1; i < values.length; i++) {
    level = alpha * values[i]! + (1 - alpha) * level;
  }
  return level;
}

/** Weight on the regression term: 0.6 with six or more points, else 0.4. */
export function regressionWeight(pointCount: number): number {
  return pointCount >= 6 ? 0.6 : 0.4;
}

export interface NextPeriodForecast {
  value: number;
  linear: number;
  smoothed: number;
  regressionWeight: number;
}

/**
 * Blend of regression and smoothing for the next period.
 * With fewer than two points the forecast is the last known value.
 */
export function forecastNextPeriod(values: readonly number[]): NextPeriodForecast {
  if (values.length < 2) {
    const last = values[values.length - 1] ?? 0;
    return { value: last, linear: last, smoothed: last, regressionWeight: 0 };
  }

  const linear = linearRegressionForecast(values);
  const smoothed = exponentialSmoothing(values);
  const weight = regressionWeight(values.length);
  return {
    value: linear * weight + smoothed * (1 - weight),
    linear,
    smoothed,
    regressionWeight: weight,
  };
}

export interface RegressionProjection {
  values: number[];
  lowerBounds: number[];
  upperBounds: number[];
}

/**
 * Multi-period projection: regression extended `h` steps, blended with
 * the flat smoothed level. Bounds are ±1.96 residual standard deviations
 * of the fitted line.
 */
export function projectRegression(values: readonly number[], periods: number): RegressionProjection {
  const smoothed = exponentialSmoothing(values);
  const weight = regressionWeight(values.length);
  const fit = fitLine(values);

  const residuals = fit ? values.map((y, x) => y - (fit.slope * x + fit.intercept)) : [];
  const spread = 1.96 * describeSeries(residuals).standardDeviation;

  const out: RegressionProjection = { values: [], lowerBounds: [], upperBounds: [] };
  for (let h = 1; h <= periods; h++) {
    const value = Math.max(
      0,
      linearRegressionForecast(values, h) * weight + smoothed * (1 - weight)
    );
    out.values.push(value);
    out.lowerBounds.push(Math.max(0, value - spread));
    out.upperBounds.push(value + spread);
  }
  return out;
}
