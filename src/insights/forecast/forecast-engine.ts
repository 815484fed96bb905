/**
 * Forecast Engine
 *
 * Multi-period forecasts over a monthly series. Picks Holt-Winters,
 * spectral decomposition or a combination of decomposition and
 * regression + smoothing depending on the method asked for and how much
 * history there is. A failing method degrades to the next one instead of
 * propagating; the result records what was dropped.
 */

import type { ConfidenceLevel, SeasonalPattern } from '../types.js';
import { autoHoltWinters, trendDirection } from './holt-winters.js';
import type { HoltWintersResult } from './holt-winters.js';
import { detectSeasonLength } from './season-length.js';
import { spectralForecast } from './spectral-forecaster.js';
import { projectRegression } from './regression.js';
import { calculateConfidenceScore, confidenceLevel } from './confidence.js';

export const FORECAST_METHODS = ['auto', 'holt-winters', 'spectral', 'combined'] as const;
export type ForecastMethod = (typeof FORECAST_METHODS)[number];

/** Minimum series length for spectral and combined forecasts. */
export const ENSEMBLE_MIN_POINTS = 24;
/** Minimum series length for a seasonal Holt-Winters fit to be attempted directly. */
export const SEASONAL_MIN_POINTS = 12;
/** Confidence deducted when a method had to be replaced by its fallback. */
export const DEGRADED_PENALTY = 10;

export interface EnhancedForecastOptions {
  periods?: number;
  method?: ForecastMethod;
  historicalAccuracy?: number | null;
  /** Calendar month (0-11) of the first value. */
  startMonth?: number;
}

export interface EnhancedForecastResult {
  forecastedValues: number[];
  lowerBounds: number[];
  upperBounds: number[];
  seasonalPattern: SeasonalPattern;
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  methodUsed: string;
  dataPointsUsed: number;
  periodsForecasted: number;
  /** Methods that failed and were replaced by a fallback. */
  degradedMethods: string[];
}

interface MethodForecast {
  values: number[];
  lowerBounds: number[];
  upperBounds: number[];
  confidence: number;
  method: string;
}

export function generateEnhancedForecast(
  values: readonly number[],
  opts: EnhancedForecastOptions = {}
): EnhancedForecastResult {
  const periods = Math.max(1, opts.periods ?? 3);
  const accuracy = opts.historicalAccuracy ?? null;
  const n = values.length;

  if (n < 2) {
    const value = values[0] ?? 0;
    return {
      forecastedValues: new Array<number>(periods).fill(value),
      lowerBounds: new Array<number>(periods).fill(value),
      upperBounds: new Array<number>(periods).fill(value),
      seasonalPattern: emptyPattern('Insufficient data to detect seasonal patterns.'),
      confidenceScore: 0,
      confidenceLevel: 'low',
      methodUsed: 'Insufficient Data',
      dataPointsUsed: n,
      periodsForecasted: periods,
      degradedMethods: [],
    };
  }

  const method = selectMethod(opts.method ?? 'auto', n);
  const degraded: string[] = [];
  let forecast: MethodForecast;
  let pattern: SeasonalPattern;

  switch (method) {
    case 'spectral': {
      pattern = detectSeasonality(values, opts.startMonth);
      forecast = spectralOrFallback(values, periods, accuracy, opts.startMonth, degraded);
      break;
    }
    case 'combined': {
      const result = combinedForecast(values, periods, accuracy, opts.startMonth, degraded);
      forecast = result.forecast;
      pattern = result.pattern;
      break;
    }
    default: {
      const hw = runHoltWinters(values, periods, opts.startMonth);
      pattern = hw.seasonalPattern;
      forecast = holtWintersForecast(hw, values, accuracy);
    }
  }

  return {
    forecastedValues: forecast.values,
    lowerBounds: forecast.lowerBounds,
    upperBounds: forecast.upperBounds,
    seasonalPattern: pattern,
    confidenceScore: forecast.confidence,
    confidenceLevel: confidenceLevel(forecast.confidence),
    methodUsed: forecast.method,
    dataPointsUsed: n,
    periodsForecasted: periods,
    degradedMethods: degraded,
  };
}

/**
 * Seasonal profile of a monthly series via Holt-Winters.
 * Under a year of data there is nothing to detect.
 */
export function detectSeasonality(values: readonly number[], startMonth?: number): SeasonalPattern {
  if (values.length < SEASONAL_MIN_POINTS) {
    return emptyPattern('Insufficient data to detect seasonal patterns.');
  }
  return runHoltWinters(values, 1, startMonth).seasonalPattern;
}

/** Requested method, downgraded when the series is too short for it. */
export function selectMethod(requested: ForecastMethod, pointCount: number): Exclude<ForecastMethod, 'auto'> {
  switch (requested) {
    case 'auto':
      return pointCount >= ENSEMBLE_MIN_POINTS ? 'combined' : 'holt-winters';
    case 'spectral':
    case 'combined':
      return pointCount >= ENSEMBLE_MIN_POINTS ? requested : 'holt-winters';
    case 'holt-winters':
      return 'holt-winters';
  }
}

/**
 * 1 minus the mean relative gap between two forecasts, floored at 0.
 * Periods where both forecasts average to zero are skipped; with none
 * left there is nothing to agree on and the result is 0.
 */
export function methodAgreement(a: readonly number[], b: readonly number[]): number {
  let total = 0;
  let count = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const avg = (a[i]! + b[i]!) / 2;
    if (avg > 0) {
      total += Math.abs(a[i]! - b[i]!) / avg;
      count++;
    }
  }
  if (count === 0) return 0;
  return Math.max(0, 1 - total / count);
}

// ─── Methods ────────────────────────────────────────────────

function runHoltWinters(values: readonly number[], periods: number, startMonth?: number): HoltWintersResult {
  return autoHoltWinters(values, detectSeasonLength(values), periods, { startMonth });
}

/** Holt-Winters bounds are a flat ±10% band, widened to ±20% under 70 confidence. */
function holtWintersForecast(
  hw: HoltWintersResult,
  values: readonly number[],
  accuracy: number | null
): MethodForecast {
  const confidence = calculateConfidenceScore({
    values,
    seasonalPattern: hw.seasonalPattern,
    historicalAccuracy: accuracy,
  });
  const band = confidence >= 70 ? 0.1 : 0.2;
  return {
    values: hw.forecasts,
    lowerBounds: hw.forecasts.map((v) => Math.max(0, v * (1 - band))),
    upperBounds: hw.forecasts.map((v) => v * (1 + band)),
    confidence,
    method: hw.method,
  };
}

function spectralOrFallback(
  values: readonly number[],
  periods: number,
  accuracy: number | null,
  startMonth: number | undefined,
  degraded: string[]
): MethodForecast {
  try {
    const ssa = spectralForecast(values, periods);
    return {
      ...ssa,
      confidence: calculateConfidenceScore({ values, historicalAccuracy: accuracy }),
      method: 'Spectral Decomposition',
    };
  } catch {
    degraded.push('spectral');
    const fallback = holtWintersForecast(runHoltWinters(values, periods, startMonth), values, accuracy);
    return { ...fallback, confidence: Math.max(0, fallback.confidence - DEGRADED_PENALTY) };
  }
}

/**
 * Decomposition weighted 0.6 against regression + smoothing from 36
 * points on (0.5 below). Bounds take the wider of the two; agreement
 * between the methods adds up to 10 confidence points.
 */
function combinedForecast(
  values: readonly number[],
  periods: number,
  accuracy: number | null,
  startMonth: number | undefined,
  degraded: string[]
): { forecast: MethodForecast; pattern: SeasonalPattern } {
  const decomposition = spectralOrFallback(values, periods, accuracy, startMonth, degraded);
  const regression = projectRegression(values, periods);
  const regressionConfidence = calculateConfidenceScore({ values, historicalAccuracy: accuracy });

  const w = values.length >= 36 ? 0.6 : 0.5;
  const combined = decomposition.values.map((v, i) => v * w + (regression.values[i] ?? v) * (1 - w));
  const lowerBounds = combined.map((v, i) =>
    Math.min(decomposition.lowerBounds[i] ?? v * 0.8, regression.lowerBounds[i] ?? v * 0.8)
  );
  const upperBounds = combined.map((v, i) =>
    Math.max(decomposition.upperBounds[i] ?? v * 1.2, regression.upperBounds[i] ?? v * 1.2)
  );

  const base = (decomposition.confidence + regressionConfidence) / 2;
  const confidence =
    degraded.length > 0
      ? base
      : Math.min(100, base + methodAgreement(decomposition.values, regression.values) * 10);

  const label = degraded.length > 0 ? 'Holt-Winters' : 'Spectral';
  return {
    forecast: {
      values: combined,
      lowerBounds,
      upperBounds,
      confidence,
      method: `Combined (${label} + Regression)`,
    },
    pattern: detectSeasonality(values, startMonth),
  };
}

function emptyPattern(description: string): SeasonalPattern {
  return {
    seasonLength: 0,
    seasonalFactors: [],
    seasonalStrength: 0,
    trendDirection: trendDirection(0),
    trendSlope: 0,
    isMultiplicative: false,
    description,
  };
}
