/**
 * Holt-Winters Forecasting
 *
 * Triple exponential smoothing (level, trend, season) in additive and
 * multiplicative form. Needs two full seasons; shorter series fall back to
 * simple exponential smoothing plus a first-to-last slope.
 */

import { sampleStandardDeviation, sampleVariance } from 'simple-statistics';
import type { SeasonalPattern, TrendDirection } from '../types.js';
import { mean } from '../statistics.js';
import { exponentialSmoothing } from './regression.js';

export type SeasonalMode = 'additive' | 'multiplicative';

export interface HoltWintersParams {
  alpha: number;
  beta: number;
  gamma: number;
}

export const DEFAULT_HW_PARAMS: HoltWintersParams = { alpha: 0.3, beta: 0.1, gamma: 0.2 };

export interface HoltWintersOptions {
  params?: HoltWintersParams;
  /** Calendar month (0-11) of the first value; used to name peak and trough months. */
  startMonth?: number;
}

export interface HoltWintersResult {
  forecasts: number[];
  seasonalPattern: SeasonalPattern;
  finalLevel: number;
  finalTrend: number;
  method: string;
}

/** Floor for divisors in the multiplicative recursion. */
const EPSILON = 0.0001;

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

export function holtWinters(
  values: readonly number[],
  seasonLength: number,
  periods: number,
  mode: SeasonalMode,
  opts: HoltWintersOptions = {}
): HoltWintersResult {
  if (values.length < seasonLength * 2) {
    return fallbackForecast(values, seasonLength, periods);
  }
  if (mode === 'multiplicative' && values.some((v) => v <= 0)) {
    return holtWinters(values, seasonLength, periods, 'additive', opts);
  }

  const { alpha, beta, gamma } = opts.params ?? DEFAULT_HW_PARAMS;
  const mult = mode === 'multiplicative';
  const L = seasonLength;

  const firstAvg = mean(values.slice(0, L));
  const secondAvg = mean(values.slice(L, 2 * L));
  const base = mult ? Math.max(firstAvg, EPSILON) : firstAvg;

  let level = base;
  let trend = (secondAvg - firstAvg) / L;
  const season = values
    .slice(0, L)
    .map((v) => (mult ? Math.max(v / base, EPSILON) : v - base));

  for (let t = 0; t < values.length; t++) {
    const y = values[t]!;
    const i = t % L;
    const s = season[i]!;
    const prevLevel = level;

    if (mult) {
      level = alpha * (y / Math.max(s, EPSILON)) + (1 - alpha) * (prevLevel + trend);
      trend = beta * (level - prevLevel) + (1 - beta) * trend;
      season[i] = gamma * (y / (Math.abs(level) < EPSILON ? EPSILON : level)) + (1 - gamma) * s;
    } else {
      level = alpha * (y - s) + (1 - alpha) * (prevLevel + trend);
      trend = beta * (level - prevLevel) + (1 - beta) * trend;
      season[i] = gamma * (y - level) + (1 - gamma) * s;
    }
  }

  const forecasts: number[] = [];
  for (let h = 1; h <= periods; h++) {
    const s = season[(values.length + h - 1) % L]!;
    const raw = mult ? (level + h * trend) * s : level + h * trend + s;
    forecasts.push(Math.max(0, raw));
  }

  // season[k] is the factor for every t with t % L === k.
  const strength = mult
    ? Math.min(1, mean(season.map((s) => Math.abs(s - 1))) * 5)
    : additiveStrength(season, values);

  return {
    forecasts,
    seasonalPattern: {
      seasonLength: L,
      seasonalFactors: [...season],
      seasonalStrength: strength,
      trendDirection: trendDirection(trend),
      trendSlope: trend,
      isMultiplicative: mult,
      description: describeSeason(season, L, strength, opts.startMonth),
    },
    finalLevel: level,
    finalTrend: trend,
    method: mult ? 'Holt-Winters Multiplicative' : 'Holt-Winters Additive',
  };
}

/**
 * Pick the seasonal form from the data: multiplicative when every value is
 * positive and the per-position coefficient of variation is roughly constant.
 */
export function autoHoltWinters(
  values: readonly number[],
  seasonLength: number,
  periods: number,
  opts: HoltWintersOptions = {}
): HoltWintersResult {
  if (values.length < seasonLength * 2) {
    return fallbackForecast(values, seasonLength, periods);
  }
  return holtWinters(values, seasonLength, periods, chooseSeasonalMode(values, seasonLength), opts);
}

export function chooseSeasonalMode(values: readonly number[], seasonLength: number): SeasonalMode {
  if (values.some((v) => v <= 0)) return 'additive';

  const cvs: number[] = [];
  for (let k = 0; k < seasonLength; k++) {
    const position = values.filter((_, t) => t % seasonLength === k);
    if (position.length < 2) continue;
    const m = mean(position);
    if (m > 0) cvs.push(sampleStandardDeviation(position) / m);
  }
  const spread = cvs.length >= 2 ? sampleStandardDeviation(cvs) : 0;
  return spread < 0.3 ? 'multiplicative' : 'additive';
}

export function trendDirection(slope: number): TrendDirection {
  if (slope > 0.01) return 'increasing';
  if (slope < -0.01) return 'decreasing';
  return 'stable';
}

// ─── Internals ──────────────────────────────────────────────

function additiveStrength(season: number[], values: readonly number[]): number {
  const dataVariance = values.length >= 2 ? sampleVariance([...values]) : 0;
  if (dataVariance <= 0) return 0;
  return Math.min(1, mean(season.map((s) => s * s)) / dataVariance);
}

function fallbackForecast(
  values: readonly number[],
  seasonLength: number,
  periods: number
): HoltWintersResult {
  const n = values.length;
  const level = exponentialSmoothing(values);
  const slope = n > 1 ? (values[n - 1]! - values[0]!) / (n - 1) : 0;

  const forecasts: number[] = [];
  for (let h = 1; h <= periods; h++) {
    forecasts.push(Math.max(0, level + h * slope));
  }

  return {
    forecasts,
    seasonalPattern: {
      seasonLength,
      seasonalFactors: [],
      seasonalStrength: 0,
      trendDirection: trendDirection(slope),
      trendSlope: slope,
      isMultiplicative: false,
      description: 'Insufficient data for seasonal analysis.',
    },
    finalLevel: level,
    finalTrend: slope,
    method: n === 0 ? 'No Data' : 'Simple Exponential Smoothing',
  };
}

function describeSeason(
  season: number[],
  L: number,
  strength: number,
  startMonth: number | undefined
): string {
  if (strength < 0.1) return 'No significant seasonal pattern detected.';

  let peak = 0;
  let trough = 0;
  season.forEach((s, i) => {
    if (s > season[peak]!) peak = i;
    if (s < season[trough]!) trough = i;
  });

  const degree = strength > 0.5 ? 'strong' : strength > 0.25 ? 'moderate' : 'mild';

  if (L === 12 && startMonth !== undefined) {
    const peakMonth = MONTHS[(startMonth + peak) % 12];
    const troughMonth = MONTHS[(startMonth + trough) % 12];
    return `A ${degree} yearly pattern detected. Peak in ${peakMonth}, lowest in ${troughMonth}.`;
  }
  return `A ${degree} ${L}-month cycle detected. Peak at month ${peak + 1} of the cycle, lowest at month ${trough + 1}.`;
}
