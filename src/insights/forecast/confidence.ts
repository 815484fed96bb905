/**
 * Forecast Confidence
 *
 * Additive 0-100 score from four components: amount of data (≤35),
 * stability (≤25), seasonality (≤20) and tracked accuracy (≤20).
 */

import type { ConfidenceLevel, SeasonalPattern } from '../types.js';
import { clamp, coefficientOfVariation } from '../statistics.js';

export interface ConfidenceInput {
  values: readonly number[];
  seasonalPattern?: SeasonalPattern | null;
  /** Mean accuracy of past forecasts, 0-100. */
  historicalAccuracy?: number | null;
}

export function calculateConfidenceScore(input: ConfidenceInput): number {
  const n = input.values.length;
  let score = Math.min(35, n * 1.5);

  if (n >= 3) {
    const cv = coefficientOfVariation(input.values);
    if (cv < 0.1) score += 25;
    else if (cv < 0.3) score += 20;
    else if (cv < 0.5) score += 15;
    else if (cv < 0.8) score += 10;
    else score += 5;
  }

  const strength = input.seasonalPattern?.seasonalStrength ?? 0;
  if (strength > 0.1) {
    score += strength * 20;
  } else if (n >= 12) {
    score += 10;
  }

  const accuracy = input.historicalAccuracy ?? 0;
  if (accuracy > 0) score += (accuracy / 100) * 20;

  return clamp(score, 0, 100);
}

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 80) return 'high';
  if (score >= 50) return 'medium';
  return 'low';
}
