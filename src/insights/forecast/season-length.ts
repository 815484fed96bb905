/**
 * Season Length Detection
 *
 * Chooses among yearly, half-yearly, quarterly and four-month cycles by
 * comparing residual variance after removing a linear trend and per-position
 * means. A candidate needs at least two full cycles of data.
 */

import { fitLine } from './regression.js';

export const SEASON_CANDIDATES = [12, 6, 4, 3] as const;

/** Relative tolerance under which two candidates count as equally good. */
const TIE_TOLERANCE = 1e-9;

export function detectSeasonLength(values: readonly number[]): number {
  const n = values.length;
  const detrended = detrend(values);

  let best: { length: number; variance: number } | null = null;
  for (const length of SEASON_CANDIDATES) {
    if (n < length * 2) continue;
    const variance = residualVariance(detrended, length);
    if (
      best === null ||
      variance < best.variance - TIE_TOLERANCE * (1 + best.variance) ||
      (Math.abs(variance - best.variance) <= TIE_TOLERANCE * (1 + best.variance) &&
        length < best.length)
    ) {
      best = { length, variance };
    }
  }

  return best?.length ?? Math.max(2, Math.min(4, Math.floor(n / 2)));
}

function detrend(values: readonly number[]): number[] {
  const fit = fitLine(values);
  if (!fit) return [...values];
  return values.map((y, x) => y - (fit.slope * x + fit.intercept));
}

/** Sum of squared deviations from per-position means, over n - L degrees of freedom. */
function residualVariance(series: number[], length: number): number {
  const sums = new Array<number>(length).fill(0);
  const counts = new Array<number>(length).fill(0);
  series.forEach((v, t) => {
    const k = t % length;
    sums[k] = sums[k]! + v;
    counts[k] = counts[k]! + 1;
  });

  let squared = 0;
  series.forEach((v, t) => {
    const k = t % length;
    const d = v - sums[k]! / counts[k]!;
    squared += d * d;
  });
  return squared / (series.length - length);
}
