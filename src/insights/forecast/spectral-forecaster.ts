/**
 * Spectral Forecaster
 *
 * Singular spectrum analysis: embed the series in a lag matrix, keep the
 * leading eigen-components that carry 90% of its energy, reconstruct by
 * diagonal averaging and extend with the linear recurrence those components
 * imply.
 *
 * Throws ForecastMethodError when the series cannot be decomposed; callers
 * fall back to another method.
 */

import { EigenvalueDecomposition, Matrix } from 'ml-matrix';
import { ForecastMethodError } from '../errors.js';
import { describeSeries } from '../statistics.js';

const METHOD = 'Spectral';
const ENERGY_SHARE = 0.9;

export interface SpectralForecast {
  values: number[];
  lowerBounds: number[];
  upperBounds: number[];
  residualStd: number;
  window: number;
  components: number;
}

/** Embedding window: a quarter of the series, between 2 and 6. */
export function spectralWindow(pointCount: number): number {
  return Math.max(2, Math.min(6, Math.floor(pointCount / 4)));
}

export function spectralForecast(values: readonly number[], periods: number): SpectralForecast {
  if (values.some((v) => !Number.isFinite(v))) {
    throw new ForecastMethodError(METHOD, 'series contains non-finite values');
  }
  if (values.length < 4) {
    throw new ForecastMethodError(METHOD, `needs at least 4 points, got ${values.length}`);
  }

  const n = values.length;
  const L = spectralWindow(n);
  const K = n - L + 1;

  // Trajectory matrix: row i is the series shifted by i
  const trajectory = new Matrix(Array.from({ length: L }, (_, i) => values.slice(i, i + K)));
  const lagCovariance = trajectory.mmul(trajectory.transpose()).div(K);

  const decomposition = new EigenvalueDecomposition(lagCovariance, { assumeSymmetric: true });
  const order = decomposition.realEigenvalues
    .map((value, index) => ({ value, index }))
    .sort((a, b) => b.value - a.value);
  const total = order.reduce((s, e) => s + Math.max(e.value, 0), 0);
  if (!(total > 0)) {
    throw new ForecastMethodError(METHOD, 'series has no signal energy');
  }

  let r = 0;
  let captured = 0;
  while (r < L - 1 && captured < ENERGY_SHARE * total) {
    captured += Math.max(order[r]!.value, 0);
    r++;
  }
  const basis = decomposition.eigenvectorMatrix.subMatrixColumn(
    order.slice(0, Math.max(1, r)).map((e) => e.index)
  );

  const reconstructed = diagonalAverage(basis.mmul(basis.transpose().mmul(trajectory)), n);

  // Linear recurrence from the last coordinate of each kept component
  const last = basis.getRow(L - 1);
  const verticality = last.reduce((s, x) => s + x * x, 0);
  if (verticality >= 1 - 1e-9) {
    throw new ForecastMethodError(METHOD, 'recurrence is undefined for this decomposition');
  }
  const coefficients: number[] = [];
  for (let j = 0; j < L - 1; j++) {
    const row = basis.getRow(j);
    coefficients.push(row.reduce((s, x, c) => s + x * last[c]!, 0) / (1 - verticality));
  }

  const extended = [...reconstructed];
  for (let h = 0; h < periods; h++) {
    let next = 0;
    for (let j = 0; j < L - 1; j++) {
      next += coefficients[j]! * extended[extended.length - (L - 1) + j]!;
    }
    if (!Number.isFinite(next)) {
      throw new ForecastMethodError(METHOD, 'recurrence diverged');
    }
    extended.push(next);
  }

  const residualStd = describeSeries(values.map((v, t) => v - reconstructed[t]!)).standardDeviation;
  const spread = 1.96 * residualStd;
  const forecasts = extended.slice(n).map((v) => Math.max(0, v));

  return {
    values: forecasts,
    lowerBounds: forecasts.map((v) => Math.max(0, v - spread)),
    upperBounds: forecasts.map((v) => v + spread),
    residualStd,
    window: L,
    components: basis.columns,
  };
}

/** Map an L x K matrix back to a series of length n by averaging its anti-diagonals. */
function diagonalAverage(matrix: Matrix, n: number): number[] {
  const sums = new Array<number>(n).fill(0);
  const counts = new Array<number>(n).fill(0);

  for (let i = 0; i < matrix.rows; i++) {
    for (let m = 0; m < matrix.columns; m++) {
      sums[i + m] = sums[i + m]! + matrix.get(i, m);
      counts[i + m] = counts[i + m]! + 1;
    }
  }
  return sums.map((s, t) => s / counts[t]!);
}
