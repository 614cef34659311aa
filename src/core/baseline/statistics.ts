import { InsufficientDataError, OutOfRangeError } from '../../utils/errors.js';

export interface RobustCenter {
  center: number;
  /** Values left after IQR filtering. */
  usedCount: number;
}

const IQR_FENCE = 1.5;

function sortedCopy(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Linear-interpolated quantile of an ascending array, `q` in [0, 1]. */
export function quantileFromSorted(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    throw new InsufficientDataError('quantile', 1, 0);
  }
  const rank = (sorted.length - 1) * q;
  const low = Math.floor(rank);
  const high = Math.ceil(rank);
  const lowValue = sorted[low];
  const highValue = sorted[high];
  if (low === high) return lowValue;
  return lowValue + (highValue - lowValue) * (rank - low);
}

export function quantile(values: readonly number[], q: number): number {
  return quantileFromSorted(sortedCopy(values), q);
}

export function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new InsufficientDataError('mean', 1, 0);
  }
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function clip(value: number, low: number, high: number): number {
  return Math.min(high, Math.max(low, value));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Outlier-robust central tendency: drop values outside Q1 − 1.5·IQR … Q3 + 1.5·IQR,
 * take the median of what remains, then clip it into [lowBound, highBound].
 *
 * This is the only outlier-rejection routine in the project; estimators that
 * need a baseline call it rather than filtering on their own.
 */
export function robustCenter(
  values: readonly number[],
  lowBound = Number.NEGATIVE_INFINITY,
  highBound = Number.POSITIVE_INFINITY
): RobustCenter {
  if (lowBound > highBound) {
    throw new OutOfRangeError('bounds', [lowBound, highBound], 'low bound exceeds high bound');
  }
  for (const v of values) {
    if (!Number.isFinite(v)) {
      throw new OutOfRangeError('values', v, 'must be finite numbers');
    }
  }
  if (values.length === 0) {
    throw new InsufficientDataError('robust center', 1, 0);
  }

  const sorted = sortedCopy(values);
  const q1 = quantileFromSorted(sorted, 0.25);
  const q3 = quantileFromSorted(sorted, 0.75);
  const iqr = q3 - q1;
  const lowFence = q1 - IQR_FENCE * iqr;
  const highFence = q3 + IQR_FENCE * iqr;

  const kept = sorted.filter((v) => v >= lowFence && v <= highFence);
  if (kept.length === 0) {
    throw new InsufficientDataError('robust center', 1, 0);
  }

  return {
    center: clip(quantileFromSorted(kept, 0.5), lowBound, highBound),
    usedCount: kept.length,
  };
}
