import type { ColorBounds, Grid2D } from '../../types/dro';
import { PARAMETER_MAP_QUANTILE } from '../constants';
import { EmptyDistributionError } from './errors';
import { finiteValues } from './grid';

/**
 * Sample quantile with linear interpolation between order statistics
 * (h = (n - 1) * p). `sorted` must be ascending and non-empty.
 */
export function quantileSorted(sorted: readonly number[], p: number): number {
  const n = sorted.length;
  if (n === 0) throw new EmptyDistributionError();
  if (!(p >= 0 && p <= 1)) throw new RangeError(`quantile: p must be in [0, 1] (got ${p})`);

  const h = (n - 1) * p;
  const lo = Math.floor(h);
  const hi = Math.min(n - 1, lo + 1);
  const frac = h - lo;
  return sorted[lo] + frac * (sorted[hi] - sorted[lo]);
}

/** Quantile over the finite entries only; NaN/±Infinity are ignored. */
export function finiteQuantile(values: ArrayLike<number>, p: number): number {
  const finite = finiteValues(values);
  if (finite.length === 0) throw new EmptyDistributionError();
  finite.sort((a, b) => a - b);
  return quantileSorted(finite, p);
}

/**
 * Color bounds for a parameter map: `[0, q90]` of the finite entries.
 * Throws EmptyDistributionError when the map has no finite entries.
 */
export function computeColorBounds(grid: Grid2D, p: number = PARAMETER_MAP_QUANTILE): ColorBounds {
  return [0, finiteQuantile(grid.data, p)];
}

/** `[min, max]` of the finite entries, or null when there are none. */
export function finiteExtrema(values: ArrayLike<number>): [number, number] | null {
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (!Number.isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return min <= max ? [min, max] : null;
}
