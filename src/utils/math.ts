/**
 * Clamp a number to a range.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Clamp and truncate to an integer.
 */
export function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

/**
 * Normalize a value into [0, 1] given `[lo, hi]`. Degenerate ranges map to 0.
 */
export function normalize01(value: number, lo: number, hi: number): number {
  const span = hi - lo;
  if (!(span > 0)) return 0;
  return clamp((value - lo) / span, 0, 1);
}
