/**
 * Compact numeric label for color bars and tooltips ("0.0005", "1.2e-6", "12.5").
 */
export function formatValue(value: number): string {
  if (!Number.isFinite(value)) return '—';
  if (value === 0) return '0';
  const abs = Math.abs(value);
  if (abs < 1e-4 || abs >= 1e4) return value.toExponential(1);
  return value
    .toPrecision(3)
    .replace(/(\.\d*?)0+$/, '$1')
    .replace(/\.$/, '');
}

export function formatVoxel(x: number, y: number): string {
  return `(x = ${x}, y = ${y})`;
}
