import type { BestModelMap, ColorBounds, Grid2D } from '../../types/dro';
import { normalize01 } from '../math';
import { BEST_MODEL_UNDEFINED } from './mapResolver';

export type Rgb = readonly [number, number, number];

// Viridis anchor colors at evenly spaced positions; intermediate values are interpolated.
const VIRIDIS_STOPS: readonly Rgb[] = [
  [68, 1, 84],
  [72, 40, 120],
  [62, 74, 137],
  [49, 104, 142],
  [38, 130, 142],
  [31, 158, 137],
  [53, 183, 121],
  [109, 205, 89],
  [180, 222, 44],
  [253, 231, 37],
];

/** Seaborn colorblind palette, in canonical model order. */
export const MODEL_COLORS: readonly Rgb[] = [
  [1, 115, 178],
  [222, 143, 5],
  [2, 158, 115],
  [213, 94, 0],
  [204, 120, 188],
  [202, 145, 97],
];

/** Drawn for NaN cells and the undefined best-model category. */
export const INVALID_COLOR: Rgb = [40, 40, 40];

export function viridis(t: number): Rgb {
  const n = VIRIDIS_STOPS.length - 1;
  const pos = Math.min(1, Math.max(0, t)) * n;
  const i = Math.min(n - 1, Math.floor(pos));
  const f = pos - i;
  const a = VIRIDIS_STOPS[i];
  const b = VIRIDIS_STOPS[i + 1];
  return [
    Math.round(a[0] + f * (b[0] - a[0])),
    Math.round(a[1] + f * (b[1] - a[1])),
    Math.round(a[2] + f * (b[2] - a[2])),
  ];
}

export function modelColor(index: number): Rgb {
  return MODEL_COLORS[((index % MODEL_COLORS.length) + MODEL_COLORS.length) % MODEL_COLORS.length];
}

export function rgbCss(color: Rgb): string {
  return `rgb(${color[0]}, ${color[1]}, ${color[2]})`;
}

/**
 * Convert a grid into RGBA bytes (row 0 first). Values are clipped to
 * `bounds`; non-finite cells get INVALID_COLOR.
 */
export function gridToRgba(grid: Grid2D, bounds: ColorBounds): Uint8ClampedArray {
  const rgba = new Uint8ClampedArray(grid.nx * grid.ny * 4);
  const [lo, hi] = bounds;
  for (let i = 0; i < grid.data.length; i++) {
    const v = grid.data[i];
    const c = Number.isFinite(v) ? viridis(normalize01(v, lo, hi)) : INVALID_COLOR;
    const o = i * 4;
    rgba[o] = c[0];
    rgba[o + 1] = c[1];
    rgba[o + 2] = c[2];
    rgba[o + 3] = 255;
  }
  return rgba;
}

export function categoriesToRgba(map: BestModelMap): Uint8ClampedArray {
  const rgba = new Uint8ClampedArray(map.nx * map.ny * 4);
  for (let i = 0; i < map.categories.length; i++) {
    const k = map.categories[i];
    const c = k === BEST_MODEL_UNDEFINED ? INVALID_COLOR : modelColor(k);
    const o = i * 4;
    rgba[o] = c[0];
    rgba[o + 1] = c[1];
    rgba[o + 2] = c[2];
    rgba[o + 3] = 255;
  }
  return rgba;
}
