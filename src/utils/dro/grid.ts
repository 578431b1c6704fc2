import type { Grid2D } from '../../types/dro';

export function createGrid(nx: number, ny: number, fill = 0): Grid2D {
  const data = new Float64Array(nx * ny);
  if (fill !== 0) data.fill(fill);
  return { nx, ny, data };
}

export function cloneGrid(grid: Grid2D): Grid2D {
  return { nx: grid.nx, ny: grid.ny, data: new Float64Array(grid.data) };
}

export function inGrid(grid: Pick<Grid2D, 'nx' | 'ny'>, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < grid.nx && y >= 0 && y < grid.ny;
}

/** Values that are neither NaN nor ±Infinity. */
export function finiteValues(values: ArrayLike<number>): number[] {
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (Number.isFinite(v)) out.push(v);
  }
  return out;
}
