import type {
  BestModelMap,
  Dataset,
  Grid2D,
  ModelId,
  ModelRegistry,
  ResolvedParameterMap,
  ResolvedResidualMap,
  Voxel,
} from '../../types/dro';
import { CROSSHAIR, RSS_COLOR_LIMIT } from '../constants';
import { computeColorBounds } from './colorScale';
import { parameterMap, residualMap } from './dataset';
import { cloneGrid, inGrid } from './grid';

/** Category emitted where every model's RSS is invalid. */
export const BEST_MODEL_UNDEFINED = -1;

function zeroIfInside(grid: Grid2D, x: number, y: number): void {
  if (!inGrid(grid, x, y)) return;
  grid.data[y * grid.nx + x] = 0;
}

/**
 * Zero an open cross around `voxel` in place: columns x-3..x-2 and x+2..x+3 on
 * row y, rows y-3..y-2 and y+2..y+3 on column x. Cells outside the grid are
 * skipped.
 */
export function applyCrosshair(grid: Grid2D, voxel: Voxel): Grid2D {
  const { x, y } = voxel;
  for (let d = CROSSHAIR.NEAR; d <= CROSSHAIR.FAR; d++) {
    zeroIfInside(grid, x - d, y);
    zeroIfInside(grid, x + d, y);
    zeroIfInside(grid, x, y - d);
    zeroIfInside(grid, x, y + d);
  }
  return grid;
}

/**
 * Parameter-map view: robust color bounds from the stored map, then a masked
 * copy with the crosshair at `voxel`. The stored map is never modified.
 */
export function resolveParameterMap(
  dataset: Dataset,
  model: ModelId,
  param: string,
  voxel: Voxel
): ResolvedParameterMap {
  const source = parameterMap(dataset, model, param);
  const bounds = computeColorBounds(source);
  const map = applyCrosshair(cloneGrid(source), voxel);
  return { model, param, map, bounds };
}

/**
 * Lowest-RSS categorical view over every registry model in canonical order,
 * independent of the analyst's selection.
 *
 * Invalid RSS counts as +Infinity. Ties go to the earlier model. A voxel with
 * no valid RSS at all is BEST_MODEL_UNDEFINED.
 */
export function resolveBestModelMap(dataset: Dataset, registry: ModelRegistry): BestModelMap {
  const models = registry.order;
  const stack = models.map((m) => residualMap(dataset, m).data);
  const { nx, ny } = dataset;
  const categories = new Int16Array(nx * ny).fill(BEST_MODEL_UNDEFINED);

  for (let i = 0; i < categories.length; i++) {
    let best = BEST_MODEL_UNDEFINED;
    let bestValue = Infinity;
    for (let k = 0; k < stack.length; k++) {
      const v = stack[k][i];
      if (Number.isNaN(v)) continue;
      // Strict < keeps the earlier model on ties; the first valid value always wins
      // over the empty state so +Infinity RSS still yields a category.
      if (best === BEST_MODEL_UNDEFINED || v < bestValue) {
        best = k;
        bestValue = v;
      }
    }
    categories[i] = best;
  }

  return { nx, ny, categories, models };
}

export function bestModelAt(map: BestModelMap, voxel: Voxel): ModelId | null {
  if (!inGrid(map, voxel.x, voxel.y)) return null;
  const k = map.categories[voxel.y * map.nx + voxel.x];
  return k === BEST_MODEL_UNDEFINED ? null : map.models[k];
}

/** Share of voxels won by each model, plus the undefined share. */
export function bestModelCounts(map: BestModelMap): { counts: number[]; undefinedCount: number } {
  const counts = map.models.map(() => 0);
  let undefinedCount = 0;
  for (const k of map.categories) {
    if (k === BEST_MODEL_UNDEFINED) undefinedCount++;
    else counts[k]++;
  }
  return { counts, undefinedCount };
}

/** RSS panel: one map per registry model on the fixed color scale. */
export function resolveResidualPanel(dataset: Dataset, registry: ModelRegistry): ResolvedResidualMap[] {
  return registry.order.map((model) => ({
    model,
    map: residualMap(dataset, model),
    bounds: [0, RSS_COLOR_LIMIT] as const,
  }));
}
