import type { Dataset, ModelId, ModelRegistry, SelectionState } from '../../types/dro';
import { DEFAULT_FIGURE_SIZE, VOXEL_MARGIN } from '../constants';
import { clampInt } from '../math';
import { OutOfRangeError, UnknownModelError, UnknownParameterError } from './errors';
import { isRecord } from './guards';

export interface VoxelBounds {
  /** Inclusive. */
  min: number;
  /** Exclusive. */
  max: number;
}

/**
 * Selectable range per axis: `[3, dim - 3)`. For grids too small to leave a
 * margin the range collapses to the middle voxel.
 */
export function voxelBounds(dim: number): VoxelBounds {
  const min = VOXEL_MARGIN;
  const max = dim - VOXEL_MARGIN;
  if (max > min) return { min, max };
  const mid = Math.max(0, Math.floor((dim - 1) / 2));
  return { min: mid, max: mid + 1 };
}

export function clampVoxelCoord(value: number, dim: number): number {
  const { min, max } = voxelBounds(dim);
  return clampInt(value, min, max - 1);
}

export function createDefaultSelection(dataset: Dataset, registry: ModelRegistry): SelectionState {
  const models = [...registry.order];
  const primary = models[0];
  if (!primary) throw new RangeError('createDefaultSelection: registry has no models');

  const names = registry.get(primary).parameterNames;

  return {
    models,
    param: names[names.length - 1],
    x: clampVoxelCoord(Math.round(dataset.nx / 2), dataset.nx),
    y: clampVoxelCoord(Math.round(dataset.ny / 2), dataset.ny),
    figureWidth: DEFAULT_FIGURE_SIZE.width,
    figureHeight: DEFAULT_FIGURE_SIZE.height,
  };
}

/**
 * Assert the selection invariants against a dataset and registry.
 * Violations are contract errors from the UI layer.
 */
export function validateSelection(state: SelectionState, dataset: Dataset, registry: ModelRegistry): void {
  if (state.models.length === 0) {
    throw new RangeError('selection: at least one model must be selected');
  }
  for (const m of state.models) {
    if (!registry.has(m)) throw new UnknownModelError(m);
  }

  const primary = state.models[0];
  if (!registry.get(primary).parameterNames.includes(state.param)) {
    throw new UnknownParameterError(primary, state.param);
  }

  const bx = voxelBounds(dataset.nx);
  const by = voxelBounds(dataset.ny);
  if (!Number.isInteger(state.x) || state.x < bx.min || state.x >= bx.max) {
    throw new OutOfRangeError(`selection: x=${state.x} outside [${bx.min}, ${bx.max})`);
  }
  if (!Number.isInteger(state.y) || state.y < by.min || state.y >= by.max) {
    throw new OutOfRangeError(`selection: y=${state.y} outside [${by.min}, ${by.max})`);
  }

  if (!isPositiveInt(state.figureWidth) || !isPositiveInt(state.figureHeight)) {
    throw new RangeError(
      `selection: figure size must be positive integers (got ${state.figureWidth}x${state.figureHeight})`
    );
  }
}

function isPositiveInt(v: number): boolean {
  return Number.isInteger(v) && v > 0;
}

/**
 * Replace the model set. If the new primary model lacks the current parameter,
 * fall back to that model's last parameter.
 */
export function withModels(state: SelectionState, models: readonly ModelId[], registry: ModelRegistry): SelectionState {
  const unique = models.filter((m, i) => models.indexOf(m) === i);
  const primary = unique[0];
  if (!primary) throw new RangeError('selection: at least one model must be selected');

  const names = registry.get(primary).parameterNames;
  const param = names.includes(state.param) ? state.param : names[names.length - 1];
  return { ...state, models: unique, param };
}

export function withParam(state: SelectionState, param: string, registry: ModelRegistry): SelectionState {
  const primary = state.models[0];
  if (!registry.get(primary).parameterNames.includes(param)) {
    throw new UnknownParameterError(primary, param);
  }
  return { ...state, param };
}

export function withVoxel(state: SelectionState, voxel: { x?: number; y?: number }, dataset: Dataset): SelectionState {
  return {
    ...state,
    x: voxel.x === undefined ? state.x : clampVoxelCoord(voxel.x, dataset.nx),
    y: voxel.y === undefined ? state.y : clampVoxelCoord(voxel.y, dataset.ny),
  };
}

export function withFigureSize(state: SelectionState, size: { width?: number; height?: number }): SelectionState {
  const width = size.width === undefined ? state.figureWidth : Math.max(1, Math.round(size.width));
  const height = size.height === undefined ? state.figureHeight : Math.max(1, Math.round(size.height));
  return { ...state, figureWidth: width, figureHeight: height };
}

/**
 * Turn an untrusted (e.g. persisted) value into a selection, or null when it is
 * malformed or fails validation against the current dataset.
 */
export function parseSelection(raw: unknown, dataset: Dataset, registry: ModelRegistry): SelectionState | null {
  if (!isRecord(raw)) return null;

  if (!Array.isArray(raw.models)) return null;
  const models: ModelId[] = [];
  for (const m of raw.models) {
    if (typeof m !== 'string' || !registry.has(m)) return null;
    models.push(m);
  }

  const { param, x, y, figureWidth, figureHeight } = raw;
  if (typeof param !== 'string') return null;
  if (typeof x !== 'number' || typeof y !== 'number') return null;
  if (typeof figureWidth !== 'number' || typeof figureHeight !== 'number') return null;

  const state: SelectionState = { models, param, x, y, figureWidth, figureHeight };
  try {
    validateSelection(state, dataset, registry);
  } catch {
    return null;
  }
  return state;
}
