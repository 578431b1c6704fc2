import { describe, expect, it } from 'vitest';
import {
  clampVoxelCoord,
  createDefaultSelection,
  parseSelection,
  validateSelection,
  voxelBounds,
  withFigureSize,
  withModels,
  withParam,
  withVoxel,
} from '../src/utils/dro/selection';
import { createModelRegistry, DEFAULT_MODEL_REGISTRY, MODEL_SPECS } from '../src/utils/dro/modelRegistry';
import { OutOfRangeError, UnknownModelError, UnknownParameterError } from '../src/utils/dro/errors';
import type { SelectionState } from '../src/types/dro';
import { buildDataset } from './droFixtures';

const registry = DEFAULT_MODEL_REGISTRY;
const fits = Object.fromEntries(
  registry.order.map((id) => [id, Object.fromEntries(MODEL_SPECS[id].parameterNames.map((p) => [p, 1]))])
);
const rss = Object.fromEntries(registry.order.map((id) => [id, 0]));
const ds = buildDataset({ nx: 12, ny: 9, nt: 3, fits, rss, registry });

describe('voxelBounds', () => {
  it('leaves a 3-voxel margin on each side', () => {
    expect(voxelBounds(12)).toEqual({ min: 3, max: 9 });
    expect(voxelBounds(9)).toEqual({ min: 3, max: 6 });
  });

  it('collapses to the middle voxel on tiny grids', () => {
    expect(voxelBounds(5)).toEqual({ min: 2, max: 3 });
  });

  it('clamps coordinates into the range', () => {
    expect(clampVoxelCoord(0, 12)).toBe(3);
    expect(clampVoxelCoord(11, 12)).toBe(8);
    expect(clampVoxelCoord(5.7, 12)).toBe(5);
  });
});

describe('createDefaultSelection', () => {
  it('selects every model, the last parameter of the first, and the middle voxel', () => {
    const s = createDefaultSelection(ds, registry);
    expect(s.models).toEqual(['exchange', 'extendedtofts', 'uptake', 'tofts']);
    expect(s.param).toBe('Tp');
    // round(12 / 2) = 6, round(9 / 2) = 5
    expect(s.x).toBe(6);
    expect(s.y).toBe(5);
    expect(s.figureWidth).toBe(600);
    expect(s.figureHeight).toBe(400);
    expect(() => validateSelection(s, ds, registry)).not.toThrow();
  });
});

describe('validateSelection', () => {
  const base = createDefaultSelection(ds, registry);

  it('rejects voxels inside the margin', () => {
    expect(() => validateSelection({ ...base, x: 2 }, ds, registry)).toThrow(OutOfRangeError);
    expect(() => validateSelection({ ...base, y: 6 }, ds, registry)).toThrow(OutOfRangeError);
  });

  it('rejects a parameter the primary model does not have', () => {
    expect(() => validateSelection({ ...base, models: ['tofts'], param: 'Fp' }, ds, registry)).toThrow(
      UnknownParameterError
    );
  });

  it('rejects an empty model set and bad figure sizes', () => {
    expect(() => validateSelection({ ...base, models: [] }, ds, registry)).toThrow(RangeError);
    expect(() => validateSelection({ ...base, figureWidth: 0 }, ds, registry)).toThrow(RangeError);
  });
});

describe('selection updates', () => {
  const base = createDefaultSelection(ds, registry);

  it('return a new snapshot and leave the old one intact', () => {
    const next = withVoxel(base, { x: 4 }, ds);
    expect(next).not.toBe(base);
    expect(base.x).toBe(6);
    expect(next.x).toBe(4);
    expect(next.y).toBe(base.y);
  });

  it('clamp voxel updates into range', () => {
    expect(withVoxel(base, { x: 100, y: -4 }, ds)).toMatchObject({ x: 8, y: 3 });
  });

  it('keep the parameter when the new primary model has it', () => {
    const next = withModels(withParam(base, 'vp', registry), ['extendedtofts', 'tofts'], registry);
    expect(next.models).toEqual(['extendedtofts', 'tofts']);
    expect(next.param).toBe('vp');
  });

  it("switch to the new primary model's last parameter otherwise", () => {
    expect(withModels(base, ['extendedtofts'], registry).param).toBe('kep');
    expect(withModels(base, ['tofts'], registry).param).toBe('vp');
  });

  it('drop duplicate models and reject an empty set', () => {
    expect(withModels(base, ['uptake', 'uptake', 'tofts'], registry).models).toEqual(['uptake', 'tofts']);
    expect(() => withModels(base, [], registry)).toThrow(RangeError);
  });

  it('validate parameter changes against the primary model', () => {
    expect(withParam(base, 'Fp', registry).param).toBe('Fp');
    expect(() => withParam(base, 'Kt', registry)).toThrow(UnknownParameterError);
  });

  it('round figure sizes to positive integers', () => {
    expect(withFigureSize(base, { width: 812.4 })).toMatchObject({ figureWidth: 812, figureHeight: 400 });
    expect(withFigureSize(base, { height: -3 }).figureHeight).toBe(1);
  });
});

describe('parseSelection', () => {
  const valid: SelectionState = {
    models: ['uptake', 'exchange'],
    param: 'PS',
    x: 4,
    y: 4,
    figureWidth: 700,
    figureHeight: 500,
  };

  it('accepts a well-formed stored selection', () => {
    expect(parseSelection(JSON.parse(JSON.stringify(valid)), ds, registry)).toEqual(valid);
  });

  it('rejects unknown models, wrong types and out-of-range voxels', () => {
    expect(parseSelection({ ...valid, models: ['mystery'] }, ds, registry)).toBeNull();
    expect(parseSelection({ ...valid, x: '4' }, ds, registry)).toBeNull();
    expect(parseSelection({ ...valid, y: 8 }, ds, registry)).toBeNull();
    expect(parseSelection(null, ds, registry)).toBeNull();
    expect(parseSelection([valid], ds, registry)).toBeNull();
  });
});

describe('UnknownModelError', () => {
  it('is raised for a model outside the registry', () => {
    const toftsOnly = createModelRegistry([MODEL_SPECS.tofts]);
    const s = createDefaultSelection(ds, registry);
    expect(() => validateSelection(s, ds, toftsOnly)).toThrow(UnknownModelError);
    expect(() => validateSelection({ ...s, models: ['tofts'], param: 'Kt' }, ds, toftsOnly)).not.toThrow();
  });
});
