import { describe, expect, it, vi } from 'vitest';
import { composeCurves, observedYRange, readParameters } from '../src/utils/dro/curveComposer';
import { createModelRegistry, MODEL_SPECS } from '../src/utils/dro/modelRegistry';
import { ModelEvaluationError, OutOfRangeError } from '../src/utils/dro/errors';
import type { ModelSpec } from '../src/types/dro';
import { buildDataset } from './droFixtures';

describe('composeCurves', () => {
  // 3x3x5 volume; at voxel (1,1) tofts has a valid fit and uptake did not converge.
  const registry = createModelRegistry([MODEL_SPECS.tofts, MODEL_SPECS.uptake]);
  const ds = buildDataset({
    nx: 3,
    ny: 3,
    nt: 5,
    fits: {
      tofts: { Kt: 0.3, ve: 0.5, vp: 0.02 },
      uptake: { Fp: NaN, PS: 0.1, vp: 0.05 },
    },
    rss: { tofts: 0.001, uptake: NaN },
    registry,
  });

  it('returns the observed series, a fitted tofts curve, and uptake skipped', () => {
    const bundle = composeCurves(ds, registry, ['tofts', 'uptake'], { x: 1, y: 1 });

    expect(Array.from(bundle.observed)).toEqual([110, 111, 112, 113, 114]);
    expect(bundle.time).toHaveLength(5);

    const tofts = bundle.fitted.get('tofts');
    expect(tofts?.status).toBe('fitted');
    if (tofts?.status === 'fitted') {
      expect(tofts.values).toHaveLength(5);
      expect(tofts.parameters.Kt).toBe(0.3);
      expect(tofts.values[0]).toBe(0);
    }

    const uptake = bundle.fitted.get('uptake');
    expect(uptake?.status).toBe('skipped');
  });

  it('follows the selection order', () => {
    const bundle = composeCurves(ds, registry, ['uptake', 'tofts'], { x: 1, y: 1 });
    expect([...bundle.fitted.keys()]).toEqual(['uptake', 'tofts']);
  });

  it('pads the y range from the observed series only', () => {
    const bundle = composeCurves(ds, registry, ['tofts'], { x: 1, y: 1 });
    expect(bundle.yRange[0]).toBeCloseTo(121);
    expect(bundle.yRange[1]).toBeCloseTo(125.4);
  });

  it('passes time, aif and the parameter record to the evaluator', () => {
    const evaluate = vi.fn(() => new Float64Array(5).fill(2));
    const spec: ModelSpec = { ...MODEL_SPECS.tofts, evaluate };
    const reg = createModelRegistry([spec]);

    const bundle = composeCurves(ds, reg, ['tofts'], { x: 2, y: 0 });

    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(evaluate).toHaveBeenCalledWith(ds.time, ds.aif, { Kt: 0.3, ve: 0.5, vp: 0.02 });
    const fit = bundle.fitted.get('tofts');
    expect(fit?.status === 'fitted' && Array.from(fit.values)).toEqual([2, 2, 2, 2, 2]);
  });

  it('captures an evaluator failure as a tagged ModelEvaluationError', () => {
    const failing: ModelSpec = {
      ...MODEL_SPECS.tofts,
      evaluate: () => {
        throw new Error('solver diverged');
      },
    };
    const reg = createModelRegistry([failing, MODEL_SPECS.uptake]);
    const okDs = buildDataset({
      nx: 3,
      ny: 3,
      nt: 5,
      fits: { tofts: { Kt: 0.3, ve: 0.5, vp: 0.02 }, uptake: { Fp: 0.5, PS: 0.1, vp: 0.05 } },
      rss: { tofts: 0, uptake: 0 },
    });

    const bundle = composeCurves(okDs, reg, ['tofts', 'uptake'], { x: 1, y: 1 });
    const fit = bundle.fitted.get('tofts');
    expect(fit?.status).toBe('failed');
    if (fit?.status === 'failed') {
      expect(fit.error).toBeInstanceOf(ModelEvaluationError);
      expect(fit.error.model).toBe('tofts');
      expect(fit.error.message).toBe('tofts: solver diverged');
    }
    expect(bundle.fitted.get('uptake')?.status).toBe('fitted');
  });

  it('rejects evaluator output of the wrong length', () => {
    const short: ModelSpec = { ...MODEL_SPECS.tofts, evaluate: () => [1, 2, 3] };
    const bundle = composeCurves(ds, createModelRegistry([short]), ['tofts'], { x: 1, y: 1 });
    const fit = bundle.fitted.get('tofts');
    expect(fit?.status === 'failed' && fit.error.message).toBe('tofts: evaluator returned 3 samples, expected 5');
  });

  it('fails for a voxel outside the grid', () => {
    expect(() => composeCurves(ds, registry, ['tofts'], { x: 3, y: 0 })).toThrow(OutOfRangeError);
  });
});

describe('readParameters', () => {
  it('reads every parameter the model declares', () => {
    const registry = createModelRegistry([MODEL_SPECS.uptake]);
    const ds = buildDataset({
      nx: 2,
      ny: 2,
      nt: 3,
      fits: { uptake: { Fp: [1, 2, 3, 4], PS: 0.1, vp: 0.05 } },
      rss: { uptake: 0 },
    });
    expect(readParameters(ds, registry, 'uptake', { x: 1, y: 1 })).toEqual({ Fp: 4, PS: 0.1, vp: 0.05 });
  });
});

describe('observedYRange', () => {
  it('scales both extrema by 1.1', () => {
    const [lo, hi] = observedYRange([-2, 0, 10]);
    expect(lo).toBeCloseTo(-2.2);
    expect(hi).toBeCloseTo(11);
  });

  it('widens a flat zero series', () => {
    expect(observedYRange([0, 0, 0])).toEqual([-1, 1]);
  });
});
