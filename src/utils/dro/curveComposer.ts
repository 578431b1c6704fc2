import type { Dataset, ModelId, ModelRegistry, ParameterRecord, Voxel } from '../../types/dro';
import { CURVE_Y_PADDING } from '../constants';
import { finiteExtrema } from './colorScale';
import { parameterMap, timeSeriesAt } from './dataset';
import { ModelEvaluationError } from './errors';

export type FittedCurve =
  | { status: 'fitted'; values: Float64Array; parameters: ParameterRecord }
  | { status: 'skipped'; reason: 'invalid-fit'; parameters: ParameterRecord }
  | { status: 'failed'; error: ModelEvaluationError; parameters: ParameterRecord };

export interface CurveBundle {
  voxel: Voxel;
  time: Float64Array;
  observed: Float64Array;
  /** Insertion order follows the selection order. */
  fitted: Map<ModelId, FittedCurve>;
  /** Recommended y-axis range: padded extrema of the observed series. */
  yRange: readonly [number, number];
}

/**
 * `CURVE_Y_PADDING * [min, max]` of the observed series, scaled element-wise
 * (a negative minimum moves further down).
 */
export function observedYRange(observed: ArrayLike<number>): readonly [number, number] {
  const ext = finiteExtrema(observed);
  if (!ext) return [0, 1];
  const lo = CURVE_Y_PADDING * ext[0];
  const hi = CURVE_Y_PADDING * ext[1];
  // A flat zero curve would collapse the axis.
  return lo === hi ? [lo - 1, hi + 1] : [lo, hi];
}

export function readParameters(dataset: Dataset, registry: ModelRegistry, model: ModelId, voxel: Voxel): ParameterRecord {
  const names = registry.get(model).parameterNames;
  const record: Record<string, number> = {};
  for (const name of names) {
    const grid = parameterMap(dataset, model, name);
    record[name] = grid.data[voxel.y * grid.nx + voxel.x];
  }
  return record;
}

function evaluateModel(
  dataset: Dataset,
  registry: ModelRegistry,
  model: ModelId,
  parameters: ParameterRecord
): FittedCurve {
  const spec = registry.get(model);
  let raw: ArrayLike<number>;
  try {
    raw = spec.evaluate(dataset.time, dataset.aif, parameters);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { status: 'failed', error: new ModelEvaluationError(model, message, { cause: err }), parameters };
  }

  if (raw.length !== dataset.nt) {
    return {
      status: 'failed',
      error: new ModelEvaluationError(model, `evaluator returned ${raw.length} samples, expected ${dataset.nt}`),
      parameters,
    };
  }

  return { status: 'fitted', values: Float64Array.from(raw), parameters };
}

/**
 * Observed curve at `voxel` plus one reconstructed curve per selected model.
 *
 * A model whose first parameter is NaN at the voxel is `skipped`; an evaluator
 * failure is captured as `failed`. Neither stops the other models.
 */
export function composeCurves(
  dataset: Dataset,
  registry: ModelRegistry,
  models: readonly ModelId[],
  voxel: Voxel
): CurveBundle {
  const observed = timeSeriesAt(dataset, voxel.x, voxel.y);
  const fitted = new Map<ModelId, FittedCurve>();

  for (const model of models) {
    if (fitted.has(model)) continue;

    const parameters = readParameters(dataset, registry, model, voxel);
    const first = registry.get(model).parameterNames[0];
    if (Number.isNaN(parameters[first])) {
      fitted.set(model, { status: 'skipped', reason: 'invalid-fit', parameters });
      continue;
    }

    fitted.set(model, evaluateModel(dataset, registry, model, parameters));
  }

  return {
    voxel: { x: voxel.x, y: voxel.y },
    time: dataset.time,
    observed,
    fitted,
    yRange: observedYRange(observed),
  };
}
