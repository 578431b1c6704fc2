import { useMemo } from 'react';
import type {
  BestModelMap,
  Dataset,
  ModelRegistry,
  ResolvedParameterMap,
  ResolvedResidualMap,
  SelectionState,
} from '../types/dro';
import type { CurveBundle } from '../utils/dro/curveComposer';
import { composeCurves } from '../utils/dro/curveComposer';
import { EmptyDistributionError } from '../utils/dro/errors';
import { resolveBestModelMap, resolveParameterMap, resolveResidualPanel } from '../utils/dro/mapResolver';
import { debugDroLog } from '../utils/debugDro';

export type ParameterMapView =
  | { status: 'ok'; result: ResolvedParameterMap }
  | { status: 'empty'; message: string };

/**
 * Derived views for the current selection snapshot. Only the inputs each view
 * depends on trigger a recompute; the best-model and RSS views depend on the
 * dataset alone.
 */
export function useResolvedViews(dataset: Dataset, registry: ModelRegistry, selection: SelectionState) {
  const primary = selection.models[0];
  const { param, x, y, models } = selection;

  const parameterMapView = useMemo<ParameterMapView>(() => {
    try {
      return { status: 'ok', result: resolveParameterMap(dataset, primary, param, { x, y }) };
    } catch (err) {
      // Lookup errors are contract violations and propagate.
      if (err instanceof EmptyDistributionError) {
        debugDroLog('parameter map empty', { model: primary, param });
        return { status: 'empty', message: `${primary}: no valid fits for ${param}` };
      }
      throw err;
    }
  }, [dataset, primary, param, x, y]);

  const curves = useMemo<CurveBundle>(
    () => composeCurves(dataset, registry, models, { x, y }),
    [dataset, registry, models, x, y]
  );

  const bestModel = useMemo<BestModelMap>(() => resolveBestModelMap(dataset, registry), [dataset, registry]);

  const residuals = useMemo<ResolvedResidualMap[]>(
    () => resolveResidualPanel(dataset, registry),
    [dataset, registry]
  );

  return { parameterMapView, curves, bestModel, residuals };
}
