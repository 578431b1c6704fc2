import type { ModelId, ModelRegistry, ModelSpec } from '../../types/dro';
import { UnknownModelError } from './errors';
import { modelExchange, modelExtendedTofts, modelTofts, modelUptake } from './pkModels';

/** Canonical order: used for stacking RSS maps and breaking ties. */
export const MODEL_ORDER: readonly ModelId[] = ['exchange', 'extendedtofts', 'uptake', 'tofts'];

export const MODEL_SPECS: Readonly<Record<ModelId, ModelSpec>> = {
  exchange: {
    id: 'exchange',
    label: '2CXM',
    description: 'Two compartment exchange model',
    parameterNames: ['Fp', 'PS', 've', 'vp', 'T', 'Te', 'Tp'],
    evaluate: modelExchange,
  },
  extendedtofts: {
    id: 'extendedtofts',
    label: 'Extended Tofts',
    description: 'Extended Tofts model',
    parameterNames: ['Kt', 've', 'vp', 'kep'],
    evaluate: modelExtendedTofts,
  },
  uptake: {
    id: 'uptake',
    label: 'CTUM',
    description: 'Compartmental tissue uptake model',
    parameterNames: ['Fp', 'PS', 'vp'],
    evaluate: modelUptake,
  },
  tofts: {
    id: 'tofts',
    label: 'Tofts',
    description: 'Standard Tofts model',
    parameterNames: ['Kt', 've', 'vp'],
    evaluate: modelTofts,
  },
};

export function createModelRegistry(
  specs: readonly ModelSpec[] = MODEL_ORDER.map((id) => MODEL_SPECS[id])
): ModelRegistry {
  const byId = new Map<ModelId, ModelSpec>();
  for (const spec of specs) {
    if (spec.parameterNames.length === 0) {
      throw new Error(`createModelRegistry: model ${spec.id} declares no parameters`);
    }
    if (byId.has(spec.id)) {
      throw new Error(`createModelRegistry: duplicate model ${spec.id}`);
    }
    byId.set(spec.id, spec);
  }

  const order = Object.freeze(specs.map((s) => s.id));

  return {
    order,
    get(id: ModelId): ModelSpec {
      const spec = byId.get(id);
      if (!spec) throw new UnknownModelError(id);
      return spec;
    },
    has(id: string): id is ModelId {
      return order.some((m) => m === id);
    },
  };
}

export const DEFAULT_MODEL_REGISTRY: ModelRegistry = createModelRegistry();
