// ─────────────────────────────────────────────────────────────────────────────
// Grids and volumes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Row-major 2D grid of float values.
 *
 * Indexing is `data[y * nx + x]`, so row 0 is the top display row.
 * `NaN` marks a voxel where the upstream fit did not converge.
 */
export interface Grid2D {
  nx: number;
  ny: number;
  data: Float64Array;
}

/** Measured tissue concentration curves, `data[(y * nx + x) * nt + t]`. */
export interface ConcentrationVolume {
  nx: number;
  ny: number;
  nt: number;
  data: Float64Array;
}

export interface Voxel {
  x: number;
  y: number;
}

/** Inclusive/exclusive color-scale limits: `[low, high]`. */
export type ColorBounds = readonly [number, number];

// ─────────────────────────────────────────────────────────────────────────────
// Models
// ─────────────────────────────────────────────────────────────────────────────

export type ModelId = 'exchange' | 'extendedtofts' | 'uptake' | 'tofts';

/** Fitted parameter values at one voxel, keyed by parameter name. */
export type ParameterRecord = Readonly<Record<string, number>>;

export type ModelEvaluator = (
  time: Float64Array,
  aif: Float64Array,
  params: ParameterRecord
) => ArrayLike<number>;

export interface ModelSpec {
  id: ModelId;
  label: string;
  description: string;
  /** Ordered, non-empty. The first entry doubles as the fit-validity flag. */
  parameterNames: readonly string[];
  evaluate: ModelEvaluator;
}

/** Models in canonical order (used for stacking and tie-breaking). */
export interface ModelRegistry {
  order: readonly ModelId[];
  get(id: ModelId): ModelSpec;
  has(id: string): id is ModelId;
}

// ─────────────────────────────────────────────────────────────────────────────
// Dataset
// ─────────────────────────────────────────────────────────────────────────────

export interface DatasetInput {
  time: Float64Array;
  aif: Float64Array;
  concentration: ConcentrationVolume;
  /** model -> parameter -> map */
  fits: ReadonlyMap<string, ReadonlyMap<string, Grid2D>>;
  /** model -> RSS map */
  rss: ReadonlyMap<string, Grid2D>;
}

export interface Dataset extends DatasetInput {
  nx: number;
  ny: number;
  nt: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Selection
// ─────────────────────────────────────────────────────────────────────────────

export interface SelectionState {
  /** Non-empty; the first model is the primary one for the parameter-map view. */
  models: readonly ModelId[];
  /** Must belong to the primary model. */
  param: string;
  x: number;
  y: number;
  figureWidth: number;
  figureHeight: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolver results
// ─────────────────────────────────────────────────────────────────────────────

export interface ResolvedParameterMap {
  model: ModelId;
  param: string;
  map: Grid2D;
  bounds: ColorBounds;
}

export interface ResolvedResidualMap {
  model: ModelId;
  map: Grid2D;
  bounds: ColorBounds;
}

export interface BestModelMap {
  nx: number;
  ny: number;
  /** Index into `models`, or BEST_MODEL_UNDEFINED. */
  categories: Int16Array;
  models: readonly ModelId[];
}
