import type { Dataset, Grid2D, ModelId, ModelRegistry, ParameterRecord } from '../../types/dro';
import { createDataset } from './dataset';
import { createGrid } from './grid';
import { DEFAULT_MODEL_REGISTRY } from './modelRegistry';
import { modelExchange } from './pkModels';

export type SyntheticDroOptions = {
  nx?: number;
  ny?: number;
  nt?: number;
  /** Sampling interval in minutes. */
  dt?: number;
  /** Standard deviation of additive Gaussian noise on the measured curves. */
  noise?: number;
  /** Width of the border where every model's fit is marked invalid. */
  invalidBorder?: number;
  /** Per-model probability of an isolated non-converged fit. */
  invalidFraction?: number;
  seed?: number;
  registry?: ModelRegistry;
};

/** Small deterministic PRNG (mulberry32). */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function gaussian(rng: () => number): number {
  // Box-Muller; guard against log(0).
  const u = Math.max(rng(), 1e-12);
  const v = rng();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Gamma-variate first pass plus a slowly washing-out recirculation plateau.
 * Bolus arrives at 0.5 min and peaks 0.15 min later.
 */
export function populationAif(time: Float64Array): Float64Array {
  const t0 = 0.5;
  const tpk = 0.15;
  const out = new Float64Array(time.length);
  for (let i = 0; i < time.length; i++) {
    const s = time[i] - t0;
    if (s <= 0) continue;
    const r = s / tpk;
    const bolus = 6 * r * r * Math.exp(2 * (1 - r));
    const plateau = 1.2 * (1 - Math.exp(-s / 0.3)) * Math.exp(-0.1 * s);
    out[i] = bolus + plateau;
  }
  return out;
}

type TruthParams = { Fp: number; PS: number; ve: number; vp: number };

function truthAt(x: number, y: number, nx: number, ny: number): TruthParams {
  const u = nx > 1 ? x / (nx - 1) : 0.5;
  const v = ny > 1 ? y / (ny - 1) : 0.5;
  return {
    Fp: 0.2 + 0.8 * u,
    PS: 0.02 + 0.18 * v,
    ve: 0.1 + 0.2 * v,
    vp: 0.02 + 0.08 * u,
  };
}

/** Parameters each model would report for tissue with the given exchange truth. */
function reportedParams(model: ModelId, truth: TruthParams): ParameterRecord {
  const extraction = 1 - Math.exp(-truth.PS / truth.Fp);
  const kt = truth.Fp * extraction;
  switch (model) {
    case 'exchange':
      return {
        ...truth,
        T: (truth.vp + truth.ve) / truth.Fp,
        Te: truth.ve / truth.PS,
        Tp: truth.vp / (truth.Fp + truth.PS),
      };
    case 'extendedtofts':
      return { Kt: kt, ve: truth.ve, vp: truth.vp, kep: kt / truth.ve };
    case 'uptake':
      return { Fp: truth.Fp, PS: truth.PS, vp: truth.vp };
    case 'tofts':
      // No plasma term: the vascular space is absorbed into ve.
      return { Kt: kt, ve: truth.ve + truth.vp, vp: 0 };
  }
}

function sumSquares(a: Float64Array, b: ArrayLike<number>): number {
  let acc = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    acc += d * d;
  }
  return acc;
}

/**
 * Deterministic Digital Reference Object: measured curves from the exchange
 * model plus noise, each model's reported parameters, and the RSS of every
 * model against the measured curves.
 */
export function createSyntheticDro(options: SyntheticDroOptions = {}): Dataset {
  const nx = options.nx ?? 24;
  const ny = options.ny ?? 24;
  const nt = options.nt ?? 60;
  const dt = options.dt ?? 0.1;
  const noise = options.noise ?? 0.002;
  const border = options.invalidBorder ?? 1;
  const invalidFraction = options.invalidFraction ?? 0.02;
  const registry = options.registry ?? DEFAULT_MODEL_REGISTRY;
  const rng = mulberry32(options.seed ?? 1);

  const time = new Float64Array(nt);
  for (let i = 0; i < nt; i++) time[i] = i * dt;
  const aif = populationAif(time);

  const concentration = { nx, ny, nt, data: new Float64Array(nx * ny * nt) };
  const fits = new Map<string, Map<string, Grid2D>>();
  const rss = new Map<string, Grid2D>();

  for (const id of registry.order) {
    const params = new Map<string, Grid2D>();
    for (const name of registry.get(id).parameterNames) params.set(name, createGrid(nx, ny, NaN));
    fits.set(id, params);
    rss.set(id, createGrid(nx, ny, NaN));
  }

  for (let y = 0; y < ny; y++) {
    for (let x = 0; x < nx; x++) {
      const truth = truthAt(x, y, nx, ny);
      const clean = modelExchange(time, aif, truth);
      const measured = new Float64Array(nt);
      for (let i = 0; i < nt; i++) measured[i] = clean[i] + noise * gaussian(rng);
      concentration.data.set(measured, (y * nx + x) * nt);

      const onBorder = x < border || y < border || x >= nx - border || y >= ny - border;
      if (onBorder) continue;

      for (const id of registry.order) {
        if (rng() < invalidFraction) continue;

        const spec = registry.get(id);
        const reported = reportedParams(id, truth);
        let curve: ArrayLike<number>;
        try {
          curve = spec.evaluate(time, aif, reported);
        } catch {
          // Leave the voxel as a non-converged fit.
          continue;
        }

        const params = fits.get(id);
        const rssGrid = rss.get(id);
        if (!params || !rssGrid) continue;
        for (const name of spec.parameterNames) {
          const grid = params.get(name);
          if (grid) grid.data[y * nx + x] = reported[name] ?? NaN;
        }
        rssGrid.data[y * nx + x] = sumSquares(measured, curve);
      }
    }
  }

  return createDataset({ time, aif, concentration, fits, rss }, registry);
}
