import type { ConcentrationVolume, Dataset, Grid2D, ModelRegistry } from '../../types/dro';
import { createDataset } from './dataset';
import { DatasetLoadError, DroError } from './errors';
import { isRecord } from './guards';

/**
 * JSON dataset boundary.
 *
 * Layout mirrors the source `.mat` file:
 *   t:    number[nt]
 *   ca:   number[nt]
 *   ct:   number[nx][ny][nt]
 *   fits: { [model]: { [param]: number[nx][ny] } }
 *   rss:  { [model]: number[nx][ny] }
 *
 * `null` entries decode to NaN (JSON has no NaN literal).
 */

function decodeNumber(v: unknown, path: string): number {
  if (v === null) return NaN;
  if (typeof v === 'number') return v;
  throw new DatasetLoadError(`${path}: expected a number or null`);
}

function decodeVector(v: unknown, path: string): Float64Array {
  if (!Array.isArray(v)) throw new DatasetLoadError(`${path}: expected an array`);
  const out = new Float64Array(v.length);
  for (let i = 0; i < v.length; i++) {
    out[i] = decodeNumber(v[i], `${path}[${i}]`);
  }
  return out;
}

function decodeGrid(v: unknown, path: string): Grid2D {
  if (!Array.isArray(v) || v.length === 0) {
    throw new DatasetLoadError(`${path}: expected a non-empty [x][y] array`);
  }
  const nx = v.length;
  const columns = v.map((col, x) => decodeVector(col, `${path}[${x}]`));
  const ny = columns[0].length;

  const data = new Float64Array(nx * ny);
  for (let x = 0; x < nx; x++) {
    const col = columns[x];
    if (col.length !== ny) {
      throw new DatasetLoadError(`${path}[${x}]: ragged array (expected ${ny}, got ${col.length})`);
    }
    for (let y = 0; y < ny; y++) {
      data[y * nx + x] = col[y];
    }
  }
  return { nx, ny, data };
}

function decodeVolume(v: unknown, path: string): ConcentrationVolume {
  if (!Array.isArray(v) || v.length === 0) {
    throw new DatasetLoadError(`${path}: expected a non-empty [x][y][t] array`);
  }
  const nx = v.length;
  let ny = -1;
  let nt = -1;
  let data = new Float64Array(0);

  for (let x = 0; x < nx; x++) {
    const plane: unknown = v[x];
    if (!Array.isArray(plane)) throw new DatasetLoadError(`${path}[${x}]: expected an array`);
    if (ny === -1) ny = plane.length;
    if (plane.length !== ny) {
      throw new DatasetLoadError(`${path}[${x}]: ragged array (expected ${ny}, got ${plane.length})`);
    }
    for (let y = 0; y < ny; y++) {
      const series = decodeVector(plane[y], `${path}[${x}][${y}]`);
      if (nt === -1) {
        nt = series.length;
        data = new Float64Array(nx * ny * nt);
      }
      if (series.length !== nt) {
        throw new DatasetLoadError(`${path}[${x}][${y}]: ragged array (expected ${nt}, got ${series.length})`);
      }
      data.set(series, (y * nx + x) * nt);
    }
  }

  return { nx, ny: Math.max(0, ny), nt: Math.max(0, nt), data };
}

function requireRecord(v: unknown, path: string): Record<string, unknown> {
  if (!isRecord(v)) throw new DatasetLoadError(`${path}: expected an object`);
  return v;
}

function requireKey(obj: Record<string, unknown>, key: string): unknown {
  if (!(key in obj)) throw new DatasetLoadError(`missing key "${key}"`);
  return obj[key];
}

/**
 * Decode and validate a parsed JSON document. Any failure, including shape
 * mismatches found by createDataset, surfaces as DatasetLoadError.
 */
export function parseDataset(raw: unknown, registry?: ModelRegistry): Dataset {
  const root = requireRecord(raw, 'dataset');

  const time = decodeVector(requireKey(root, 't'), 't');
  const aif = decodeVector(requireKey(root, 'ca'), 'ca');
  const concentration = decodeVolume(requireKey(root, 'ct'), 'ct');

  const fitsRaw = requireRecord(requireKey(root, 'fits'), 'fits');
  const fits = new Map<string, Map<string, Grid2D>>();
  for (const [model, paramsRaw] of Object.entries(fitsRaw)) {
    const params = new Map<string, Grid2D>();
    for (const [param, gridRaw] of Object.entries(requireRecord(paramsRaw, `fits.${model}`))) {
      params.set(param, decodeGrid(gridRaw, `fits.${model}.${param}`));
    }
    fits.set(model, params);
  }

  const rssRaw = requireRecord(requireKey(root, 'rss'), 'rss');
  const rss = new Map<string, Grid2D>();
  for (const [model, gridRaw] of Object.entries(rssRaw)) {
    rss.set(model, decodeGrid(gridRaw, `rss.${model}`));
  }

  try {
    return createDataset({ time, aif, concentration, fits, rss }, registry);
  } catch (err) {
    if (err instanceof DroError) {
      throw new DatasetLoadError(`invalid dataset: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

export function parseDatasetJson(text: string, registry?: ModelRegistry): Dataset {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DatasetLoadError('dataset is not valid JSON', { cause: err });
  }
  return parseDataset(raw, registry);
}

export async function loadDatasetFromUrl(
  url: string,
  registry?: ModelRegistry,
  init?: RequestInit
): Promise<Dataset> {
  const res = await fetch(url, init);
  if (!res.ok) {
    throw new DatasetLoadError(`Failed to fetch dataset (${res.status} ${res.statusText})`);
  }
  return parseDatasetJson(await res.text(), registry);
}

function encodeNumber(v: number): number | null {
  return Number.isFinite(v) ? v : null;
}

function encodeGrid(grid: Grid2D): (number | null)[][] {
  const out: (number | null)[][] = [];
  for (let x = 0; x < grid.nx; x++) {
    const col: (number | null)[] = [];
    for (let y = 0; y < grid.ny; y++) {
      col.push(encodeNumber(grid.data[y * grid.nx + x]));
    }
    out.push(col);
  }
  return out;
}

/** Inverse of parseDataset; used to export synthetic datasets. */
export function serializeDataset(dataset: Dataset): unknown {
  const { nx, ny, nt } = dataset;
  const ct: (number | null)[][][] = [];
  for (let x = 0; x < nx; x++) {
    const plane: (number | null)[][] = [];
    for (let y = 0; y < ny; y++) {
      const start = (y * nx + x) * nt;
      plane.push(Array.from(dataset.concentration.data.subarray(start, start + nt), encodeNumber));
    }
    ct.push(plane);
  }

  const fits: Record<string, Record<string, (number | null)[][]>> = {};
  for (const [model, params] of dataset.fits) {
    const entry: Record<string, (number | null)[][]> = {};
    for (const [param, grid] of params) entry[param] = encodeGrid(grid);
    fits[model] = entry;
  }

  const rss: Record<string, (number | null)[][]> = {};
  for (const [model, grid] of dataset.rss) rss[model] = encodeGrid(grid);

  return {
    t: Array.from(dataset.time, encodeNumber),
    ca: Array.from(dataset.aif, encodeNumber),
    ct,
    fits,
    rss,
  };
}
