import type { Dataset, DatasetInput, Grid2D, ModelRegistry } from '../../types/dro';
import { OutOfRangeError, ShapeMismatchError, UnknownModelError, UnknownParameterError } from './errors';

function checkSpatial(label: string, grid: Grid2D, nx: number, ny: number): void {
  if (grid.nx !== nx || grid.ny !== ny) {
    throw new ShapeMismatchError(`${label}: expected ${nx}x${ny}, got ${grid.nx}x${grid.ny}`);
  }
  if (grid.data.length !== nx * ny) {
    throw new ShapeMismatchError(`${label}: data length ${grid.data.length} does not match ${nx}x${ny}`);
  }
}

/**
 * Validate and freeze a loaded study.
 *
 * Every parameter and RSS map must share the concentration volume's spatial
 * dimensions. When a registry is given, each of its models must also provide
 * every parameter its spec names plus an RSS map. Any violation throws
 * ShapeMismatchError and no dataset is returned.
 */
export function createDataset(input: DatasetInput, registry?: ModelRegistry): Dataset {
  const { nx, ny, nt, data } = input.concentration;

  if (!(nx > 0 && ny > 0 && nt > 0)) {
    throw new ShapeMismatchError(`concentration: invalid dims ${nx}x${ny}x${nt}`);
  }
  if (data.length !== nx * ny * nt) {
    throw new ShapeMismatchError(
      `concentration: data length mismatch (expected ${nx * ny * nt}, got ${data.length})`
    );
  }
  if (input.time.length !== nt) {
    throw new ShapeMismatchError(`t: expected ${nt} time points, got ${input.time.length}`);
  }
  if (input.aif.length !== nt) {
    throw new ShapeMismatchError(`ca: expected ${nt} samples, got ${input.aif.length}`);
  }

  for (const [model, params] of input.fits) {
    for (const [param, grid] of params) {
      checkSpatial(`fits.${model}.${param}`, grid, nx, ny);
    }
  }
  for (const [model, grid] of input.rss) {
    checkSpatial(`rss.${model}`, grid, nx, ny);
  }

  if (registry) {
    for (const id of registry.order) {
      const params = input.fits.get(id);
      if (!params) {
        throw new ShapeMismatchError(`fits.${id}: missing parameter maps`);
      }
      for (const name of registry.get(id).parameterNames) {
        if (!params.has(name)) {
          throw new ShapeMismatchError(`fits.${id}.${name}: missing parameter map`);
        }
      }
      if (!input.rss.has(id)) {
        throw new ShapeMismatchError(`rss.${id}: missing residual map`);
      }
    }
  }

  return Object.freeze({
    time: input.time,
    aif: input.aif,
    concentration: input.concentration,
    fits: input.fits,
    rss: input.rss,
    nx,
    ny,
    nt,
  });
}

export function timeSeriesAt(dataset: Dataset, x: number, y: number): Float64Array {
  const { nx, ny, nt } = dataset;
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || x >= nx || y < 0 || y >= ny) {
    throw new OutOfRangeError(`voxel (${x}, ${y}) is outside ${nx}x${ny}`);
  }
  const start = (y * nx + x) * nt;
  // Copy so callers cannot write through to the stored volume.
  return dataset.concentration.data.slice(start, start + nt);
}

export function parameterMap(dataset: Dataset, model: string, param: string): Grid2D {
  const params = dataset.fits.get(model);
  if (!params) throw new UnknownModelError(model);
  const grid = params.get(param);
  if (!grid) throw new UnknownParameterError(model, param);
  return grid;
}

export function residualMap(dataset: Dataset, model: string): Grid2D {
  const grid = dataset.rss.get(model);
  if (!grid) throw new UnknownModelError(model);
  return grid;
}
