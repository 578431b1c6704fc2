import { describe, it, expect, vi } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import { ParameterMapPanel } from '../src/components/ParameterMapPanel';
import { BestModelPanel } from '../src/components/BestModelPanel';
import { FittedCurvesPanel, curveNotices } from '../src/components/FittedCurvesPanel';
import { SelectionControls } from '../src/components/SelectionControls';
import { HeatmapCanvas } from '../src/components/HeatmapCanvas';
import { DroWorkspace } from '../src/components/DroWorkspace';
import { composeCurves } from '../src/utils/dro/curveComposer';
import { BEST_MODEL_UNDEFINED } from '../src/utils/dro/mapResolver';
import { createModelRegistry, DEFAULT_MODEL_REGISTRY, MODEL_SPECS } from '../src/utils/dro/modelRegistry';
import { voxelBounds } from '../src/utils/dro/selection';
import type { SelectionState } from '../src/types/dro';
import { buildDataset, grid } from './droFixtures';

const twoModels = createModelRegistry([MODEL_SPECS.tofts, MODEL_SPECS.uptake]);

function curveDataset(vp: number) {
  return buildDataset({
    nx: 3,
    ny: 3,
    nt: 5,
    fits: {
      tofts: { Kt: NaN, ve: NaN, vp: NaN },
      uptake: { Fp: 0.5, PS: 0.1, vp },
    },
    rss: { tofts: NaN, uptake: 0.001 },
    registry: twoModels,
  });
}

describe('ParameterMapPanel', () => {
  it('shows the empty-distribution message', () => {
    render(
      <ParameterMapPanel view={{ status: 'empty', message: 'tofts: no valid fits for Kt' }} width={600} height={400} />
    );
    expect(screen.getByText('tofts: no valid fits for Kt')).toBeInTheDocument();
  });

  it('renders the map with its caption and color bounds', () => {
    render(
      <ParameterMapPanel
        view={{
          status: 'ok',
          result: { model: 'tofts', param: 'Kt', map: grid(4, 2, 0.5), bounds: [0, 0.5] },
        }}
        width={600}
        height={400}
      />
    );
    expect(screen.getByText('tofts: Kt')).toBeInTheDocument();
    expect(screen.getByRole('img', { name: 'tofts Kt map' })).toBeInTheDocument();
    expect(screen.getByTestId('colorbar-max')).toHaveTextContent('0.5');
    expect(screen.getByTestId('colorbar-min')).toHaveTextContent('0');
  });
});

describe('HeatmapCanvas', () => {
  it('maps a click to the voxel under the pointer', () => {
    const onPick = vi.fn();
    render(
      <HeatmapCanvas rgba={new Uint8ClampedArray(32)} nx={4} ny={2} width={100} height={100} label="map" onPick={onPick} />
    );
    const canvas = screen.getByRole('img', { name: 'map' });
    vi.spyOn(canvas, 'getBoundingClientRect').mockReturnValue({
      x: 0,
      y: 0,
      left: 0,
      top: 0,
      right: 100,
      bottom: 100,
      width: 100,
      height: 100,
      toJSON: () => ({}),
    });

    fireEvent.click(canvas, { clientX: 55, clientY: 10 });
    expect(onPick).toHaveBeenCalledWith({ x: 2, y: 0 });
  });
});

describe('BestModelPanel', () => {
  it('lists the voxel count per model', () => {
    render(
      <BestModelPanel
        bestModel={{
          nx: 2,
          ny: 2,
          categories: Int16Array.from([0, 2, 2, BEST_MODEL_UNDEFINED]),
          models: DEFAULT_MODEL_REGISTRY.order,
        }}
        voxel={{ x: 1, y: 0 }}
        width={600}
        height={400}
      />
    );
    expect(screen.getByText('Compares every model, regardless of the current selection.')).toBeInTheDocument();
    expect(screen.getByTestId('best-at-voxel')).toHaveTextContent('At (x = 1, y = 0): uptake');
    expect(screen.getByTestId('best-count-exchange')).toHaveTextContent('1');
    expect(screen.getByTestId('best-count-extendedtofts')).toHaveTextContent('0');
    expect(screen.getByTestId('best-count-uptake')).toHaveTextContent('2');
    expect(screen.getByTestId('best-count-undefined')).toHaveTextContent('1');
  });

  it('reads out a voxel without a valid fit', () => {
    render(
      <BestModelPanel
        bestModel={{
          nx: 2,
          ny: 2,
          categories: Int16Array.from([0, 2, 2, BEST_MODEL_UNDEFINED]),
          models: DEFAULT_MODEL_REGISTRY.order,
        }}
        voxel={{ x: 1, y: 1 }}
        width={600}
        height={400}
      />
    );
    expect(screen.getByTestId('best-at-voxel')).toHaveTextContent('At (x = 1, y = 1): no valid fit');
  });
});

describe('FittedCurvesPanel', () => {
  it('notes models without a valid fit and still draws the rest', () => {
    const curves = composeCurves(curveDataset(0.05), twoModels, ['tofts', 'uptake'], { x: 1, y: 1 });
    render(<FittedCurvesPanel curves={curves} registry={twoModels} width={600} height={400} />);

    expect(screen.getByText('Fitted values at voxel (x = 1, y = 1)')).toBeInTheDocument();
    expect(screen.getByText('tofts: fit unavailable at this voxel')).toBeInTheDocument();
    expect(curves.fitted.get('uptake')?.status).toBe('fitted');
  });

  it('reports evaluator failures per model', () => {
    const curves = composeCurves(curveDataset(0), twoModels, ['uptake', 'tofts'], { x: 1, y: 1 });
    expect(curveNotices(curves)).toEqual([
      { model: 'uptake', message: 'uptake: parameter vp must be positive (got 0)' },
      { model: 'tofts', message: 'tofts: fit unavailable at this voxel' },
    ]);
  });
});

describe('SelectionControls', () => {
  const selection: SelectionState = {
    models: ['exchange', 'tofts'],
    param: 'vp',
    x: 5,
    y: 4,
    figureWidth: 600,
    figureHeight: 400,
  };

  function renderControls() {
    const handlers = {
      onToggleModel: vi.fn(),
      onParamChange: vi.fn(),
      onVoxelChange: vi.fn(),
      onFigureSizeChange: vi.fn(),
      onReset: vi.fn(),
    };
    render(
      <SelectionControls
        registry={DEFAULT_MODEL_REGISTRY}
        selection={selection}
        xBounds={voxelBounds(12)}
        yBounds={voxelBounds(12)}
        {...handlers}
      />
    );
    return handlers;
  }

  it('lists the primary model parameters', () => {
    renderControls();
    const options = screen.getAllByRole('option').map((o) => o.textContent);
    expect(options).toEqual(['Fp', 'PS', 've', 'vp', 'T', 'Te', 'Tp']);
    expect(screen.getByLabelText('primary model')).toBeInTheDocument();
  });

  it('forwards edits', () => {
    const handlers = renderControls();

    fireEvent.click(screen.getByRole('checkbox', { name: /uptake/ }));
    expect(handlers.onToggleModel).toHaveBeenCalledWith('uptake');

    fireEvent.change(screen.getByLabelText('Parameter (exchange)'), { target: { value: 'PS' } });
    expect(handlers.onParamChange).toHaveBeenCalledWith('PS');

    fireEvent.change(screen.getByLabelText('x'), { target: { value: '7' } });
    expect(handlers.onVoxelChange).toHaveBeenCalledWith({ x: 7 });

    fireEvent.change(screen.getByLabelText('Figure width'), { target: { value: '800' } });
    expect(handlers.onFigureSizeChange).toHaveBeenCalledWith({ width: 800 });

    fireEvent.click(screen.getByTitle('Reset selection'));
    expect(handlers.onReset).toHaveBeenCalled();
  });
});

describe('DroWorkspace', () => {
  it('moves every voxel-dependent view with the selection', () => {
    const registry = DEFAULT_MODEL_REGISTRY;
    const fits = Object.fromEntries(
      registry.order.map((id) => [id, Object.fromEntries(MODEL_SPECS[id].parameterNames.map((p) => [p, 0.5]))])
    );
    const rss = Object.fromEntries(registry.order.map((id) => [id, 0.001]));
    const dataset = buildDataset({ nx: 10, ny: 10, nt: 4, fits, rss, registry });
    localStorage.clear();

    render(<DroWorkspace dataset={dataset} registry={registry} />);
    expect(screen.getByText('exchange: Tp')).toBeInTheDocument();
    expect(screen.getByText('Fitted values at voxel (x = 5, y = 5)')).toBeInTheDocument();
    expect(screen.getByTestId('best-count-exchange')).toHaveTextContent('100');

    fireEvent.change(screen.getByLabelText('x'), { target: { value: '6' } });
    expect(screen.getByText('Fitted values at voxel (x = 6, y = 5)')).toBeInTheDocument();
    expect(screen.getByTestId('best-at-voxel')).toHaveTextContent('At (x = 6, y = 5): exchange');
  });

  it('moves to a valid voxel when a smaller dataset replaces the current one', () => {
    const registry = DEFAULT_MODEL_REGISTRY;
    const fits = Object.fromEntries(
      registry.order.map((id) => [id, Object.fromEntries(MODEL_SPECS[id].parameterNames.map((p) => [p, 0.5]))])
    );
    const rss = Object.fromEntries(registry.order.map((id) => [id, 0.001]));
    const large = buildDataset({ nx: 40, ny: 40, nt: 4, fits, rss, registry });
    const small = buildDataset({ nx: 10, ny: 10, nt: 4, fits, rss, registry });
    localStorage.clear();

    const { rerender } = render(<DroWorkspace dataset={large} registry={registry} />);
    fireEvent.change(screen.getByLabelText('x'), { target: { value: '30' } });
    expect(screen.getByText('Fitted values at voxel (x = 30, y = 20)')).toBeInTheDocument();

    rerender(<DroWorkspace dataset={small} registry={registry} />);
    expect(screen.getByText('Fitted values at voxel (x = 5, y = 5)')).toBeInTheDocument();
    expect(screen.getByTestId('best-at-voxel')).toHaveTextContent('At (x = 5, y = 5): exchange');
  });
});
