import { useCallback } from 'react';
import type { Dataset, ModelRegistry, Voxel } from '../types/dro';
import { useSelectionState } from '../hooks/useSelectionState';
import { useResolvedViews } from '../hooks/useResolvedViews';
import { voxelBounds } from '../utils/dro/selection';
import { SelectionControls } from './SelectionControls';
import { ParameterMapPanel } from './ParameterMapPanel';
import { FittedCurvesPanel } from './FittedCurvesPanel';
import { ResidualMapsPanel } from './ResidualMapsPanel';
import { BestModelPanel } from './BestModelPanel';

interface DroWorkspaceProps {
  dataset: Dataset;
  registry: ModelRegistry;
}

export function DroWorkspace({ dataset, registry }: DroWorkspaceProps) {
  const { selection, toggleModel, setParam, setVoxel, setFigureSize, reset } = useSelectionState(dataset, registry);
  const { parameterMapView, curves, bestModel, residuals } = useResolvedViews(dataset, registry, selection);

  const handlePick = useCallback((voxel: Voxel) => setVoxel(voxel), [setVoxel]);

  const { figureWidth: width, figureHeight: height } = selection;

  return (
    <div className="flex-1 flex overflow-hidden">
      <aside className="w-72 bg-[var(--bg-secondary)] border-r border-[var(--border-color)] flex-shrink-0 overflow-y-auto">
        <SelectionControls
          registry={registry}
          selection={selection}
          xBounds={voxelBounds(dataset.nx)}
          yBounds={voxelBounds(dataset.ny)}
          onToggleModel={toggleModel}
          onParamChange={setParam}
          onVoxelChange={setVoxel}
          onFigureSizeChange={setFigureSize}
          onReset={reset}
        />
      </aside>

      <main className="flex-1 min-w-0 overflow-y-auto p-4 space-y-8">
        <section>
          <h2 className="mb-2 text-sm font-semibold text-[var(--text-secondary)] uppercase tracking-wider">
            Parameter map
          </h2>
          <ParameterMapPanel view={parameterMapView} width={width} height={height} onPickVoxel={handlePick} />
        </section>

        <section>
          <FittedCurvesPanel curves={curves} registry={registry} width={width} height={height} />
        </section>

        <section>
          <h2 className="mb-2 text-sm font-semibold text-[var(--text-secondary)] uppercase tracking-wider">
            Residual sum of squares
          </h2>
          <ResidualMapsPanel residuals={residuals} width={width} height={height} />
        </section>

        <section>
          <h2 className="mb-2 text-sm font-semibold text-[var(--text-secondary)] uppercase tracking-wider">
            Lowest RSS model
          </h2>
          <BestModelPanel
            bestModel={bestModel}
            voxel={{ x: selection.x, y: selection.y }}
            width={width}
            height={height}
            onPickVoxel={handlePick}
          />
        </section>
      </main>
    </div>
  );
}
