import { RotateCcw, Star } from 'lucide-react';
import type { ModelId, ModelRegistry, SelectionState } from '../types/dro';
import type { VoxelBounds } from '../utils/dro/selection';
import { FIGURE_LIMITS } from '../utils/constants';

interface SelectionControlsProps {
  registry: ModelRegistry;
  selection: SelectionState;
  xBounds: VoxelBounds;
  yBounds: VoxelBounds;
  onToggleModel: (model: ModelId) => void;
  onParamChange: (param: string) => void;
  onVoxelChange: (voxel: { x?: number; y?: number }) => void;
  onFigureSizeChange: (size: { width?: number; height?: number }) => void;
  onReset: () => void;
}

export function SelectionControls({
  registry,
  selection,
  xBounds,
  yBounds,
  onToggleModel,
  onParamChange,
  onVoxelChange,
  onFigureSizeChange,
  onReset,
}: SelectionControlsProps) {
  const primary = selection.models[0];
  const params = registry.get(primary).parameterNames;

  return (
    <div className="p-4 space-y-4">
      <div className="flex items-center justify-between">
        <h3 className="text-sm font-semibold text-[var(--text-secondary)] uppercase tracking-wider">Models</h3>
        <button
          onClick={onReset}
          className="p-1.5 rounded hover:bg-[var(--bg-tertiary)] text-[var(--text-secondary)] hover:text-[var(--text-primary)] transition-colors"
          title="Reset selection"
        >
          <RotateCcw className="w-4 h-4" />
        </button>
      </div>

      {/* The first selected model drives the parameter map. */}
      <ul className="space-y-1">
        {registry.order.map((id) => {
          const spec = registry.get(id);
          const checked = selection.models.includes(id);
          return (
            <li key={id}>
              <label className="flex items-center gap-2 text-xs text-[var(--text-primary)]" title={spec.description}>
                <input type="checkbox" checked={checked} onChange={() => onToggleModel(id)} />
                <span>{id}</span>
                <span className="text-[var(--text-secondary)]">({spec.parameterNames.join(', ')})</span>
                {id === primary && <Star className="w-3 h-3 text-[var(--accent)]" aria-label="primary model" />}
              </label>
            </li>
          );
        })}
      </ul>

      <div className="space-y-2">
        <label htmlFor="dro-param" className="text-xs text-[var(--text-secondary)]">
          Parameter ({primary})
        </label>
        <select
          id="dro-param"
          value={selection.param}
          onChange={(e) => onParamChange(e.target.value)}
          className="w-full px-2 py-1 text-xs rounded bg-[var(--bg-tertiary)] text-[var(--text-primary)]"
        >
          {params.map((p) => (
            <option key={p} value={p}>
              {p}
            </option>
          ))}
        </select>
      </div>

      <div className="space-y-2">
        <div className="flex items-center justify-between">
          <label htmlFor="dro-x" className="text-xs text-[var(--text-secondary)]">
            x
          </label>
          <span className="text-xs text-[var(--text-primary)] tabular-nums">{selection.x}</span>
        </div>
        <input
          id="dro-x"
          type="range"
          min={xBounds.min}
          max={xBounds.max - 1}
          value={selection.x}
          onChange={(e) => onVoxelChange({ x: parseInt(e.target.value) })}
          className="w-full"
        />
      </div>

      <div className="space-y-2">
        <div className="flex items-center justify-between">
          <label htmlFor="dro-y" className="text-xs text-[var(--text-secondary)]">
            y
          </label>
          <span className="text-xs text-[var(--text-primary)] tabular-nums">{selection.y}</span>
        </div>
        <input
          id="dro-y"
          type="range"
          min={yBounds.min}
          max={yBounds.max - 1}
          value={selection.y}
          onChange={(e) => onVoxelChange({ y: parseInt(e.target.value) })}
          className="w-full"
        />
      </div>

      <div className="grid grid-cols-2 gap-2">
        <label className="space-y-1 text-xs text-[var(--text-secondary)]">
          <span>Width</span>
          <input
            type="number"
            aria-label="Figure width"
            min={FIGURE_LIMITS.WIDTH.MIN}
            max={FIGURE_LIMITS.WIDTH.MAX}
            step={FIGURE_LIMITS.WIDTH.STEP}
            value={selection.figureWidth}
            onChange={(e) => {
              const v = parseInt(e.target.value);
              if (Number.isFinite(v) && v > 0) onFigureSizeChange({ width: v });
            }}
            className="w-full px-2 py-1 rounded bg-[var(--bg-tertiary)] text-[var(--text-primary)]"
          />
        </label>
        <label className="space-y-1 text-xs text-[var(--text-secondary)]">
          <span>Height</span>
          <input
            type="number"
            aria-label="Figure height"
            min={FIGURE_LIMITS.HEIGHT.MIN}
            max={FIGURE_LIMITS.HEIGHT.MAX}
            step={FIGURE_LIMITS.HEIGHT.STEP}
            value={selection.figureHeight}
            onChange={(e) => {
              const v = parseInt(e.target.value);
              if (Number.isFinite(v) && v > 0) onFigureSizeChange({ height: v });
            }}
            className="w-full px-2 py-1 rounded bg-[var(--bg-tertiary)] text-[var(--text-primary)]"
          />
        </label>
      </div>
    </div>
  );
}
