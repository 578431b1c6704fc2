import { useMemo } from 'react';
import type { BestModelMap, Voxel } from '../types/dro';
import { categoriesToRgba, INVALID_COLOR, modelColor, rgbCss } from '../utils/dro/colormap';
import { bestModelAt, bestModelCounts } from '../utils/dro/mapResolver';
import { formatVoxel } from '../utils/format';
import { HeatmapCanvas } from './HeatmapCanvas';

interface BestModelPanelProps {
  bestModel: BestModelMap;
  /** Selected voxel, read out under the legend. */
  voxel: Voxel;
  width: number;
  height: number;
  onPickVoxel?: (voxel: Voxel) => void;
}

export function BestModelPanel({ bestModel, voxel, width, height, onPickVoxel }: BestModelPanelProps) {
  const rgba = useMemo(() => categoriesToRgba(bestModel), [bestModel]);
  const { counts, undefinedCount } = useMemo(() => bestModelCounts(bestModel), [bestModel]);
  const winner = bestModelAt(bestModel, voxel);

  const scale = Math.min((width - 160) / bestModel.nx, height / bestModel.ny);
  const w = Math.max(1, Math.floor(bestModel.nx * scale));
  const h = Math.max(1, Math.floor(bestModel.ny * scale));

  return (
    <figure className="space-y-2">
      <figcaption className="text-xs text-[var(--text-secondary)]">
        Compares every model, regardless of the current selection.
      </figcaption>
      <div className="flex items-start gap-3">
        <HeatmapCanvas
          rgba={rgba}
          nx={bestModel.nx}
          ny={bestModel.ny}
          width={w}
          height={h}
          label="Lowest RSS model map"
          onPick={onPickVoxel}
        />
        <ul className="space-y-1 text-xs">
          {bestModel.models.map((model, k) => (
            <li key={model} className="flex items-center gap-1.5">
              <span className="inline-block w-3 h-3 rounded-sm" style={{ background: rgbCss(modelColor(k)) }} />
              <span className="text-[var(--text-primary)]">{model}</span>
              <span className="text-[var(--text-secondary)] tabular-nums" data-testid={`best-count-${model}`}>
                {counts[k]}
              </span>
            </li>
          ))}
          <li className="flex items-center gap-1.5">
            <span className="inline-block w-3 h-3 rounded-sm" style={{ background: rgbCss(INVALID_COLOR) }} />
            <span className="text-[var(--text-primary)]">no valid fit</span>
            <span className="text-[var(--text-secondary)] tabular-nums" data-testid="best-count-undefined">
              {undefinedCount}
            </span>
          </li>
        </ul>
      </div>
      <p className="text-xs text-[var(--text-secondary)]" data-testid="best-at-voxel">
        At {formatVoxel(voxel.x, voxel.y)}: {winner ?? 'no valid fit'}
      </p>
    </figure>
  );
}
