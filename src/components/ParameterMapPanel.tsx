import { useMemo } from 'react';
import { AlertCircle } from 'lucide-react';
import type { Voxel } from '../types/dro';
import type { ParameterMapView } from '../hooks/useResolvedViews';
import { gridToRgba } from '../utils/dro/colormap';
import { HeatmapCanvas } from './HeatmapCanvas';
import { ColorBar } from './ColorBar';

interface ParameterMapPanelProps {
  view: ParameterMapView;
  width: number;
  height: number;
  onPickVoxel?: (voxel: Voxel) => void;
}

export function ParameterMapPanel({ view, width, height, onPickVoxel }: ParameterMapPanelProps) {
  const rgba = useMemo(
    () => (view.status === 'ok' ? gridToRgba(view.result.map, view.result.bounds) : null),
    [view]
  );

  if (view.status === 'empty' || !rgba) {
    return (
      <div
        className="flex items-center justify-center gap-2 text-sm text-[var(--text-secondary)]"
        style={{ width, height }}
      >
        <AlertCircle className="w-4 h-4" />
        <span>{view.status === 'empty' ? view.message : 'No map'}</span>
      </div>
    );
  }

  const { model, param, map, bounds } = view.result;
  // Keep voxels square inside the requested figure.
  const scale = Math.min((width - 48) / map.nx, height / map.ny);
  const w = Math.max(1, Math.floor(map.nx * scale));
  const h = Math.max(1, Math.floor(map.ny * scale));

  return (
    <figure className="space-y-2">
      <figcaption className="text-sm font-semibold text-[var(--text-primary)]">
        {model}: {param}
      </figcaption>
      <div className="flex items-start gap-2">
        <HeatmapCanvas
          rgba={rgba}
          nx={map.nx}
          ny={map.ny}
          width={w}
          height={h}
          label={`${model} ${param} map`}
          onPick={onPickVoxel}
        />
        <ColorBar bounds={bounds} height={h} />
      </div>
    </figure>
  );
}
