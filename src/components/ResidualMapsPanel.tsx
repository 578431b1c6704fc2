import { useMemo } from 'react';
import type { ResolvedResidualMap } from '../types/dro';
import { gridToRgba } from '../utils/dro/colormap';
import { HeatmapCanvas } from './HeatmapCanvas';
import { ColorBar } from './ColorBar';

interface ResidualMapsPanelProps {
  residuals: ResolvedResidualMap[];
  width: number;
  height: number;
}

/** Fixed 2-column grid of RSS maps, one per model, on a shared color scale. */
export function ResidualMapsPanel({ residuals, width, height }: ResidualMapsPanelProps) {
  const images = useMemo(
    () => residuals.map((r) => ({ ...r, rgba: gridToRgba(r.map, r.bounds) })),
    [residuals]
  );

  const cols = 2;
  const rows = Math.max(1, Math.ceil(images.length / cols));
  const cellW = Math.floor((width - 48) / cols);
  const cellH = Math.floor(height / rows) - 20;

  return (
    <div className="flex items-start gap-2">
      <div className="grid grid-cols-2 gap-2">
        {images.map((r) => {
          const scale = Math.max(0, Math.min(cellW / r.map.nx, cellH / r.map.ny));
          return (
            <figure key={r.model} className="space-y-1">
              <figcaption className="text-xs text-[var(--text-secondary)]">{r.model}</figcaption>
              <HeatmapCanvas
                rgba={r.rgba}
                nx={r.map.nx}
                ny={r.map.ny}
                width={Math.max(1, Math.floor(r.map.nx * scale))}
                height={Math.max(1, Math.floor(r.map.ny * scale))}
                label={`${r.model} RSS map`}
              />
            </figure>
          );
        })}
      </div>
      {images[0] && <ColorBar bounds={images[0].bounds} height={Math.max(40, height - 20)} />}
    </div>
  );
}
