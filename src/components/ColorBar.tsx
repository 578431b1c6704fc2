import { useMemo } from 'react';
import type { ColorBounds } from '../types/dro';
import { rgbCss, viridis } from '../utils/dro/colormap';
import { formatValue } from '../utils/format';

interface ColorBarProps {
  bounds: ColorBounds;
  height: number;
}

const GRADIENT_STEPS = 10;

export function ColorBar({ bounds, height }: ColorBarProps) {
  const gradient = useMemo(() => {
    const stops: string[] = [];
    for (let i = 0; i <= GRADIENT_STEPS; i++) {
      stops.push(rgbCss(viridis(i / GRADIENT_STEPS)));
    }
    // Highest value at the top.
    return `linear-gradient(to top, ${stops.join(', ')})`;
  }, []);

  return (
    <div className="flex items-stretch gap-1" style={{ height }}>
      <div className="w-3 rounded-sm" style={{ background: gradient }} />
      <div className="flex flex-col justify-between text-[10px] text-[var(--text-secondary)] tabular-nums">
        <span data-testid="colorbar-max">{formatValue(bounds[1])}</span>
        <span data-testid="colorbar-min">{formatValue(bounds[0])}</span>
      </div>
    </div>
  );
}
