import { useEffect, useRef, useCallback } from 'react';
import type { MouseEvent as ReactMouseEvent } from 'react';
import type { Voxel } from '../types/dro';

interface HeatmapCanvasProps {
  /** RGBA bytes, row 0 first (drawn at the top). */
  rgba: Uint8ClampedArray;
  nx: number;
  ny: number;
  /** Display size in CSS pixels. */
  width: number;
  height: number;
  label: string;
  /** Called with the voxel under the pointer on click. */
  onPick?: (voxel: Voxel) => void;
}

export function HeatmapCanvas({ rgba, nx, ny, width, height, label, onPick }: HeatmapCanvasProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = canvas.getContext('2d');
    // No 2D context in headless environments; the element still renders.
    if (!ctx) return;

    const img = ctx.createImageData(nx, ny);
    img.data.set(rgba);
    ctx.putImageData(img, 0, 0);
  }, [rgba, nx, ny]);

  const handleClick = useCallback(
    (e: ReactMouseEvent<HTMLCanvasElement>) => {
      if (!onPick) return;
      const rect = e.currentTarget.getBoundingClientRect();
      if (rect.width <= 0 || rect.height <= 0) return;

      const x = Math.floor(((e.clientX - rect.left) / rect.width) * nx);
      const y = Math.floor(((e.clientY - rect.top) / rect.height) * ny);
      if (x < 0 || x >= nx || y < 0 || y >= ny) return;
      onPick({ x, y });
    },
    [onPick, nx, ny]
  );

  return (
    <canvas
      ref={canvasRef}
      width={nx}
      height={ny}
      role="img"
      aria-label={label}
      onClick={handleClick}
      className={onPick ? 'cursor-crosshair' : undefined}
      style={{ width, height, imageRendering: 'pixelated' }}
    />
  );
}
