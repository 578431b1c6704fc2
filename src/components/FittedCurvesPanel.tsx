import { useMemo } from 'react';
import { ComposedChart, Line, Scatter, XAxis, YAxis, CartesianGrid, Legend, Tooltip } from 'recharts';
import { AlertCircle } from 'lucide-react';
import type { ModelId, ModelRegistry } from '../types/dro';
import type { CurveBundle } from '../utils/dro/curveComposer';
import { modelColor, rgbCss } from '../utils/dro/colormap';
import { formatValue, formatVoxel } from '../utils/format';

interface FittedCurvesPanelProps {
  curves: CurveBundle;
  registry: ModelRegistry;
  width: number;
  height: number;
}

type ChartRow = { t: number; observed: number } & Partial<Record<ModelId, number>>;

function buildRows(curves: CurveBundle): ChartRow[] {
  const rows: ChartRow[] = [];
  for (let i = 0; i < curves.time.length; i++) {
    const row: ChartRow = { t: curves.time[i], observed: curves.observed[i] };
    for (const [model, fit] of curves.fitted) {
      if (fit.status === 'fitted') row[model] = fit.values[i];
    }
    rows.push(row);
  }
  return rows;
}

/** Localized, per-model notices for curves that could not be drawn. */
export function curveNotices(curves: CurveBundle): { model: ModelId; message: string }[] {
  const notices: { model: ModelId; message: string }[] = [];
  for (const [model, fit] of curves.fitted) {
    if (fit.status === 'skipped') {
      notices.push({ model, message: `${model}: fit unavailable at this voxel` });
    } else if (fit.status === 'failed') {
      notices.push({ model, message: fit.error.message });
    }
  }
  return notices;
}

export function FittedCurvesPanel({ curves, registry, width, height }: FittedCurvesPanelProps) {
  const rows = useMemo(() => buildRows(curves), [curves]);
  const notices = useMemo(() => curveNotices(curves), [curves]);
  const fittedModels = [...curves.fitted].filter(([, fit]) => fit.status === 'fitted').map(([m]) => m);

  return (
    <figure className="space-y-2">
      <figcaption className="text-sm font-semibold text-[var(--text-primary)]">
        Fitted values at voxel {formatVoxel(curves.voxel.x, curves.voxel.y)}
      </figcaption>

      <ComposedChart width={width} height={height} data={rows} margin={{ top: 10, right: 10, left: 0, bottom: 20 }}>
        <CartesianGrid strokeDasharray="1 3" stroke="#374151" />
        <XAxis
          dataKey="t"
          type="number"
          domain={['dataMin', 'dataMax']}
          tickFormatter={formatValue}
          stroke="#6b7280"
          tick={{ fontSize: 10, fill: '#9ca3af' }}
          label={{ value: 'Time [min]', position: 'bottom', offset: 0, style: { fontSize: 11, fill: '#9ca3af' } }}
        />
        <YAxis
          type="number"
          domain={[curves.yRange[0], curves.yRange[1]]}
          allowDataOverflow
          tickFormatter={formatValue}
          stroke="#6b7280"
          tick={{ fontSize: 10, fill: '#9ca3af' }}
          label={{
            value: 'Concentration [mM]',
            angle: -90,
            position: 'insideLeft',
            style: { fontSize: 11, fill: '#9ca3af' },
          }}
        />
        <Tooltip formatter={(value) => (typeof value === 'number' ? formatValue(value) : String(value))} />
        <Legend verticalAlign="bottom" align="right" wrapperStyle={{ fontSize: 9, paddingTop: 10 }} />

        <Scatter name="measured" dataKey="observed" fill="#9ca3af" isAnimationActive={false} legendType="none" />
        {fittedModels.map((model) => (
          <Line
            key={model}
            type="linear"
            dataKey={model}
            name={model}
            stroke={rgbCss(modelColor(registry.order.indexOf(model)))}
            strokeWidth={3.5}
            dot={false}
            isAnimationActive={false}
          />
        ))}
      </ComposedChart>

      {notices.length > 0 && (
        <ul className="space-y-1">
          {notices.map((n) => (
            <li key={n.model} className="flex items-center gap-1.5 text-xs text-amber-400">
              <AlertCircle className="w-3.5 h-3.5" />
              {n.message}
            </li>
          ))}
        </ul>
      )}
    </figure>
  );
}
