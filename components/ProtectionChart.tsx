import React from 'react';
import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, ReferenceLine } from 'recharts';
import type { ChartSeries, SeriesStyle } from '../utils/chartSeries';
import { decadeTicks } from '../utils/chartSeries';

const formatAxis = (v: number) => (v >= 1 ? v.toFixed(0) : v.toString());

const Swatch: React.FC<{ style: SeriesStyle }> = ({ style }) => (
  <span
    className="inline-block w-3 h-3 mr-2 border border-slate-700 align-middle"
    style={{ background: style.color }}
  />
);

const ProtectionChart: React.FC<{ series: ChartSeries; title: string }> = ({ series, title }) => {
  const { curves, verticals, horizontals, currentDomain, timeDomain } = series;
  const legend: SeriesStyle[] = [...curves, ...verticals, ...horizontals];

  return (
    <div>
      <div className="h-[28rem] w-full">
        <ResponsiveContainer width="100%" height="100%">
          <LineChart margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis
              dataKey="current"
              type="number"
              scale="log"
              domain={currentDomain}
              ticks={decadeTicks(currentDomain)}
              tickFormatter={formatAxis}
              allowDataOverflow
              label={{ value: 'Current (A)', position: 'insideBottomRight', offset: -10 }}
              fontSize={12}
            />
            <YAxis
              dataKey="time"
              type="number"
              scale="log"
              domain={timeDomain}
              ticks={decadeTicks(timeDomain)}
              tickFormatter={formatAxis}
              allowDataOverflow
              label={{ value: 'Time (s)', angle: -90, position: 'insideLeft' }}
              fontSize={12}
            />
            <Tooltip
              contentStyle={{ fontSize: '12px' }}
              formatter={(value) => (typeof value === 'number' ? `${value.toFixed(2)} s` : String(value))}
              labelFormatter={(label) => `${Number(label).toFixed(1)} A`}
            />
            {curves.map((c) => (
              <Line
                key={c.key}
                data={c.points}
                dataKey="time"
                name={c.label}
                type="linear"
                stroke={c.color}
                strokeWidth={c.width}
                strokeDasharray={c.dash}
                dot={false}
                isAnimationActive={false}
              />
            ))}
            {verticals.map((l) => (
              <ReferenceLine key={l.key} x={l.value} stroke={l.color} strokeWidth={l.width} strokeDasharray={l.dash} />
            ))}
            {horizontals.map((l) => (
              <ReferenceLine key={l.key} y={l.value} stroke={l.color} strokeWidth={l.width} strokeDasharray={l.dash} />
            ))}
          </LineChart>
        </ResponsiveContainer>
      </div>

      <div className="mt-4">
        <h4 className="text-xs font-bold text-slate-400 uppercase mb-2">Legend — {title}</h4>
        {legend.length > 0 ? (
          <div className="grid grid-cols-1 sm:grid-cols-2 gap-y-1 text-sm text-slate-700">
            {legend.map((s) => (
              <div key={s.label}>
                <Swatch style={s} />
                {s.label}
                {s.dash ? <span className="text-slate-400"> (dashed)</span> : null}
              </div>
            ))}
          </div>
        ) : (
          <div className="bg-slate-50 p-3 rounded text-sm text-slate-500 italic text-center">
            No variables selected. Use the selector above to add curves/limits to the chart.
          </div>
        )}
      </div>
    </div>
  );
};

export default ProtectionChart;
