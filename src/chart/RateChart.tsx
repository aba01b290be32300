import { CartesianGrid, Legend, Line, LineChart, XAxis, YAxis } from 'recharts';
import type { ChartSeries } from './series';

const PALETTE = ['#2563EB', '#DC2626', '#059669', '#D97706', '#7C3AED', '#DB2777', '#0891B2', '#65A30D'];

export interface RateChartProps {
  series: ChartSeries;
  width: number;
  height: number;
}

export function toChartRows(series: ChartSeries): Array<Record<string, string | number | null>> {
  return series.points.map((point) => ({ date: point.date, ...point.values }));
}

export default function RateChart({ series, width, height }: RateChartProps) {
  return (
    <LineChart
      width={width}
      height={height}
      data={toChartRows(series)}
      margin={{ top: 16, right: 24, left: 8, bottom: 8 }}
    >
      <CartesianGrid stroke="#E5E7EB" strokeDasharray="3 3" />
      <XAxis dataKey="date" ticks={series.ticks} interval={0} tick={{ fontSize: 12 }} />
      <YAxis tick={{ fontSize: 12 }} domain={['auto', 'auto']} />
      <Legend />
      {series.currencies.map((code, index) => (
        <Line
          key={code}
          type="linear"
          dataKey={code}
          name={code}
          stroke={PALETTE[index % PALETTE.length]}
          strokeWidth={2}
          dot={false}
          connectNulls
          isAnimationActive={false}
        />
      ))}
    </LineChart>
  );
}
