import { Bar, BarChart, CartesianGrid, Cell, Tooltip, XAxis, YAxis } from 'recharts';
import type { ChartRow } from '@lib/types';

// Qualitative palette (ColorBrewer Set3)
const PALETTE = ['#8dd3c7', '#ffffb3', '#bebada', '#fb8072', '#80b1d3', '#fdb462', '#b3de69', '#fccde5', '#d9d9d9', '#bc80bd', '#ccebc5', '#ffed6f'];

export default function MoodChart({ rows, title }: { rows: ChartRow[]; title: string }) {
  return (
    <figure aria-label={title} className="mx-auto w-[480px]">
      <BarChart width={480} height={280} data={rows} margin={{ top: 12, right: 12, bottom: 4, left: 0 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="rgba(255,255,255,0.08)" />
        <XAxis dataKey="label" stroke="rgba(255,255,255,0.6)" fontSize={12} />
        <YAxis allowDecimals={false} stroke="rgba(255,255,255,0.6)" fontSize={12} label={{ value: 'Count', angle: -90, position: 'insideLeft' }} />
        <Tooltip cursor={{ fill: 'rgba(255,255,255,0.05)' }} />
        <Bar dataKey="count" name="Count" radius={[6, 6, 0, 0]}>
          {rows.map((r, i) => <Cell key={r.mood} fill={PALETTE[i % PALETTE.length]} />)}
        </Bar>
      </BarChart>
    </figure>
  );
}
