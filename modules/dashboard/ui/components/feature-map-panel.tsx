'use client';

import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { Badge } from '@/components/ui/badge';
import type { ChartData, FeatureMatrix } from '@/lib/types';
import FeatureHeatmap from './feature-heatmap';

const PALETTE = ['#a855f7', '#ec4899', '#6366f1', '#22d3ee', '#f59e0b', '#10b981', '#f43f5e', '#84cc16'];

/** One row per competitor with a column per feature, as recharts expects. */
export function toBarRows(chart: ChartData): Array<Record<string, string | number>> {
  return chart.categories.map((competitor, i) => ({
    competitor,
    ...Object.fromEntries(chart.series.map((s) => [s.feature, s.values[i]])),
  }));
}

function CategoryTable({ chart }: { chart: ChartData }) {
  if (chart.byCategory.length === 0) return null;

  return (
    <section>
      <h3 className="text-lg font-bold mb-3">Features by category</h3>
      <div className="overflow-x-auto">
        <table className="w-full text-sm border-separate border-spacing-1">
          <thead>
            <tr>
              <th className="text-left text-gray-400 font-medium px-2">Category</th>
              {chart.categories.map((name) => (
                <th key={name} scope="col" className="text-gray-300 font-medium px-2">{name}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {chart.byCategory.map(({ category, counts }) => (
              <tr key={category}>
                <th scope="row" className="text-left text-gray-200 font-normal px-2">{category}</th>
                {counts.map((count, i) => (
                  <td key={chart.categories[i]} className="px-2 py-1 text-center text-gray-300">
                    {count}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </section>
  );
}

export default function FeatureMapPanel({ chart, matrix }: { chart: ChartData; matrix: FeatureMatrix }) {
  if (chart.empty)
    return (
      <p className="text-gray-400 text-center py-10">
        No feature data to chart yet.
      </p>
    );

  return (
    <div className="space-y-8">
      <div className="h-80">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={toBarRows(chart)} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="rgba(255,255,255,0.1)" />
            <XAxis dataKey="competitor" tick={{ fontSize: 12, fill: '#a1a1aa' }} tickLine={false} />
            <YAxis tick={{ fontSize: 12, fill: '#a1a1aa' }} tickLine={false} allowDecimals />
            <Tooltip
              contentStyle={{
                backgroundColor: '#18181b',
                border: '1px solid rgba(255,255,255,0.1)',
                borderRadius: '8px',
              }}
            />
            <Legend />
            {chart.series.map((s, i) => (
              <Bar key={s.feature} dataKey={s.feature} stackId="coverage" fill={PALETTE[i % PALETTE.length]} />
            ))}
          </BarChart>
        </ResponsiveContainer>
      </div>

      <FeatureHeatmap chart={chart} matrix={matrix} />

      <CategoryTable chart={chart} />

      {chart.gaps.length > 0 && (
        <section>
          <h3 className="text-lg font-bold mb-3">Feature gaps</h3>
          <ul className="space-y-2">
            {chart.gaps.map((gap) => (
              <li key={gap.feature} className="flex flex-wrap items-center gap-2 text-sm text-gray-300">
                <Badge variant={gap.kind === 'complete' ? 'default' : 'warning'}>
                  {gap.kind === 'complete' ? 'Unserved' : 'Underserved'}
                </Badge>
                <span className="font-medium">{gap.feature}</span>
                <Badge variant="outline">{gap.category}</Badge>
                {gap.offeredBy.length > 0 && (
                  <span className="text-gray-500">only {gap.offeredBy.join(', ')}</span>
                )}
              </li>
            ))}
          </ul>
        </section>
      )}
    </div>
  );
}
