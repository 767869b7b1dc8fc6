import type { ChartData, FeatureMatrix, Presence } from '@/lib/types';
import { cn } from '@/lib/utils';

export function presenceLabel(value: Presence | undefined): string {
  if (value === true) return '✓';
  if (value === false || value === undefined) return '—';
  return value;
}

function cellTone(score: number) {
  if (score >= 1) return 'bg-green-500/30 text-green-200';
  if (score > 0) return 'bg-amber-500/25 text-amber-200';
  return 'bg-white/5 text-gray-500';
}

export default function FeatureHeatmap({ chart, matrix }: { chart: ChartData; matrix: FeatureMatrix }) {
  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm border-separate border-spacing-1">
        <thead>
          <tr>
            <th className="text-left text-gray-400 font-medium px-2">Feature</th>
            {chart.categories.map((name) => (
              <th key={name} scope="col" className="text-gray-300 font-medium px-2">{name}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {chart.series.map(({ feature, values }) => (
            <tr key={feature}>
              <th scope="row" className="text-left text-gray-200 font-normal px-2">{feature}</th>
              {chart.categories.map((name, i) => (
                <td key={name} className={cn('rounded px-2 py-1 text-center', cellTone(values[i]))}>
                  {presenceLabel(matrix[name]?.[feature])}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
