import { AlertTriangle } from 'lucide-react';
import type { PipelineIssue } from '@/lib/types';

const STEP_LABELS: Record<PipelineIssue['step'], string> = {
  discovery: 'Competitor discovery',
  features: 'Feature matrix',
  strategy: 'Differentiation strategy',
  chart: 'Gap map',
};

export default function IssuesNotice({ issues }: { issues: PipelineIssue[] }) {
  if (issues.length === 0) return null;

  return (
    <div role="status" className="rounded-lg border border-amber-500/30 bg-amber-500/10 p-4 text-sm">
      <p className="flex items-center gap-2 font-semibold text-amber-300">
        <AlertTriangle className="w-4 h-4" /> Partial analysis
      </p>
      <ul className="mt-2 space-y-1 text-amber-100/80">
        {issues.map((issue, i) => (
          <li key={i}>
            <span className="font-medium">{STEP_LABELS[issue.step]}:</span> {issue.message}
          </li>
        ))}
      </ul>
    </div>
  );
}
