import { CheckCircle, Circle, Loader2 } from 'lucide-react';
import { PIPELINE_STEPS, type StepStates } from '../../lib/progress';

export default function AnalysisProgress({ steps }: { steps: StepStates }) {
  return (
    <ol className="space-y-2" aria-label="Analysis progress">
      {PIPELINE_STEPS.map(({ step, label }) => {
        const state = steps[step];
        return (
          <li key={step} data-state={state} className="flex items-center gap-2 text-sm">
            {state === 'done' && <CheckCircle className="w-4 h-4 text-green-400" />}
            {state === 'running' && <Loader2 className="w-4 h-4 animate-spin text-purple-400" />}
            {state === 'pending' && <Circle className="w-4 h-4 text-gray-600" />}
            <span className={state === 'pending' ? 'text-gray-500' : 'text-gray-200'}>{label}</span>
          </li>
        );
      })}
    </ol>
  );
}
