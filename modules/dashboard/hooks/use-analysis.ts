'use client';

import { useCallback, useState } from 'react';
import { readEvents } from '@/lib/stream';
import type { AnalysisBundle } from '@/lib/types';
import { applyProgress, initialStepStates, type StepStates } from '../lib/progress';

async function failureMessage(res: Response): Promise<string> {
  const fallback = `Analysis failed (${res.status} ${res.statusText}).`;
  try {
    const data: unknown = await res.json();
    if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
      return data.message;
    }
  } catch {
    return fallback;
  }
  return fallback;
}

export function useAnalysis() {
  const [bundle, setBundle] = useState<AnalysisBundle | null>(null);
  const [steps, setSteps] = useState<StepStates>(initialStepStates);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  // axios cannot read a streamed body in the browser, so this one uses fetch
  const analyze = useCallback(async (idea: string) => {
    setLoading(true);
    setError(null);
    setBundle(null);
    setSteps(initialStepStates());

    try {
      const res = await fetch('/api/analyze', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ idea }),
      });

      if (!res.ok || !res.body) {
        setError(await failureMessage(res));
        return;
      }

      await readEvents(res.body, (event) => {
        if (event.type === 'progress') setSteps((prev) => applyProgress(prev, event));
        else if (event.type === 'result') setBundle(event.bundle);
        else setError(event.message);
      });
    } catch (err) {
      console.error('Pipeline error:', err);
      setError(err instanceof Error ? err.message : 'Analysis failed.');
    } finally {
      setLoading(false);
    }
  }, []);

  return { bundle, steps, loading, error, analyze };
}
