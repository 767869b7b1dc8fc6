import { isAnalysisError } from "../errors";
import type { AgentResult, PipelineStep } from "../types";

/**
 * Turns a step failure into its fallback output plus an issue.
 * Errors outside the analysis taxonomy are bugs and are rethrown.
 */
export function degrade<T>(step: PipelineStep, error: unknown, fallback: T): AgentResult<T> {
  if (!isAnalysisError(error)) throw error;

  console.warn(`⚠️ [${step}] ${error.code}: ${error.message}`);
  return {
    data: fallback,
    issue: { step, code: error.code, message: error.message },
  };
}
