import type { PipelineStep, ProgressEvent } from "@/lib/types";

export type StepState = "pending" | "running" | "done";

export type StepStates = Record<PipelineStep, StepState>;

export const PIPELINE_STEPS: { step: PipelineStep; label: string }[] = [
  { step: "discovery", label: "Discovering competitors" },
  { step: "features", label: "Building feature matrix" },
  { step: "strategy", label: "Drafting differentiation strategy" },
  { step: "chart", label: "Mapping feature gaps" },
];

export const initialStepStates = (): StepStates => ({
  discovery: "pending",
  features: "pending",
  strategy: "pending",
  chart: "pending",
});

export function applyProgress(states: StepStates, event: ProgressEvent): StepStates {
  return { ...states, [event.step]: event.status === "started" ? "running" : "done" };
}
