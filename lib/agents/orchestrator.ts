import type { AnalysisContext } from "../context";
import type {
  AgentResult,
  AnalysisBundle,
  ChartData,
  PipelineIssue,
  PipelineStep,
  ProgressEvent,
} from "../types";
import { discoverCompetitors, requireIdea } from "./competitor-discovery";
import { generateStrategy } from "./differentiation-strategist";
import { buildFeatureMatrix } from "./feature-matrix-builder";
import { degrade } from "./issues";
import { assembleBundle, buildChartData, emptyChart } from "./visual-gap-mapper";

export interface RunOptions {
  onProgress?: (event: ProgressEvent) => void;
  now?: () => Date;
}

/**
 * Runs discovery → feature matrix → strategy → chart, strictly in order.
 * Only an invalid idea throws; every other failure degrades its step and is
 * listed in `bundle.issues`.
 */
export async function runAnalysis(
  idea: string,
  ctx: AnalysisContext,
  { onProgress, now = () => new Date() }: RunOptions = {}
): Promise<AnalysisBundle> {
  const query = requireIdea(idea);
  const issues: PipelineIssue[] = [];

  async function step<T>(name: PipelineStep, run: () => Promise<AgentResult<T>>): Promise<T> {
    onProgress?.({ step: name, status: "started" });
    const result = await run();
    if (result.issue) issues.push(result.issue);
    onProgress?.({ step: name, status: "completed" });
    return result.data;
  }

  console.log("Running competitor discovery....");
  const competitors = await step("discovery", () => discoverCompetitors(query, ctx));

  console.log(`Building feature matrix for ${competitors.length} competitor(s)....`);
  const { matrix: featureMatrix, categories: featureCategories } = await step("features", () =>
    buildFeatureMatrix(competitors, ctx)
  );

  console.log("Generating differentiation strategy....");
  const report = await step("strategy", () =>
    generateStrategy(query, competitors, featureMatrix, ctx)
  );

  const chart = await step<ChartData>("chart", async () => {
    try {
      return { data: buildChartData(featureMatrix, competitors, featureCategories) };
    } catch (error) {
      return degrade("chart", error, emptyChart());
    }
  });

  console.log(`Analysis done${issues.length ? ` with ${issues.length} issue(s)` : ""}.`);

  return assembleBundle({
    query,
    competitors,
    featureMatrix,
    featureCategories,
    report,
    chart,
    issues,
    generatedAt: now(),
  });
}
