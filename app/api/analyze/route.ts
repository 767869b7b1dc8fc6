import { createAnalyzeHandler } from "@/lib/analyze-handler";
import { loadConfig } from "@/lib/config";
import { createAnalysisContext, type AnalysisContext } from "@/lib/context";

export const dynamic = "force-dynamic";

let context: AnalysisContext | null = null;

export const POST = createAnalyzeHandler(() => {
  context ??= createAnalysisContext(loadConfig());
  return context;
});
