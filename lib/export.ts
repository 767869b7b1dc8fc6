import { z } from "zod";
import { InvalidInputError } from "./errors";
import type { AnalysisBundle } from "./types";

const presence = z.union([z.boolean(), z.string()]);
const stepName = z.enum(["discovery", "features", "strategy", "chart"]);
const errorCode = z.enum([
  "InvalidInput",
  "ConfigurationError",
  "SearchUnavailable",
  "ModelUnavailable",
  "MalformedModelOutput",
  "RenderError",
]);

export const AnalysisBundleSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  query: z.string(),
  competitors: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      notableFeatures: z.array(z.string()),
      sourceUrls: z.array(z.string()),
      pricingModel: z.string().optional(),
      targetAudience: z.string().optional(),
      usp: z.string().optional(),
    })
  ),
  featureMatrix: z.record(z.string(), z.record(z.string(), presence)),
  featureCategories: z.record(z.string(), z.array(z.string())),
  report: z.object({
    gaps: z.array(z.string()),
    opportunities: z.array(z.string()),
    positioningNarrative: z.string(),
    keyDifferentiators: z.array(z.string()),
    opportunityMap: z.array(
      z.object({
        type: z.enum(["whitespace", "innovation", "pricing", "niche"]),
        category: z.string(),
        description: z.string(),
      })
    ),
  }),
  chart: z.object({
    categories: z.array(z.string()),
    series: z.array(z.object({ feature: z.string(), values: z.array(z.number()) })),
    coverage: z.array(
      z.object({ feature: z.string(), competitors: z.array(z.string()), score: z.number() })
    ),
    gaps: z.array(
      z.object({
        feature: z.string(),
        category: z.string(),
        kind: z.enum(["complete", "partial"]),
        offeredBy: z.array(z.string()),
      })
    ),
    byCategory: z.array(z.object({ category: z.string(), counts: z.array(z.number()) })),
    empty: z.boolean(),
  }),
  landscape: z.array(
    z.object({
      name: z.string(),
      pricingModel: z.string(),
      targetAudience: z.string(),
      usp: z.string(),
      featureCount: z.number(),
    })
  ),
  issues: z.array(z.object({ step: stepName, code: errorCode, message: z.string() })),
  partial: z.boolean(),
}) satisfies z.ZodType<AnalysisBundle>;

export function serializeBundle(bundle: AnalysisBundle): string {
  return JSON.stringify(bundle, null, 2);
}

export function parseBundle(json: string): AnalysisBundle {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    throw new InvalidInputError("Export file is not valid JSON.");
  }

  const parsed = AnalysisBundleSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidInputError("Export file is not an analysis bundle.");
  }
  return parsed.data;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** market_analysis_YYYYMMDD_HHMMSS.json, local time */
export function exportFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `market_analysis_${day}_${time}.json`;
}
