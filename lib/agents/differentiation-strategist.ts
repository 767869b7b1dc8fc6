import type { AnalysisContext } from "../context";
import { errorMessage } from "../errors";
import { chatWithLLM } from "../llm";
import { DifferentiationReportSchema, parseModelJson } from "../model-output";
import type { AgentResult, Competitor, DifferentiationReport, FeatureMatrix } from "../types";
import { degrade } from "./issues";

export function placeholderReport(reason: string): DifferentiationReport {
  return {
    gaps: [],
    opportunities: [],
    positioningNarrative: `Differentiation analysis could not be completed. ${reason}`,
    keyDifferentiators: [],
    opportunityMap: [],
  };
}

export function buildStrategyPrompt(
  idea: string,
  competitors: Competitor[],
  matrix: FeatureMatrix
): string {
  const landscape =
    competitors.length > 0
      ? JSON.stringify(
          competitors.map(
            ({ name, description, notableFeatures, pricingModel, targetAudience, usp }) => ({
              name,
              description,
              notableFeatures,
              pricingModel,
              targetAudience,
              usp,
            })
          ),
          null,
          2
        )
      : "No direct competitors were found.";

  return `
You are a professional startup strategist and market analyst.

Startup Idea:
${idea}

Competitor Landscape:
${landscape}

Feature Matrix (competitor → feature → presence):
${JSON.stringify(matrix, null, 2)}

---
Identify where this startup can differentiate itself.
- "gaps": features or needs the competitors leave unserved
- "opportunities": concrete market or product opportunities to pursue
- "keyDifferentiators": 3-5 short statements of how the startup should stand apart
- "positioningNarrative": 2-4 paragraphs of positioning advice (markdown allowed)
- "opportunityMap": specific opportunities, each with a "type", a "category" and a "description":
  - "whitespace": Feature Gap, Market Gap or Opportunity Area
  - "innovation": Technical, Feature, Business Model or User Experience Innovation
  - "pricing": Pricing Model Innovation, Value-Based Pricing or Revenue Model Innovation,
    based on the competitors' pricing models
  - "niche": Underserved Segments, Emerging Markets, Specialized Use Cases or Geographic
    Opportunities, based on the competitors' target audiences

Return ONLY valid JSON with this structure (no markdown fences, no explanations):

{
  "gaps": ["..."],
  "opportunities": ["..."],
  "keyDifferentiators": ["..."],
  "positioningNarrative": "...",
  "opportunityMap": [
    { "type": "whitespace", "category": "Market Gap", "description": "..." }
  ]
}
`.trim();
}

/**
 * One model call over the idea, competitors and matrix. Analysis errors yield
 * the placeholder report and an issue.
 */
export async function generateStrategy(
  idea: string,
  competitors: Competitor[],
  matrix: FeatureMatrix,
  ctx: AnalysisContext
): Promise<AgentResult<DifferentiationReport>> {
  try {
    const response = await chatWithLLM(ctx.llm, buildStrategyPrompt(idea, competitors, matrix), {
      timeoutMs: ctx.config.requestTimeoutMs,
    });
    const report = parseModelJson(response, DifferentiationReportSchema);
    return {
      data: {
        gaps: report.gaps.filter(Boolean),
        opportunities: report.opportunities.filter(Boolean),
        positioningNarrative: report.positioningNarrative,
        keyDifferentiators: report.keyDifferentiators.filter(Boolean),
        opportunityMap: report.opportunityMap
          .filter((o) => o.description)
          .map((o) => ({ ...o, category: o.category || "General" })),
      },
    };
  } catch (error) {
    return degrade("strategy", error, placeholderReport(errorMessage(error)));
  }
}
