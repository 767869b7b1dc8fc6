import { z } from "zod";
import { MalformedModelOutputError } from "./errors";

// Gemini tends to wrap JSON in ```json fences or add a sentence around it.
export function cleanJson(text: string): string {
  let cleaned = text.replace(/```json/gi, "").replace(/```/g, "").trim();

  const firstBrace = cleaned.indexOf("{");
  const lastBrace = cleaned.lastIndexOf("}");
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    cleaned = cleaned.slice(firstBrace, lastBrace + 1);
  }

  return cleaned.trim();
}

/**
 * Parses a model reply against a strict schema. Anything that is not
 * JSON, or does not conform, is a MalformedModelOutputError; no repair is attempted.
 */
export function parseModelJson<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(cleanJson(text));
  } catch {
    throw new MalformedModelOutputError("Model response is not valid JSON.", text);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.length ? ` at ${first.path.join(".")}` : "";
    throw new MalformedModelOutputError(
      `Model response does not match the expected structure${where}: ${first?.message ?? "invalid"}`,
      text
    );
  }
  return parsed.data;
}

const trimmedText = z.string().trim();

export const CompetitorListSchema = z.object({
  competitors: z.array(
    z.object({
      name: trimmedText,
      description: trimmedText.default(""),
      notableFeatures: z.array(trimmedText).default([]),
      sourceUrls: z.array(trimmedText).default([]),
      pricingModel: trimmedText.optional(),
      targetAudience: trimmedText.optional(),
      usp: trimmedText.optional(),
    })
  ),
});

export const FeatureMatrixOutputSchema = z.object({
  features: z.array(trimmedText).default([]),
  matrix: z.record(z.string(), z.record(z.string(), z.union([z.boolean(), z.string()]))),
  categories: z.record(z.string(), z.array(trimmedText)).default({}),
});

export const DifferentiationReportSchema = z.object({
  gaps: z.array(trimmedText),
  opportunities: z.array(trimmedText),
  positioningNarrative: trimmedText.min(1),
  keyDifferentiators: z.array(trimmedText).default([]),
  opportunityMap: z
    .array(
      z.object({
        type: z.enum(["whitespace", "innovation", "pricing", "niche"]),
        category: trimmedText.default(""),
        description: trimmedText,
      })
    )
    .default([]),
});

export type CompetitorListOutput = z.output<typeof CompetitorListSchema>;
export type FeatureMatrixOutput = z.output<typeof FeatureMatrixOutputSchema>;
