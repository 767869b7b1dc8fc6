import type { AnalysisContext } from "../context";
import { MalformedModelOutputError } from "../errors";
import { FEATURE_CATEGORIES, OTHER_CATEGORY } from "../feature-categories";
import { chatWithLLM } from "../llm";
import {
  FeatureMatrixOutputSchema,
  parseModelJson,
  type FeatureMatrixOutput,
} from "../model-output";
import type {
  AgentResult,
  Competitor,
  FeatureAnalysis,
  FeatureCategories,
  FeatureMatrix,
  Presence,
} from "../types";
import { degrade } from "./issues";

export function buildFeatureMatrixPrompt(competitors: Competitor[], maxFeatures: number): string {
  const profiles = competitors.map((c) => ({
    name: c.name,
    description: c.description,
    notableFeatures: c.notableFeatures,
  }));

  return `
You are a product analyst building a competitive feature matrix.

Competitors:
${JSON.stringify(profiles, null, 2)}

---
Infer the ${maxFeatures} or fewer product features that best distinguish these competitors.
For every competitor, state whether it offers each feature: true, false, or a short
qualifier such as "partial" or "enterprise only".
Use the competitor names exactly as given.
Assign every feature to exactly one of these categories: ${FEATURE_CATEGORIES.join(", ")}.

Return ONLY valid JSON with this structure (no markdown, no explanations):

{
  "features": ["Feature A", "Feature B"],
  "matrix": {
    "Competitor name": { "Feature A": true, "Feature B": "partial" }
  },
  "categories": {
    "Core Features": ["Feature A"],
    "User Experience": ["Feature B"]
  }
}
`.trim();
}

export function normalizePresence(value: Presence): Presence {
  if (typeof value === "boolean") return value;

  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();
  if (lower === "yes" || lower === "true") return true;
  if (lower === "no" || lower === "false" || lower === "") return false;
  return trimmed;
}

/**
 * Aligns the model's matrix with the discovered competitors: rows for unknown
 * names are dropped, every competitor gets a row, and every row carries the
 * same features in the same order (unreported cells are `false`).
 */
export function normalizeFeatureMatrix(
  output: Pick<FeatureMatrixOutput, "features" | "matrix">,
  competitors: Competitor[],
  maxFeatures: number
): FeatureMatrix {
  const canonicalName = new Map(competitors.map((c) => [c.name.toLowerCase(), c.name]));

  // canonical competitor → (lowercased feature → presence)
  const reported = new Map<string, Map<string, Presence>>();
  const features: string[] = [];
  const featureKeys = new Set<string>();

  const addFeature = (feature: string) => {
    const name = feature.trim().replace(/\s+/g, " ");
    const key = name.toLowerCase();
    if (name && !featureKeys.has(key)) {
      featureKeys.add(key);
      features.push(name);
    }
  };

  output.features.forEach(addFeature);

  for (const [rawName, cells] of Object.entries(output.matrix)) {
    const name = canonicalName.get(rawName.trim().toLowerCase());
    if (!name) {
      console.warn(`⚠️ Dropping matrix row for unknown competitor "${rawName}".`);
      continue;
    }

    const row = reported.get(name) ?? new Map<string, Presence>();
    for (const [feature, value] of Object.entries(cells)) {
      addFeature(feature);
      const key = feature.trim().replace(/\s+/g, " ").toLowerCase();
      if (!row.has(key)) row.set(key, normalizePresence(value));
    }
    reported.set(name, row);
  }

  const kept = features.slice(0, maxFeatures);
  if (kept.length === 0) {
    throw new MalformedModelOutputError("Model response lists no features.");
  }

  const matrix: FeatureMatrix = {};
  for (const competitor of competitors) {
    const row = reported.get(competitor.name);
    matrix[competitor.name] = Object.fromEntries(
      kept.map((feature) => [feature, row?.get(feature.toLowerCase()) ?? false])
    );
  }
  return matrix;
}

/**
 * Maps every matrix feature to one known category. Unknown categories are
 * ignored and unassigned features land in "Other"; empty categories are left out.
 */
export function normalizeFeatureCategories(
  raw: FeatureCategories,
  features: string[]
): FeatureCategories {
  const canonicalFeature = new Map(features.map((f) => [f.toLowerCase(), f]));
  const canonicalCategory = new Map(FEATURE_CATEGORIES.map((c) => [c.toLowerCase(), c]));

  const assigned = new Map<string, string>();
  for (const [rawCategory, listed] of Object.entries(raw)) {
    const category = canonicalCategory.get(rawCategory.trim().toLowerCase());
    if (!category) continue;
    for (const item of listed) {
      const feature = canonicalFeature.get(item.replace(/\s+/g, " ").toLowerCase());
      if (feature && !assigned.has(feature)) assigned.set(feature, category);
    }
  }

  const categories: FeatureCategories = {};
  for (const category of [...FEATURE_CATEGORIES, OTHER_CATEGORY]) {
    const members = features.filter((f) => (assigned.get(f) ?? OTHER_CATEGORY) === category);
    if (members.length > 0) categories[category] = members;
  }
  return categories;
}

export const emptyFeatureAnalysis = (): FeatureAnalysis => ({ matrix: {}, categories: {} });

/**
 * Asks the model for a feature list, per-competitor presence values and
 * feature categories. No competitors means no model call and an empty matrix.
 */
export async function buildFeatureMatrix(
  competitors: Competitor[],
  ctx: AnalysisContext
): Promise<AgentResult<FeatureAnalysis>> {
  if (competitors.length === 0) {
    return { data: emptyFeatureAnalysis() };
  }

  const { maxFeatures, requestTimeoutMs } = ctx.config;
  try {
    const response = await chatWithLLM(ctx.llm, buildFeatureMatrixPrompt(competitors, maxFeatures), {
      timeoutMs: requestTimeoutMs,
    });
    const parsed = parseModelJson(response, FeatureMatrixOutputSchema);
    const matrix = normalizeFeatureMatrix(parsed, competitors, maxFeatures);
    const features = Object.keys(matrix[competitors[0].name]);
    return { data: { matrix, categories: normalizeFeatureCategories(parsed.categories, features) } };
  } catch (error) {
    return degrade("features", error, emptyFeatureAnalysis());
  }
}
