import type { AnalysisContext } from "../context";
import { InvalidInputError } from "../errors";
import { chatWithLLM } from "../llm";
import { CompetitorListSchema, parseModelJson, type CompetitorListOutput } from "../model-output";
import type { AgentResult, Competitor, SearchResult } from "../types";
import { degrade } from "./issues";

// Review and comparison sites mention many products; they are context, not a source for one.
const AGGREGATOR_MARKERS = ["capterra", "softwareworld", "alternatives", "comparison", "review"];

export function isAggregatorUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return AGGREGATOR_MARKERS.some((marker) => lower.includes(marker));
}

export function requireIdea(idea: string): string {
  const trimmed = idea.trim();
  if (!trimmed) {
    throw new InvalidInputError("Describe your startup idea before running the analysis.");
  }
  return trimmed;
}

export function buildDiscoveryQuery(idea: string): string {
  return `top ${idea.replace(/\s+/g, " ").trim()} competitors alternatives`;
}

function formatResults(results: SearchResult[]): string {
  return results
    .map((r, i) => `[${i + 1}] ${r.title || "(untitled)"}\nURL: ${r.url}\n${r.snippet}`)
    .join("\n\n");
}

export function buildDiscoveryPrompt(
  idea: string,
  results: SearchResult[],
  maxCompetitors: number
): string {
  return `
You are a startup market analyst.

Startup Idea:
${idea}

Web search results that may mention existing competitors:
${formatResults(results)}

---
Identify up to ${maxCompetitors} real companies or products that compete with this idea.
Only use companies supported by the search results above; do not invent companies.
For each competitor give:
- "name": the company or product name
- "description": one or two sentences on what it offers
- "notableFeatures": 3-6 short feature names
- "sourceUrls": the URLs from the results above that mention it
- "pricingModel": how it charges, e.g. "Freemium, $12/month Pro" (omit if unknown)
- "targetAudience": who it is built for (omit if unknown)
- "usp": its unique selling proposition in one sentence (omit if unknown)

Return ONLY valid JSON with this structure (no markdown, no explanations):

{
  "competitors": [
    {
      "name": "...",
      "description": "...",
      "notableFeatures": ["..."],
      "sourceUrls": ["..."],
      "pricingModel": "...",
      "targetAudience": "...",
      "usp": "..."
    }
  ]
}

If the results describe no competitors, return { "competitors": [] }.
`.trim();
}

function uniqueCaseInsensitive(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (value && !seen.has(key)) {
      seen.add(key);
      out.push(value);
    }
  }
  return out;
}

type RawCompetitor = CompetitorListOutput["competitors"][number];

const PROFILE_FIELDS = ["pricingModel", "targetAudience", "usp"] as const;

// Fills profile fields the competitor does not have yet; "N/A" counts as unknown.
function mergeProfile(target: Competitor, entry: RawCompetitor): void {
  for (const field of PROFILE_FIELDS) {
    const value = entry[field];
    if (!target[field] && value && value.toLowerCase() !== "n/a") target[field] = value;
  }
}

/**
 * Merges duplicate names (first spelling wins) and keeps only source URLs
 * that came back from the search and are not aggregator pages.
 */
export function normalizeCompetitors(
  raw: RawCompetitor[],
  results: SearchResult[],
  maxCompetitors: number
): Competitor[] {
  const allowedUrls = new Set(results.map((r) => r.url).filter((url) => !isAggregatorUrl(url)));
  const byName = new Map<string, Competitor>();

  for (const entry of raw) {
    const name = entry.name.replace(/\s+/g, " ");
    if (!name) continue;

    const urls = entry.sourceUrls.filter((url) => allowedUrls.has(url));
    const existing = byName.get(name.toLowerCase());
    if (existing) {
      existing.notableFeatures = uniqueCaseInsensitive([
        ...existing.notableFeatures,
        ...entry.notableFeatures,
      ]);
      existing.sourceUrls = [...new Set([...existing.sourceUrls, ...urls])];
      if (!existing.description) existing.description = entry.description;
      mergeProfile(existing, entry);
      continue;
    }

    const competitor: Competitor = {
      name,
      description: entry.description,
      notableFeatures: uniqueCaseInsensitive(entry.notableFeatures),
      sourceUrls: [...new Set(urls)],
    };
    mergeProfile(competitor, entry);
    byName.set(name.toLowerCase(), competitor);
  }

  return [...byName.values()].slice(0, maxCompetitors);
}

/**
 * Searches the web for the idea and asks the model to extract competitors.
 * An empty search yields an empty list without a model call; search and model
 * failures degrade to an empty list with an issue.
 */
export async function discoverCompetitors(
  idea: string,
  ctx: AnalysisContext
): Promise<AgentResult<Competitor[]>> {
  const query = requireIdea(idea);
  const { searchMaxResults, maxCompetitors, requestTimeoutMs } = ctx.config;

  try {
    const results = await ctx.search.search(buildDiscoveryQuery(query), {
      maxResults: searchMaxResults,
    });
    console.log(`🔎 Search returned ${results.length} result(s).`);

    if (results.length === 0) {
      return { data: [] };
    }

    const response = await chatWithLLM(
      ctx.llm,
      buildDiscoveryPrompt(query, results, maxCompetitors),
      { timeoutMs: requestTimeoutMs }
    );
    const parsed = parseModelJson(response, CompetitorListSchema);

    return { data: normalizeCompetitors(parsed.competitors, results, maxCompetitors) };
  } catch (error) {
    return degrade("discovery", error, []);
  }
}
