import { RenderError } from "../errors";
import { OTHER_CATEGORY } from "../feature-categories";
import type {
  AnalysisBundle,
  ChartData,
  Competitor,
  DifferentiationReport,
  FeatureCategories,
  FeatureGap,
  FeatureMatrix,
  LandscapeEntry,
  PipelineIssue,
  Presence,
} from "../types";

const ABSENT = new Set(["", "no", "none", "false", "n/a"]);
const PARTIAL = /\b(partial\w*|limited|basic|some|beta|planned)\b/;

/** 1 = offered, 0.5 = partially offered, 0 = absent. */
export function scorePresence(value: Presence): number {
  if (typeof value === "boolean") return value ? 1 : 0;

  const lower = value.trim().toLowerCase();
  if (ABSENT.has(lower)) return 0;
  if (PARTIAL.test(lower)) return 0.5;
  return 1;
}

export function emptyChart(): ChartData {
  return { categories: [], series: [], coverage: [], gaps: [], byCategory: [], empty: true };
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/**
 * One category per competitor, one series per feature. Throws a RenderError
 * for an inconsistent matrix: an orphan row, or rows with different features.
 * Features missing from `featureCategories` are grouped under "Other".
 */
export function buildChartData(
  matrix: FeatureMatrix,
  competitors: Competitor[],
  featureCategories: FeatureCategories = {}
): ChartData {
  const known = new Set(competitors.map((c) => c.name));
  const orphans = Object.keys(matrix).filter((name) => !known.has(name));
  if (orphans.length > 0) {
    throw new RenderError(`Feature matrix references unknown competitors: ${orphans.join(", ")}`);
  }

  const categories = competitors.map((c) => c.name).filter((name) => Object.hasOwn(matrix, name));
  if (categories.length === 0) return emptyChart();

  const features = Object.keys(matrix[categories[0]]);
  for (const name of categories) {
    const row = Object.keys(matrix[name]);
    if (row.length !== features.length || features.some((f) => !Object.hasOwn(matrix[name], f))) {
      throw new RenderError(`Feature matrix row for "${name}" has a different feature set.`);
    }
  }
  if (features.length === 0) return emptyChart();

  const series = features.map((feature) => ({
    feature,
    values: categories.map((name) => scorePresence(matrix[name][feature])),
  }));

  const coverage = series.map(({ feature, values }) => ({
    feature,
    competitors: categories.filter((_, i) => values[i] > 0),
    score: round2(values.reduce((sum, v) => sum + v, 0) / values.length),
  }));

  const categoryOf = new Map<string, string>();
  for (const [category, members] of Object.entries(featureCategories)) {
    for (const feature of members) {
      if (!categoryOf.has(feature)) categoryOf.set(feature, category);
    }
  }
  const featureCategory = (feature: string) => categoryOf.get(feature) ?? OTHER_CATEGORY;

  const gaps: FeatureGap[] = [];
  for (const { feature, competitors: offeredBy } of coverage) {
    const category = featureCategory(feature);
    if (offeredBy.length === 0) {
      gaps.push({ feature, category, kind: "complete", offeredBy });
    } else if (offeredBy.length < categories.length / 2) {
      gaps.push({ feature, category, kind: "partial", offeredBy });
    }
  }

  const byCategory = [...new Set([...Object.keys(featureCategories), OTHER_CATEGORY])]
    .map((category) => ({
      category,
      members: series.filter((s) => featureCategory(s.feature) === category),
    }))
    .filter(({ members }) => members.length > 0)
    .map(({ category, members }) => ({
      category,
      counts: categories.map((_, i) => members.filter((m) => m.values[i] > 0).length),
    }));

  return { categories, series, coverage, gaps, byCategory, empty: false };
}

/** Pricing, audience and USP side by side, with the number of features each offers. */
export function buildLandscape(competitors: Competitor[], matrix: FeatureMatrix): LandscapeEntry[] {
  return competitors.map((competitor) => {
    const row = Object.hasOwn(matrix, competitor.name) ? matrix[competitor.name] : undefined;
    const featureCount = row
      ? Object.values(row).filter((value) => scorePresence(value) > 0).length
      : competitor.notableFeatures.length;

    return {
      name: competitor.name,
      pricingModel: competitor.pricingModel ?? "N/A",
      targetAudience: competitor.targetAudience ?? "N/A",
      usp: competitor.usp ?? "N/A",
      featureCount,
    };
  });
}

export interface BundleInput {
  query: string;
  competitors: Competitor[];
  featureMatrix: FeatureMatrix;
  featureCategories: FeatureCategories;
  report: DifferentiationReport;
  chart: ChartData;
  issues: PipelineIssue[];
  generatedAt: Date;
}

export function assembleBundle(input: BundleInput): AnalysisBundle {
  return {
    version: 1,
    generatedAt: input.generatedAt.toISOString(),
    query: input.query,
    competitors: input.competitors,
    featureMatrix: input.featureMatrix,
    featureCategories: input.featureCategories,
    report: input.report,
    chart: input.chart,
    landscape: buildLandscape(input.competitors, input.featureMatrix),
    issues: input.issues,
    partial: input.issues.length > 0,
  };
}
