import type { ErrorCode } from "./errors";

export interface SearchResult {
  title: string;
  snippet: string;
  url: string;
}

export interface Competitor {
  name: string;
  description: string;
  notableFeatures: string[];
  sourceUrls: string[];
  pricingModel?: string;
  targetAudience?: string;
  /** unique selling proposition */
  usp?: string;
}

/** `true`/`false`, or a short qualitative value such as "partial". */
export type Presence = boolean | string;

/** competitor name → feature name → presence */
export type FeatureMatrix = Record<string, Record<string, Presence>>;

/** category → features of the matrix in that category */
export type FeatureCategories = Record<string, string[]>;

export interface FeatureAnalysis {
  matrix: FeatureMatrix;
  categories: FeatureCategories;
}

export type OpportunityType = "whitespace" | "innovation" | "pricing" | "niche";

export interface MarketOpportunity {
  type: OpportunityType;
  category: string;
  description: string;
}

export interface DifferentiationReport {
  gaps: string[];
  opportunities: string[];
  positioningNarrative: string;
  keyDifferentiators: string[];
  opportunityMap: MarketOpportunity[];
}

export interface ChartSeries {
  feature: string;
  values: number[];
}

export interface FeatureCoverage {
  feature: string;
  competitors: string[];
  score: number;
}

export type GapKind = "complete" | "partial";

export interface FeatureGap {
  feature: string;
  category: string;
  kind: GapKind;
  offeredBy: string[];
}

/** Features offered per competitor within one feature category. */
export interface CategoryComparison {
  category: string;
  counts: number[];
}

export interface ChartData {
  categories: string[];
  series: ChartSeries[];
  coverage: FeatureCoverage[];
  gaps: FeatureGap[];
  byCategory: CategoryComparison[];
  empty: boolean;
}

export interface LandscapeEntry {
  name: string;
  pricingModel: string;
  targetAudience: string;
  usp: string;
  /** features offered, fully or partially */
  featureCount: number;
}

export type PipelineStep = "discovery" | "features" | "strategy" | "chart";

export interface PipelineIssue {
  step: PipelineStep;
  code: ErrorCode;
  message: string;
}

export interface AnalysisBundle {
  version: 1;
  generatedAt: string;
  query: string;
  competitors: Competitor[];
  featureMatrix: FeatureMatrix;
  featureCategories: FeatureCategories;
  report: DifferentiationReport;
  chart: ChartData;
  landscape: LandscapeEntry[];
  issues: PipelineIssue[];
  partial: boolean;
}

export type ProgressStatus = "started" | "completed";

export interface ProgressEvent {
  step: PipelineStep;
  status: ProgressStatus;
}

/** A step's output plus the issue that degraded it, if any. */
export interface AgentResult<T> {
  data: T;
  issue?: PipelineIssue;
}
