/**
 * Council metrics: closed enums, catalog/observation shapes, and the plain
 * output structures handed to callers (profiles, aggregations, scores).
 * Everything here is serializable; no behavior lives on these values.
 */

import { z } from "zod";

export const METRIC_CATEGORIES = [
  "financial",
  "service_delivery",
  "infrastructure",
  "environmental",
  "community",
  "economic",
] as const;
export type MetricCategory = (typeof METRIC_CATEGORIES)[number];
export const metricCategorySchema = z.enum(METRIC_CATEGORIES);

/** "unavailable" exists for completeness only; absent keys mean unavailable and are never stored. */
export const OBSERVATION_SOURCES = ["direct", "calculated", "estimated", "unavailable"] as const;
export type ObservationSource = (typeof OBSERVATION_SOURCES)[number];

export const OBSERVATION_CONFIDENCE = ["high", "medium", "low"] as const;
export type ObservationConfidence = (typeof OBSERVATION_CONFIDENCE)[number];

export const CONFIDENCE_GRADES = ["high", "medium", "low", "very_low"] as const;
export type ConfidenceGrade = (typeof CONFIDENCE_GRADES)[number];

export const UNIQUE_DATA_CATEGORIES = [
  "environmental",
  "infrastructure",
  "economic",
  "community",
  "performance",
] as const;
export type UniqueDataCategory = (typeof UNIQUE_DATA_CATEGORIES)[number];

export const ISSUE_STATUSES = ["reported", "in_progress", "resolved"] as const;
export type IssueStatus = (typeof ISSUE_STATUSES)[number];
export const issueStatusSchema = z.enum(ISSUE_STATUSES);

export const ISSUE_PRIORITIES = ["low", "medium", "high"] as const;
export type IssuePriority = (typeof ISSUE_PRIORITIES)[number];
export const issuePrioritySchema = z.enum(ISSUE_PRIORITIES);

export const MODERATION_STATUSES = ["pending", "approved", "rejected", "flagged"] as const;
export type ModerationStatus = (typeof MODERATION_STATUSES)[number];
export const moderationStatusSchema = z.enum(MODERATION_STATUSES);

export const metricDefinitionSchema = z.object({
  canonicalName: z.string().min(1),
  displayName: z.string().min(1),
  category: metricCategorySchema,
  description: z.string().default(""),
  unit: z.string(),
  lowerIsBetter: z.boolean().default(false),
  expectedAvailability: z.number().min(0).max(1).default(0.8),
  derivationFormula: z.string().min(1).nullable().default(null),
  alternativeNames: z.array(z.string().min(1)).default([]),
});

type MetricDefinitionInput = z.infer<typeof metricDefinitionSchema>;

export type MetricDefinition = Readonly<Omit<MetricDefinitionInput, "alternativeNames">> & {
  readonly alternativeNames: readonly string[];
};

/** region -> canonical name -> aliases */
export const regionSynonymsSchema = z.record(z.string(), z.record(z.string(), z.array(z.string().min(1))));
export type RegionSynonyms = z.infer<typeof regionSynonymsSchema>;

export type MetricObservation = {
  value: number;
  rawValue: number | null;
  source: Exclude<ObservationSource, "unavailable">;
  confidence: ObservationConfidence;
};

export type EntityRecord = {
  id: string;
  name: string;
  region: string;
  population: number | null;
  areaKm2: number | null;
};

/** Latest official figures held for an entity (annual report / state return). */
export type OfficialMetrics = {
  ratesRevenue: number | null;
  totalRevenue: number | null;
  totalExpenditure: number | null;
  populationServed: number | null;
  areaKm2: number | null;
  roadsMaintainedKm: number | null;
  customerSatisfaction: number | null;
  serviceDeliveryScore: number | null;
};

export type RatingRecord = {
  rating: number;
  category: string;
  createdAt: string;
  moderationStatus: ModerationStatus;
};

export type IssueRecord = {
  status: IssueStatus;
  createdAt: string;
  resolutionTimeDays: number | null;
  priority: IssuePriority;
};

export type UniqueDataPoint = {
  value: number | null;
  text: string | null;
  category: UniqueDataCategory;
  description: string;
};

export type EntityProfile = {
  entity: EntityRecord;
  observations: Record<string, MetricObservation>;
  uniqueData: Record<string, UniqueDataPoint>;
  dataSources: string[];
  coverageScore: number;
  missingMetrics: string[];
  builtAt: string;
};

export type AggregationResult = {
  canonicalName: string;
  entityCount: number;
  valueCount: number;
  coverage: number;
  mean: number | null;
  median: number | null;
  best: number | null;
  worst: number | null;
  /** entity id -> rank, 1 = best performer */
  rankingByEntity: Record<string, number>;
};

export type RegionAggregation = {
  region: string;
  totalEntities: number;
  profiledEntities: number;
  excludedEntities: string[];
  cancelled: boolean;
  metrics: Record<string, AggregationResult>;
};

export type ComparisonMetric = {
  displayName: string;
  unit: string;
  lowerIsBetter: boolean;
  values: Record<string, number>;
  ranking: Record<string, number>;
};

export type ComparisonMatrix = {
  entityIds: string[];
  metrics: Record<string, ComparisonMetric>;
};

export type MetricBenchmark = {
  displayName: string;
  unit: string;
  lowerIsBetter: boolean;
  value: number;
  regionMean: number;
  regionMedian: number;
  /** Percentage of region values strictly better than this entity's. */
  percentileRank: number;
  /** 1 + number of strictly better values; ties share a rank. */
  rank: number;
  /** Region entities with a value for this metric. */
  total: number;
};

export type EntityBenchmark = {
  entityId: string;
  region: string;
  regionEntityCount: number;
  metrics: Record<string, MetricBenchmark>;
};

export type TopPerformer = {
  entityId: string;
  name: string;
  region: string;
  value: number;
  source: MetricObservation["source"];
};

export type TopPerformers = {
  canonicalName: string;
  displayName: string;
  unit: string;
  lowerIsBetter: boolean;
  performers: TopPerformer[];
  /** Entities that had a value, before the limit was applied. */
  totalWithValue: number;
};

export const SCORE_COMPONENTS = [
  "customerSatisfaction",
  "serviceDelivery",
  "valueForRates",
  "responsiveness",
] as const;
export type ScoreComponentName = (typeof SCORE_COMPONENTS)[number];

export type ComponentReason = "insufficient_data" | "no_resolved_issues" | "missing_required_inputs";

export type ComponentScore = {
  score: number;
  confidence: ConfidenceGrade;
  sampleSize: number;
  reason?: ComponentReason;
  details?: Record<string, number>;
};

export type CompositeScore = {
  overallScore: number;
  components: Record<ScoreComponentName, ComponentScore>;
  overallConfidence: ConfidenceGrade;
  sampleSizes: { ratings: number; issues: number };
  computedAt: string;
};

export type RedFlagIndex = {
  recentCount: number;
  previousCount: number;
  spikeRatio: number;
  score: number;
  confidence: Extract<ConfidenceGrade, "medium" | "low">;
};
