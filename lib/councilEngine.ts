/**
 * Engine facade. Wires catalog, matcher, normalizer, profile builder, pool and
 * scoring by explicit injection; nothing here is a module-level singleton.
 *
 * Only catalog load errors escape (at construction). Data-access failures are
 * logged and degrade the result.
 */

import type {
  ComparisonMatrix,
  CompositeScore,
  EntityBenchmark,
  EntityProfile,
  IssueRecord,
  OfficialMetrics,
  RatingRecord,
  RedFlagIndex,
  RegionAggregation,
  TopPerformers,
} from "./metricContract";
import { loadDefaultCatalog, type MetricCatalog } from "./metricCatalog";
import { createMetricMatcher } from "./metricMatcher";
import { createValueNormalizer } from "./valueNormalizer";
import { createProfileBuilder } from "./profileBuilder";
import { createAggregationPool, type AggregateRegionOptions } from "./aggregationPool";
import { benchmarkEntity, buildComparison, topPerformers } from "./aggregator";
import { buildConsistencyReport, type ConsistencyReport } from "./consistencyReport";
import { computeCompositeScore } from "./scoringEngine";
import { computeRedFlagIndex } from "./redFlagIndex";
import { getScoringModelMetadata, type ScoringModelMetadata } from "./scoringModel";
import { errorMessage, withTimeout } from "./dataAccess";
import { loadEngineConfig, type EngineConfig } from "./engineConfig";
import { createLogger, type Logger } from "./logger";
import type { EntityRepository } from "./entityRepository";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Sequential reads in one profile build: entity, peer candidates, peer metrics. */
const PROFILE_READ_STAGES = 3;

export const MIN_COMPARISON_ENTITIES = 2;
export const MAX_COMPARISON_ENTITIES = 10;
export const DEFAULT_TOP_PERFORMER_LIMIT = 10;

export class ComparisonRequestError extends Error {
  constructor(count: number) {
    super(`comparison needs ${MIN_COMPARISON_ENTITIES}-${MAX_COMPARISON_ENTITIES} entities, got ${count}`);
    this.name = "ComparisonRequestError";
  }
}

export type CompareOptions = {
  /** Canonical names to keep; all catalog metrics when omitted or empty. */
  metrics?: string[];
};

export type TopPerformerOptions = {
  region: string;
  limit?: number;
};

export type CouncilEngineDeps = {
  repository: EntityRepository;
  catalog?: MetricCatalog;
  config?: EngineConfig;
  logger?: Logger;
  /** Clock for scoring windows and profile timestamps. */
  now?: () => Date;
};

export type CouncilEngine = {
  readonly catalog: MetricCatalog;
  readonly config: EngineConfig;
  buildProfile(entityId: string): Promise<EntityProfile | null>;
  aggregateRegion(region: string, options?: AggregateRegionOptions): Promise<RegionAggregation>;
  /** Throws ComparisonRequestError unless 2-10 distinct ids are given. */
  compareEntities(entityIds: string[], options?: CompareOptions): Promise<ComparisonMatrix>;
  /** null when the entity does not exist (or cannot be loaded). */
  benchmarkEntity(entityId: string): Promise<EntityBenchmark | null>;
  /** null when the metric is not in the catalog. */
  topPerformers(canonicalName: string, options: TopPerformerOptions): Promise<TopPerformers | null>;
  /** null when the entity does not exist (or cannot be loaded). */
  compositeScore(entityId: string): Promise<CompositeScore | null>;
  redFlagIndex(entityId: string): Promise<RedFlagIndex>;
  consistencyReport(region: string): Promise<ConsistencyReport>;
  scoringModel(): ScoringModelMetadata;
};

export function createCouncilEngine(deps: CouncilEngineDeps): CouncilEngine {
  const config = deps.config ?? loadEngineConfig(process.env);
  const logger = deps.logger ?? createLogger("council-engine", { debug: config.debug });
  const catalog = deps.catalog ?? loadDefaultCatalog();
  const now = deps.now ?? (() => new Date());
  const { repository } = deps;

  const builder = createProfileBuilder({
    catalog,
    matcher: createMetricMatcher(catalog),
    normalizer: createValueNormalizer(catalog, logger),
    repository,
    peerOptions: { limit: config.peerGroupLimit, populationBand: config.peerPopulationBand },
    timeoutMs: config.dataAccessTimeoutMs,
    logger,
    now,
  });

  const pool = createAggregationPool({
    catalog,
    repository,
    builder,
    options: {
      concurrency: config.aggregationConcurrency,
      timeoutMs: config.dataAccessTimeoutMs,
      buildTimeoutMs: config.dataAccessTimeoutMs * PROFILE_READ_STAGES,
    },
    logger,
  });

  /** Timeout-bounded read; on failure logs and returns `fallback`. */
  async function read<T>(label: string, entityId: string, fn: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await withTimeout(fn(), config.dataAccessTimeoutMs, `${label} ${entityId}`);
    } catch (err) {
      logger.warn(`${label} lookup failed; continuing without it`, { entityId, error: errorMessage(err) });
      return fallback;
    }
  }

  function regionEntityIds(region: string): Promise<string[]> {
    return read(
      "region listing",
      region,
      async () => (await repository.listEntitiesByRegion(region)).map((e) => e.id),
      []
    );
  }

  return {
    catalog,
    config,

    buildProfile(entityId) {
      return builder.build(entityId);
    },

    aggregateRegion(region, options) {
      return pool.aggregateRegion(region, options);
    },

    async compareEntities(entityIds, options = {}) {
      const ids = [...new Set(entityIds)];
      if (ids.length < MIN_COMPARISON_ENTITIES || ids.length > MAX_COMPARISON_ENTITIES) {
        throw new ComparisonRequestError(ids.length);
      }
      const profiles = await pool.buildProfiles(ids);
      return buildComparison(profiles, catalog, options.metrics);
    },

    async benchmarkEntity(entityId) {
      const profile = await builder.build(entityId);
      if (!profile) return null;
      const peerIds = (await regionEntityIds(profile.entity.region)).filter((id) => id !== entityId);
      const regionProfiles = await pool.buildProfiles(peerIds);
      return benchmarkEntity(profile, [profile, ...regionProfiles], catalog);
    },

    async topPerformers(canonicalName, options) {
      const definition = catalog.get(canonicalName);
      if (!definition) return null;
      const profiles = await pool.buildProfiles(await regionEntityIds(options.region));
      return topPerformers(profiles, definition, options.limit ?? DEFAULT_TOP_PERFORMER_LIMIT);
    },

    async compositeScore(entityId) {
      const entity = await read("entity", entityId, () => repository.getEntity(entityId), null);
      if (!entity) return null;

      const at = now();
      const since = new Date(at.getTime() - config.ratingWindowDays * DAY_MS).toISOString();
      const noMetrics: OfficialMetrics | null = null;
      const noRatings: RatingRecord[] = [];
      const noIssues: IssueRecord[] = [];
      const [official, ratings, issues] = await Promise.all([
        read("official metrics", entityId, () => repository.getOfficialMetrics(entityId), noMetrics),
        read("ratings", entityId, () => repository.getRatings(entityId, since), noRatings),
        read("issues", entityId, () => repository.getIssues(entityId), noIssues),
      ]);

      const score = computeCompositeScore({
        entity,
        official,
        ratings,
        issues,
        now: at,
        ratingWindowDays: config.ratingWindowDays,
      });
      logger.debug("composite score", { entityId, overall: score.overallScore, confidence: score.overallConfidence });
      return score;
    },

    async redFlagIndex(entityId) {
      const noIssues: IssueRecord[] = [];
      const issues = await read("issues", entityId, () => repository.getIssues(entityId), noIssues);
      return computeRedFlagIndex(issues, now(), config.redFlagWindowDays);
    },

    async consistencyReport(region) {
      const profiles = await pool.buildProfiles(await regionEntityIds(region));
      return buildConsistencyReport(profiles, catalog);
    },

    scoringModel() {
      return getScoringModelMetadata(config);
    },
  };
}
