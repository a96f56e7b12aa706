/**
 * Builds one council's standardized profile from every raw payload source.
 *
 * Per catalog metric, in catalog order:
 *   1. direct key in the flattened payload          → direct / high
 *   2. a payload key the matcher resolves to it     → normalized, calculated|direct / high
 *   3. peer estimate (per-capita metrics only)      → estimated / medium
 * Unresolved metrics are left out. Payload keys not consumed by any observation
 * are kept as unique data with a keyword-inferred category.
 */

import type {
  EntityProfile,
  EntityRecord,
  MetricDefinition,
  MetricObservation,
  UniqueDataCategory,
  UniqueDataPoint,
} from "./metricContract";
import type { MetricCatalog } from "./metricCatalog";
import type { MetricMatcher } from "./metricMatcher";
import type { ValueNormalizer } from "./valueNormalizer";
import type { FormulaContext } from "./formulaEvaluator";
import type { EntityRepository } from "./entityRepository";
import type { Logger } from "./logger";
import {
  estimate,
  isPerCapitaMetric,
  peerPopulationRange,
  peerSnapshotFromMetrics,
  type PeerSetOptions,
  type PeerSnapshot,
} from "./peerEstimator";
import { flattenPayload, mergeFlatPayloads, type FlatPayload } from "./rawPayload";
import { errorMessage, withTimeout } from "./dataAccess";

/** Checked in this order; first category with a matching substring wins. */
const UNIQUE_DATA_KEYWORDS: [UniqueDataCategory, string[]][] = [
  ["environmental", ["carbon", "emission", "environment", "sustainability"]],
  ["infrastructure", ["bike", "path", "park", "infrastructure", "road"]],
  ["economic", ["economic", "business", "employment", "job"]],
  ["community", ["community", "engagement", "participation"]],
];

export function inferUniqueDataCategory(rawKey: string): UniqueDataCategory {
  const lower = rawKey.toLowerCase();
  for (const [category, terms] of UNIQUE_DATA_KEYWORDS) {
    if (terms.some((t) => lower.includes(t))) return category;
  }
  return "performance";
}

export type ResolveInput = {
  entity: EntityRecord;
  flat: FlatPayload;
  peers: PeerSnapshot[];
};

export type ProfileBuilderDeps = {
  catalog: MetricCatalog;
  matcher: MetricMatcher;
  normalizer: ValueNormalizer;
  repository: EntityRepository;
  peerOptions: PeerSetOptions;
  /** Deadline for each repository read. */
  timeoutMs: number;
  logger: Logger;
  now?: () => Date;
};

/** Entity identity exposed to derivation formulas; payload keys override. */
function formulaContext(entity: EntityRecord, flat: FlatPayload): FormulaContext {
  const context: Record<string, number | null> = {
    population_served: entity.population,
    area_km2: entity.areaKm2,
  };
  for (const [k, v] of flat.numbers) context[k] = v;
  return context;
}

function resolveObservation(
  def: MetricDefinition,
  input: ResolveInput,
  deps: Pick<ProfileBuilderDeps, "matcher" | "normalizer" | "peerOptions">,
  context: FormulaContext
): MetricObservation | null {
  const { entity, flat, peers } = input;

  const direct = flat.numbers.get(def.canonicalName);
  if (direct != null) {
    return { value: direct, rawValue: direct, source: "direct", confidence: "high" };
  }

  for (const [rawKey, rawValue] of flat.numbers) {
    if (deps.matcher.match(rawKey, entity.region)?.canonicalName !== def.canonicalName) continue;
    const normalized = deps.normalizer.normalize(rawValue, def.canonicalName, context);
    return {
      value: normalized.value,
      rawValue,
      source: normalized.calculated ? "calculated" : "direct",
      confidence: "high",
    };
  }

  const estimated = estimate(def.canonicalName, entity, peers, deps.peerOptions);
  if (estimated != null) {
    return { value: estimated, rawValue: null, source: "estimated", confidence: "medium" };
  }
  return null;
}

function extractUniqueData(
  flat: FlatPayload,
  observations: Record<string, MetricObservation>
): Record<string, UniqueDataPoint> {
  const consumed = new Set<number>();
  for (const obs of Object.values(observations)) {
    if (obs.rawValue != null) consumed.add(obs.rawValue);
  }
  const unique: Record<string, UniqueDataPoint> = {};
  for (const [rawKey, value] of flat.numbers) {
    if (consumed.has(value)) continue;
    unique[rawKey] = {
      value,
      text: null,
      category: inferUniqueDataCategory(rawKey),
      description: `Raw metric: ${rawKey}`,
    };
  }
  for (const [rawKey, text] of flat.texts) {
    if (flat.numbers.has(rawKey)) continue;
    unique[rawKey] = {
      value: null,
      text,
      category: inferUniqueDataCategory(rawKey),
      description: `Raw text: ${rawKey}`,
    };
  }
  return unique;
}

/** Pure profile assembly from already-fetched inputs. */
export function assembleProfile(
  input: ResolveInput & { dataSources: string[] },
  deps: Pick<ProfileBuilderDeps, "catalog" | "matcher" | "normalizer" | "peerOptions">,
  builtAt: Date = new Date()
): EntityProfile {
  const context = formulaContext(input.entity, input.flat);
  const observations: Record<string, MetricObservation> = {};
  for (const def of deps.catalog.all()) {
    const obs = resolveObservation(def, input, deps, context);
    if (obs) observations[def.canonicalName] = obs;
  }
  const present = Object.keys(observations);
  const coverageScore = deps.catalog.size > 0 ? present.length / deps.catalog.size : 0;
  return {
    entity: input.entity,
    observations,
    uniqueData: extractUniqueData(input.flat, observations),
    dataSources: input.dataSources,
    coverageScore,
    missingMetrics: deps.catalog.missingFrom(present),
    builtAt: builtAt.toISOString(),
  };
}

export type ProfileBuilder = {
  build(entityId: string): Promise<EntityProfile | null>;
};

export function createProfileBuilder(deps: ProfileBuilderDeps): ProfileBuilder {
  const { repository, logger, timeoutMs } = deps;
  const needsPeers = deps.catalog.all().some((d) => isPerCapitaMetric(d.canonicalName));

  function bounded<T>(promise: Promise<T>, label: string): Promise<T> {
    return withTimeout(promise, timeoutMs, label);
  }

  async function loadPeerSnapshot(peer: EntityRecord): Promise<PeerSnapshot> {
    const metrics = await bounded(repository.getOfficialMetrics(peer.id), `official metrics ${peer.id}`);
    return peerSnapshotFromMetrics(peer, metrics);
  }

  async function loadPeers(entity: EntityRecord): Promise<PeerSnapshot[]> {
    const range = peerPopulationRange(entity.population, deps.peerOptions.populationBand);
    if (!range || !needsPeers) return [];
    let candidates: EntityRecord[];
    try {
      candidates = await bounded(
        repository.findPeerCandidates({
          region: entity.region,
          minPopulation: range.min,
          maxPopulation: range.max,
          limit: deps.peerOptions.limit,
          excludeId: entity.id,
        }),
        `peer candidates ${entity.id}`
      );
    } catch (err) {
      logger.warn("peer lookup failed; estimation disabled for this build", {
        entityId: entity.id,
        error: errorMessage(err),
      });
      return [];
    }

    const settled = await Promise.allSettled(candidates.map(loadPeerSnapshot));
    const peers: PeerSnapshot[] = [];
    settled.forEach((result, i) => {
      if (result.status === "fulfilled") {
        peers.push(result.value);
        return;
      }
      logger.warn("peer metrics unavailable; peer skipped", {
        entityId: entity.id,
        peerId: candidates[i].id,
        error: errorMessage(result.reason),
      });
    });
    return peers;
  }

  async function loadFlatPayload(entityId: string): Promise<{ flat: FlatPayload; dataSources: string[] }> {
    try {
      const sources = await bounded(repository.getRawPayloads(entityId), `raw payloads ${entityId}`);
      return {
        flat: mergeFlatPayloads(sources.map((s) => flattenPayload(s.payload))),
        dataSources: sources.map((s) => s.source),
      };
    } catch (err) {
      logger.warn("raw payload lookup failed; building from peers only", {
        entityId,
        error: errorMessage(err),
      });
      return { flat: { numbers: new Map(), texts: new Map() }, dataSources: [] };
    }
  }

  return {
    async build(entityId) {
      let entity: EntityRecord | null;
      try {
        entity = await bounded(repository.getEntity(entityId), `entity ${entityId}`);
      } catch (err) {
        logger.error("entity lookup failed", { entityId, error: errorMessage(err) });
        return null;
      }
      if (!entity) {
        logger.debug("entity not found", { entityId });
        return null;
      }

      const [{ flat, dataSources }, peers] = await Promise.all([loadFlatPayload(entity.id), loadPeers(entity)]);
      const profile = assembleProfile(
        { entity, flat, peers, dataSources },
        deps,
        deps.now ? deps.now() : new Date()
      );
      logger.debug("profile built", {
        entityId,
        coverage: profile.coverageScore,
        observations: Object.keys(profile.observations).length,
        uniqueData: Object.keys(profile.uniqueData).length,
      });
      return profile;
    },
  };
}
