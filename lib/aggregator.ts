/**
 * Cross-entity statistics for benchmarking: coverage, mean, median, best/worst
 * and rank per entity. Direction comes from the metric's lowerIsBetter flag.
 */

import type {
  AggregationResult,
  ComparisonMatrix,
  EntityBenchmark,
  EntityProfile,
  MetricBenchmark,
  MetricDefinition,
  TopPerformers,
} from "./metricContract";
import type { MetricCatalog } from "./metricCatalog";

type EntityValue = { entityId: string; value: number };

function collectValues(profiles: EntityProfile[], canonicalName: string): EntityValue[] {
  const out: EntityValue[] = [];
  for (const p of profiles) {
    const obs = p.observations[canonicalName];
    if (obs && Number.isFinite(obs.value)) out.push({ entityId: p.entity.id, value: obs.value });
  }
  return out;
}

/**
 * Element at floor(n/2) of the ascending sort. For even n this is the upper
 * of the two middle values, not their average.
 */
export function upperMiddleMedian(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/** Rank 1 = best; ties keep input order (Array.prototype.sort is stable). */
export function rankEntities(values: EntityValue[], lowerIsBetter: boolean): Record<string, number> {
  const sorted = [...values].sort((a, b) => (lowerIsBetter ? a.value - b.value : b.value - a.value));
  const ranking: Record<string, number> = {};
  sorted.forEach((v, i) => {
    ranking[v.entityId] = i + 1;
  });
  return ranking;
}

/**
 * @param entityCount denominator for coverage; defaults to the number of profiles
 *   (region aggregation passes the full registry count so excluded entities lower coverage).
 */
export function aggregate(
  profiles: EntityProfile[],
  definition: Pick<MetricDefinition, "canonicalName" | "lowerIsBetter">,
  entityCount: number = profiles.length
): AggregationResult {
  const entries = collectValues(profiles, definition.canonicalName);
  const values = entries.map((e) => e.value);
  const base = {
    canonicalName: definition.canonicalName,
    entityCount,
    valueCount: values.length,
    coverage: entityCount > 0 ? values.length / entityCount : 0,
  };
  if (values.length === 0) {
    return { ...base, mean: null, median: null, best: null, worst: null, rankingByEntity: {} };
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  return {
    ...base,
    mean: values.reduce((s, v) => s + v, 0) / values.length,
    median: upperMiddleMedian(values),
    best: definition.lowerIsBetter ? min : max,
    worst: definition.lowerIsBetter ? max : min,
    rankingByEntity: rankEntities(entries, definition.lowerIsBetter),
  };
}

/** One AggregationResult per catalog metric that has at least one value. */
export function aggregateAll(
  profiles: EntityProfile[],
  catalog: MetricCatalog,
  entityCount: number = profiles.length
): Record<string, AggregationResult> {
  const out: Record<string, AggregationResult> = {};
  for (const def of catalog.all()) {
    const result = aggregate(profiles, def, entityCount);
    if (result.valueCount > 0) out[def.canonicalName] = result;
  }
  return out;
}

/**
 * Side-by-side values and rankings for an explicit set of councils.
 * `metricNames` restricts the matrix to those metrics; unknown names are ignored.
 */
export function buildComparison(
  profiles: EntityProfile[],
  catalog: MetricCatalog,
  metricNames?: readonly string[]
): ComparisonMatrix {
  const metrics: ComparisonMatrix["metrics"] = {};
  const wanted = metricNames && metricNames.length > 0 ? new Set(metricNames) : null;
  for (const def of catalog.all()) {
    if (wanted && !wanted.has(def.canonicalName)) continue;
    const entries = collectValues(profiles, def.canonicalName);
    const values: Record<string, number> = {};
    for (const e of entries) values[e.entityId] = e.value;
    metrics[def.canonicalName] = {
      displayName: def.displayName,
      unit: def.unit,
      lowerIsBetter: def.lowerIsBetter,
      values,
      ranking: entries.length > 0 ? rankEntities(entries, def.lowerIsBetter) : {},
    };
  }
  return { entityIds: profiles.map((p) => p.entity.id), metrics };
}

function isBetter(candidate: number, than: number, lowerIsBetter: boolean): boolean {
  return lowerIsBetter ? candidate < than : candidate > than;
}

/**
 * One entity's standing in its region for every catalog metric it has.
 * `regionProfiles` should include the entity itself; its own value counts
 * toward the mean, median and total.
 */
export function benchmarkEntity(
  profile: EntityProfile,
  regionProfiles: EntityProfile[],
  catalog: MetricCatalog
): EntityBenchmark {
  const metrics: Record<string, MetricBenchmark> = {};
  for (const def of catalog.all()) {
    const own = profile.observations[def.canonicalName];
    if (!own || !Number.isFinite(own.value)) continue;
    const values = collectValues(regionProfiles, def.canonicalName).map((e) => e.value);
    const median = upperMiddleMedian(values);
    if (median == null) continue;
    const betterCount = values.filter((v) => isBetter(v, own.value, def.lowerIsBetter)).length;
    metrics[def.canonicalName] = {
      displayName: def.displayName,
      unit: def.unit,
      lowerIsBetter: def.lowerIsBetter,
      value: own.value,
      regionMean: values.reduce((s, v) => s + v, 0) / values.length,
      regionMedian: median,
      percentileRank: (betterCount / values.length) * 100,
      rank: betterCount + 1,
      total: values.length,
    };
  }
  return {
    entityId: profile.entity.id,
    region: profile.entity.region,
    regionEntityCount: regionProfiles.length,
    metrics,
  };
}

/** Best `limit` entities for one metric, in rank order. */
export function topPerformers(
  profiles: EntityProfile[],
  definition: Pick<MetricDefinition, "canonicalName" | "displayName" | "unit" | "lowerIsBetter">,
  limit: number
): TopPerformers {
  const ranked: TopPerformers["performers"] = [];
  for (const p of profiles) {
    const obs = p.observations[definition.canonicalName];
    if (!obs || !Number.isFinite(obs.value)) continue;
    ranked.push({ entityId: p.entity.id, name: p.entity.name, region: p.entity.region, value: obs.value, source: obs.source });
  }
  ranked.sort((a, b) => (definition.lowerIsBetter ? a.value - b.value : b.value - a.value));
  return {
    canonicalName: definition.canonicalName,
    displayName: definition.displayName,
    unit: definition.unit,
    lowerIsBetter: definition.lowerIsBetter,
    performers: ranked.slice(0, Math.max(0, limit)),
    totalWithValue: ranked.length,
  };
}
