/**
 * Data consistency across a set of profiles: raw names that collapse to the
 * same normalized form, per-metric coverage, and councils with nothing standardized.
 */

import type { EntityProfile } from "./metricContract";
import type { MetricCatalog } from "./metricCatalog";
import { normalizeMetricName } from "./metricMatcher";

export type ConsistencyReport = {
  entityCount: number;
  /** normalized form -> raw variants seen (only groups with 2+ variants) */
  nameVariantGroups: Record<string, string[]>;
  /** canonical name -> share of entities with an observation */
  metricCoverage: Record<string, number>;
  /** canonical name -> count of observations by source */
  sourceBreakdown: Record<string, { direct: number; calculated: number; estimated: number }>;
  entitiesWithoutMetrics: string[];
  averageCoverageScore: number;
};

export function groupNameVariants(rawNames: Iterable<string>): Record<string, string[]> {
  const groups = new Map<string, Set<string>>();
  for (const raw of rawNames) {
    const key = normalizeMetricName(raw);
    if (!key) continue;
    const set = groups.get(key) ?? new Set<string>();
    set.add(raw);
    groups.set(key, set);
  }
  const out: Record<string, string[]> = {};
  for (const [key, variants] of groups) {
    if (variants.size > 1) out[key] = Array.from(variants).sort();
  }
  return out;
}

export function buildConsistencyReport(
  profiles: EntityProfile[],
  catalog: MetricCatalog,
  rawNames: Iterable<string> = profiles.flatMap((p) => Object.keys(p.uniqueData))
): ConsistencyReport {
  const n = profiles.length;
  const metricCoverage: ConsistencyReport["metricCoverage"] = {};
  const sourceBreakdown: ConsistencyReport["sourceBreakdown"] = {};
  for (const def of catalog.all()) {
    const counts = { direct: 0, calculated: 0, estimated: 0 };
    let present = 0;
    for (const p of profiles) {
      const obs = p.observations[def.canonicalName];
      if (!obs) continue;
      present += 1;
      counts[obs.source] += 1;
    }
    metricCoverage[def.canonicalName] = n > 0 ? present / n : 0;
    sourceBreakdown[def.canonicalName] = counts;
  }
  return {
    entityCount: n,
    nameVariantGroups: groupNameVariants(rawNames),
    metricCoverage,
    sourceBreakdown,
    entitiesWithoutMetrics: profiles
      .filter((p) => Object.keys(p.observations).length === 0)
      .map((p) => p.entity.id),
    averageCoverageScore: n > 0 ? profiles.reduce((s, p) => s + p.coverageScore, 0) / n : 0,
  };
}
