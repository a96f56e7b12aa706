/**
 * Resolves an arbitrary raw metric name to a catalog entry.
 * Tiers, first hit wins: exact canonical name → alternative names →
 * region synonyms → token-overlap fuzzy match (catalog order).
 */

import type { MetricDefinition } from "./metricContract";
import type { MetricCatalog } from "./metricCatalog";

export type MatchTier = "canonical" | "alternative" | "region" | "fuzzy";

export type MetricMatch = {
  definition: MetricDefinition;
  tier: MatchTier;
};

/** Share of the smaller token set that must overlap for a fuzzy match. */
export const FUZZY_OVERLAP_THRESHOLD = 0.6;

/** Lower-case, `_`/`-` → space, collapse whitespace. */
export function normalizeMetricName(name: string): string {
  return name.toLowerCase().replace(/[_-]/g, " ").replace(/\s+/g, " ").trim();
}

function tokenSet(name: string): Set<string> {
  const normalized = normalizeMetricName(name);
  return new Set(normalized ? normalized.split(" ") : []);
}

/**
 * Token-overlap similarity: equal after normalization, or the intersection
 * covers at least 60% of the smaller token set.
 */
export function namesSimilar(a: string, b: string): boolean {
  const na = normalizeMetricName(a);
  const nb = normalizeMetricName(b);
  if (!na || !nb) return false;
  if (na === nb) return true;
  const ta = tokenSet(na);
  const tb = tokenSet(nb);
  let overlap = 0;
  for (const t of ta) {
    if (tb.has(t)) overlap += 1;
  }
  return overlap >= Math.min(ta.size, tb.size) * FUZZY_OVERLAP_THRESHOLD;
}

export type MetricMatcher = {
  match(rawName: string, region?: string | null): MetricDefinition | null;
  matchTier(rawName: string, region?: string | null): MetricMatch | null;
};

export function createMetricMatcher(catalog: MetricCatalog): MetricMatcher {
  // normalized alternative name -> first definition listing it (catalog order)
  const alternativeIndex = new Map<string, MetricDefinition>();
  for (const def of catalog.all()) {
    for (const alt of def.alternativeNames) {
      const key = normalizeMetricName(alt);
      if (!alternativeIndex.has(key)) alternativeIndex.set(key, def);
    }
  }

  function matchRegion(normalized: string, region: string): MetricDefinition | null {
    const table = catalog.regionAliases(region);
    if (!table) return null;
    for (const [canonicalName, aliases] of Object.entries(table)) {
      if (aliases.some((alias) => normalizeMetricName(alias) === normalized)) {
        return catalog.get(canonicalName);
      }
    }
    return null;
  }

  function matchTier(rawName: string, region?: string | null): MetricMatch | null {
    const exact = catalog.get(rawName);
    if (exact) return { definition: exact, tier: "canonical" };

    const normalized = normalizeMetricName(rawName);
    if (!normalized) return null;

    const alternative = alternativeIndex.get(normalized);
    if (alternative) return { definition: alternative, tier: "alternative" };

    if (region) {
      const regional = matchRegion(normalized, region);
      if (regional) return { definition: regional, tier: "region" };
    }

    for (const def of catalog.all()) {
      if (namesSimilar(def.canonicalName, normalized)) return { definition: def, tier: "fuzzy" };
    }
    return null;
  }

  return {
    match(rawName, region) {
      return matchTier(rawName, region)?.definition ?? null;
    },
    matchTier,
  };
}
