/**
 * Read-only catalog of canonical council metrics plus per-region synonym tables.
 * Built once at start-up and passed to every component that needs it.
 * Lookups of unknown names return null; only construction can fail.
 */

import { z } from "zod";
import {
  metricDefinitionSchema,
  regionSynonymsSchema,
  type MetricCategory,
  type MetricDefinition,
  type RegionSynonyms,
} from "./metricContract";
import metricsJson from "./catalog/metrics.json";
import regionSynonymsJson from "./catalog/regionSynonyms.json";

export type MetricCatalog = {
  readonly size: number;
  get(canonicalName: string): MetricDefinition | null;
  all(): readonly MetricDefinition[];
  byCategory(category: MetricCategory): MetricDefinition[];
  /** canonical name -> aliases for the region, or null when the region has no table. */
  regionAliases(region: string): Readonly<Record<string, readonly string[]>> | null;
  /** Canonical names not present in the given list (catalog order). */
  missingFrom(presentNames: Iterable<string>): string[];
};

export class CatalogLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogLoadError";
  }
}

function freezeDefinition(def: MetricDefinition): MetricDefinition {
  return Object.freeze({ ...def, alternativeNames: Object.freeze([...def.alternativeNames]) });
}

export function createMetricCatalog(
  definitionsInput: unknown,
  regionSynonymsInput: unknown = {}
): MetricCatalog {
  const defsResult = z.array(metricDefinitionSchema).safeParse(definitionsInput);
  if (!defsResult.success) {
    throw new CatalogLoadError(`Invalid metric definitions: ${defsResult.error.message}`);
  }
  const synonymsResult = regionSynonymsSchema.safeParse(regionSynonymsInput);
  if (!synonymsResult.success) {
    throw new CatalogLoadError(`Invalid region synonyms: ${synonymsResult.error.message}`);
  }

  const byName = new Map<string, MetricDefinition>();
  for (const def of defsResult.data) {
    if (byName.has(def.canonicalName)) {
      throw new CatalogLoadError(`Duplicate canonical metric: ${def.canonicalName}`);
    }
    byName.set(def.canonicalName, freezeDefinition(def));
  }

  const synonyms: RegionSynonyms = synonymsResult.data;
  const regions = new Map<string, Readonly<Record<string, readonly string[]>>>();
  for (const [region, table] of Object.entries(synonyms)) {
    for (const canonicalName of Object.keys(table)) {
      if (!byName.has(canonicalName)) {
        throw new CatalogLoadError(`Region ${region} maps synonyms to unknown metric: ${canonicalName}`);
      }
    }
    regions.set(region.trim().toLowerCase(), Object.freeze({ ...table }));
  }

  const ordered = Object.freeze(Array.from(byName.values()));

  return Object.freeze({
    size: ordered.length,
    get(canonicalName: string) {
      return byName.get(canonicalName) ?? null;
    },
    all() {
      return ordered;
    },
    byCategory(category: MetricCategory) {
      return ordered.filter((d) => d.category === category);
    },
    regionAliases(region: string) {
      return regions.get(region.trim().toLowerCase()) ?? null;
    },
    missingFrom(presentNames: Iterable<string>) {
      const present = new Set(presentNames);
      return ordered.filter((d) => !present.has(d.canonicalName)).map((d) => d.canonicalName);
    },
  });
}

/** Catalog from the bundled JSON tables under lib/catalog. */
export function loadDefaultCatalog(): MetricCatalog {
  return createMetricCatalog(metricsJson, regionSynonymsJson);
}
