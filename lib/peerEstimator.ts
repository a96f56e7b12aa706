/**
 * Peer-based gap filling for per-capita metrics: mean of the metric across
 * same-region entities whose population is within the configured band.
 * Other metric types are not estimated.
 */

import type { EntityRecord, OfficialMetrics } from "./metricContract";

export type PeerSnapshot = {
  id: string;
  region: string;
  population: number | null;
  /** canonical name -> value (null when the peer lacks it) */
  values: Record<string, number | null>;
};

export type PeerSetOptions = {
  limit: number;
  /** Fraction either side of the target population (0.5 = ±50%). */
  populationBand: number;
};

export const DEFAULT_PEER_SET_OPTIONS: PeerSetOptions = { limit: 5, populationBand: 0.5 };

const PER_CAPITA_SUFFIX = "_per_capita";

export function isPerCapitaMetric(canonicalName: string): boolean {
  return canonicalName.endsWith(PER_CAPITA_SUFFIX);
}

/** Inclusive population bounds for a peer search; null when population is unknown or not positive. */
export function peerPopulationRange(
  population: number | null,
  populationBand: number
): { min: number; max: number } | null {
  if (population == null || !(population > 0)) return null;
  return { min: population * (1 - populationBand), max: population * (1 + populationBand) };
}

/**
 * Same region, population within band, excluding the entity itself;
 * the first `limit` candidates in input order.
 */
export function selectPeerSet(
  entity: Pick<EntityRecord, "id" | "region" | "population">,
  candidates: PeerSnapshot[],
  options: PeerSetOptions = DEFAULT_PEER_SET_OPTIONS
): PeerSnapshot[] {
  const range = peerPopulationRange(entity.population, options.populationBand);
  if (!range) return [];
  return candidates
    .filter(
      (p) =>
        p.id !== entity.id &&
        p.region === entity.region &&
        p.population != null &&
        p.population >= range.min &&
        p.population <= range.max
    )
    .slice(0, Math.max(0, options.limit));
}

export function estimate(
  canonicalName: string,
  entity: Pick<EntityRecord, "id" | "region" | "population">,
  peers: PeerSnapshot[],
  options: PeerSetOptions = DEFAULT_PEER_SET_OPTIONS
): number | null {
  if (!isPerCapitaMetric(canonicalName)) return null;
  const peerSet = selectPeerSet(entity, peers, options);
  const values: number[] = [];
  for (const peer of peerSet) {
    const v = peer.values[canonicalName];
    if (v != null && Number.isFinite(v)) values.push(v);
  }
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function perCapita(amount: number | null, population: number | null): number | null {
  if (amount == null || population == null || population <= 0) return null;
  return amount / population;
}

/** Per-capita values derived from a peer's official figures. */
export function peerSnapshotFromMetrics(
  entity: EntityRecord,
  official: OfficialMetrics | null
): PeerSnapshot {
  const population = official?.populationServed ?? entity.population;
  const roadsKm = official?.roadsMaintainedKm ?? null;
  return {
    id: entity.id,
    region: entity.region,
    population: entity.population,
    values: {
      rates_revenue_per_capita: perCapita(official?.ratesRevenue ?? null, population),
      total_revenue_per_capita: perCapita(official?.totalRevenue ?? null, population),
      roads_maintained_per_capita: perCapita(roadsKm == null ? null : roadsKm * 1000, population),
    },
  };
}
