import { describe, it, expect, vi } from "vitest";
import { assembleProfile, createProfileBuilder, inferUniqueDataCategory } from "./profileBuilder";
import { loadDefaultCatalog } from "./metricCatalog";
import { createMetricMatcher } from "./metricMatcher";
import { createValueNormalizer } from "./valueNormalizer";
import { DEFAULT_PEER_SET_OPTIONS } from "./peerEstimator";
import { MemoryEntityRepository, type MemoryEntityData, type SourcePayload } from "./entityRepository";
import { flattenPayload } from "./rawPayload";
import { silentLogger, type Logger } from "./logger";
import type { EntityRecord, OfficialMetrics } from "./metricContract";

const NOW = new Date("2024-06-30T00:00:00.000Z");
const catalog = loadDefaultCatalog();

function council(id: string, population: number | null, region = "Victoria"): EntityRecord {
  return { id, name: `Council ${id}`, region, population, areaKm2: null };
}

function official(partial: Partial<OfficialMetrics>): OfficialMetrics {
  return {
    ratesRevenue: null,
    totalRevenue: null,
    totalExpenditure: null,
    populationServed: null,
    areaKm2: null,
    roadsMaintainedKm: null,
    customerSatisfaction: null,
    serviceDeliveryScore: null,
    ...partial,
  };
}

function builderFor(
  entries: MemoryEntityData[],
  logger: Logger = silentLogger,
  repository = new MemoryEntityRepository(entries),
  timeoutMs = 1000
) {
  return createProfileBuilder({
    catalog,
    matcher: createMetricMatcher(catalog),
    normalizer: createValueNormalizer(catalog, logger),
    repository,
    peerOptions: DEFAULT_PEER_SET_OPTIONS,
    timeoutMs,
    logger,
    now: () => NOW,
  });
}

function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

function payload(source: string, body: SourcePayload["payload"]): SourcePayload {
  return { source, payload: body };
}

describe("inferUniqueDataCategory", () => {
  it("checks keyword groups in order", () => {
    expect(inferUniqueDataCategory("carbon_offsets_t")).toBe("environmental");
    expect(inferUniqueDataCategory("Bike_Paths_km")).toBe("infrastructure");
    expect(inferUniqueDataCategory("new_business_count")).toBe("economic");
    expect(inferUniqueDataCategory("community_events")).toBe("community");
    // "environment" is checked before "road"
    expect(inferUniqueDataCategory("road_environment_audits")).toBe("environmental");
    expect(inferUniqueDataCategory("library_loans")).toBe("performance");
  });
});

describe("createProfileBuilder", () => {
  it("records an exact canonical key without a formula as direct/high with rawValue == value", async () => {
    const builder = builderFor([{ entity: council("c1", 100_000), payloads: [payload("annual_report", { waste_recycling_rate: 62.5 })] }]);
    const profile = await builder.build("c1");
    expect(profile?.observations.waste_recycling_rate).toEqual({
      value: 62.5,
      rawValue: 62.5,
      source: "direct",
      confidence: "high",
    });
    expect(profile?.coverageScore).toBe(1 / 14);
    expect(profile?.uniqueData).toEqual({});
    expect(profile?.dataSources).toEqual(["annual_report"]);
    expect(profile?.builtAt).toBe("2024-06-30T00:00:00.000Z");
  });

  it("takes an exact canonical key as-is even when the metric has a formula", async () => {
    const builder = builderFor([{ entity: council("c1", 100_000), payloads: [payload("s", { rates_revenue_per_capita: 520 })] }]);
    const profile = await builder.build("c1");
    expect(profile?.observations.rates_revenue_per_capita).toEqual({
      value: 520,
      rawValue: 520,
      source: "direct",
      confidence: "high",
    });
  });

  it("applies the derivation formula to a matched alternative name, using entity population", async () => {
    const builder = builderFor([{ entity: council("c1", 100_000), payloads: [payload("s", { rates_revenue: 50_000_000 })] }]);
    const profile = await builder.build("c1");
    expect(profile?.observations.rates_revenue_per_capita).toEqual({
      value: 500,
      rawValue: 50_000_000,
      source: "calculated",
      confidence: "high",
    });
    expect(profile?.uniqueData).toEqual({});
  });

  it("lets payload keys override the entity population in formulas", async () => {
    const builder = builderFor([
      { entity: council("c1", 100_000), payloads: [payload("s", { rates_revenue: 50_000_000, population_served: 125_000 })] },
    ]);
    const profile = await builder.build("c1");
    expect(profile?.observations.rates_revenue_per_capita?.value).toBe(400);
    expect(profile?.uniqueData.population_served?.value).toBe(125_000);
  });

  it("falls back to the raw value when a formula input is missing", async () => {
    const builder = builderFor([{ entity: council("c1", null), payloads: [payload("s", { roads_maintained_km: 850 })] }]);
    const profile = await builder.build("c1");
    expect(profile?.observations.roads_maintained_per_capita).toEqual({
      value: 850,
      rawValue: 850,
      source: "direct",
      confidence: "high",
    });
  });

  it("resolves region synonyms for the entity's region", async () => {
    const builder = builderFor([{ entity: council("c1", 40_000, "NSW"), payloads: [payload("s", { da_processing_time: 42 })] }]);
    const profile = await builder.build("c1");
    expect(profile?.observations.planning_approval_time?.value).toBe(42);
    expect(profile?.observations.planning_approval_time?.source).toBe("direct");
  });

  it("estimates per-capita metrics from same-region peers within the population band", async () => {
    const builder = builderFor([
      { entity: council("c1", 100_000) },
      { entity: council("c2", 90_000), official: official({ ratesRevenue: 45_000_000, populationServed: 90_000 }) },
      { entity: council("c3", 120_000), official: official({ ratesRevenue: 72_000_000, populationServed: 120_000 }) },
      { entity: council("c4", 400_000), official: official({ ratesRevenue: 400_000_000 }) },
      { entity: council("c5", 100_000, "NSW"), official: official({ ratesRevenue: 90_000_000 }) },
    ]);
    const profile = await builder.build("c1");
    expect(profile?.observations.rates_revenue_per_capita).toEqual({
      value: 550,
      rawValue: null,
      source: "estimated",
      confidence: "medium",
    });
    expect(profile?.observations.total_revenue_per_capita).toBeUndefined();
    expect(profile?.dataSources).toEqual([]);
  });

  it("leaves a per-capita metric absent when no peer falls inside the band", async () => {
    const builder = builderFor([
      { entity: council("c1", 100_000) },
      { entity: council("c2", 200_000), official: official({ ratesRevenue: 100_000_000 }) },
    ]);
    const profile = await builder.build("c1");
    expect(profile?.observations.rates_revenue_per_capita).toBeUndefined();
    expect(profile?.missingMetrics).toContain("rates_revenue_per_capita");
    expect(profile?.coverageScore).toBe(0);
  });

  it("keeps unconsumed keys as categorized unique data", async () => {
    const builder = builderFor([
      {
        entity: council("c1", 100_000),
        payloads: [
          payload("s", {
            waste_recycling_rate: 60,
            bike_paths_km: 120,
            environment: { tree_canopy_pct: 18.5 },
            notes: "Annual report 2023",
          }),
        ],
      },
    ]);
    const profile = await builder.build("c1");
    expect(profile?.uniqueData).toEqual({
      bike_paths_km: {
        value: 120,
        text: null,
        category: "infrastructure",
        description: "Raw metric: bike_paths_km",
      },
      environment_tree_canopy_pct: {
        value: 18.5,
        text: null,
        category: "environmental",
        description: "Raw metric: environment_tree_canopy_pct",
      },
      notes: {
        value: null,
        text: "Annual report 2023",
        category: "performance",
        description: "Raw text: notes",
      },
    });
  });

  it("merges sources in order with later sources overriding", async () => {
    const builder = builderFor([
      {
        entity: council("c1", 100_000),
        payloads: [payload("annual_report", { waste_recycling_rate: 50 }), payload("state_return", { waste_recycling_rate: 55 })],
      },
    ]);
    const profile = await builder.build("c1");
    expect(profile?.observations.waste_recycling_rate?.value).toBe(55);
    expect(profile?.dataSources).toEqual(["annual_report", "state_return"]);
  });

  it("keeps coverage within [0, 1] and missing metrics complementary to observations", async () => {
    const builder = builderFor([
      {
        entity: council("c1", 100_000),
        payloads: [payload("s", { waste_recycling_rate: 50, complaint_response_time: 3, local_employment_rate: 94 })],
      },
    ]);
    const profile = await builder.build("c1");
    const observed = Object.keys(profile?.observations ?? {});
    expect(observed).toHaveLength(3);
    expect(profile?.coverageScore).toBeGreaterThanOrEqual(0);
    expect(profile?.coverageScore).toBeLessThanOrEqual(1);
    expect((profile?.missingMetrics.length ?? 0) + observed.length).toBe(14);
  });

  it("returns null for an unknown entity", async () => {
    expect(await builderFor([]).build("missing")).toBeNull();
  });

  it("returns null and logs when the entity lookup fails", async () => {
    class FailingRepository extends MemoryEntityRepository {
      override async getEntity(): Promise<EntityRecord | null> {
        throw new Error("connection reset");
      }
    }
    const error = vi.fn();
    const logger: Logger = { ...silentLogger, error };
    const builder = builderFor([], logger, new FailingRepository());
    expect(await builder.build("c1")).toBeNull();
    expect(error).toHaveBeenCalledWith("entity lookup failed", { entityId: "c1", error: "connection reset" });
  });

  it("still estimates from peers when raw payloads cannot be read", async () => {
    class PayloadFailure extends MemoryEntityRepository {
      override async getRawPayloads(): Promise<SourcePayload[]> {
        throw new Error("timeout");
      }
    }
    const warn = vi.fn();
    const repository = new PayloadFailure([
      { entity: council("c1", 100_000) },
      { entity: council("c2", 100_000), official: official({ ratesRevenue: 50_000_000 }) },
    ]);
    const profile = await builderFor([], { ...silentLogger, warn }, repository).build("c1");
    expect(profile?.observations.rates_revenue_per_capita?.value).toBe(500);
    expect(profile?.dataSources).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("prefers the exact canonical key over a fuzzy-matchable alternative in the same payload", async () => {
    const builder = builderFor([
      {
        entity: council("c1", 100_000),
        payloads: [payload("s", { recycling_waste_rate: 10, waste_recycling_rate: 62 })],
      },
    ]);
    const profile = await builder.build("c1");
    expect(profile?.observations.waste_recycling_rate).toEqual({
      value: 62,
      rawValue: 62,
      source: "direct",
      confidence: "high",
    });
    expect(profile?.uniqueData.recycling_waste_rate).toEqual({
      value: 10,
      text: null,
      category: "performance",
      description: "Raw metric: recycling_waste_rate",
    });
  });

  it("skips only the peer whose metrics cannot be read", async () => {
    class OnePeerDown extends MemoryEntityRepository {
      override async getOfficialMetrics(entityId: string): Promise<OfficialMetrics | null> {
        if (entityId === "c3") throw new Error("replica lag");
        return super.getOfficialMetrics(entityId);
      }
    }
    const warn = vi.fn();
    const repository = new OnePeerDown([
      { entity: council("c1", 100_000) },
      { entity: council("c2", 100_000), official: official({ ratesRevenue: 50_000_000 }) },
      { entity: council("c3", 110_000), official: official({ ratesRevenue: 99_000_000 }) },
    ]);
    const profile = await builderFor([], { ...silentLogger, warn }, repository).build("c1");
    expect(profile?.observations.rates_revenue_per_capita).toEqual({
      value: 500,
      rawValue: null,
      source: "estimated",
      confidence: "medium",
    });
    expect(warn).toHaveBeenCalledWith("peer metrics unavailable; peer skipped", {
      entityId: "c1",
      peerId: "c3",
      error: "replica lag",
    });
  });

  it("gives up on a hung entity lookup after the read deadline", async () => {
    class HungEntity extends MemoryEntityRepository {
      override getEntity(): Promise<EntityRecord | null> {
        return never();
      }
    }
    const error = vi.fn();
    const builder = builderFor([], { ...silentLogger, error }, new HungEntity(), 30);
    expect(await builder.build("c1")).toBeNull();
    expect(error).toHaveBeenCalledWith("entity lookup failed", {
      entityId: "c1",
      error: "entity c1 timed out after 30ms",
    });
  });

  it("keeps the profile and drops estimates when the peer search hangs", async () => {
    class HungPeers extends MemoryEntityRepository {
      override findPeerCandidates(): Promise<EntityRecord[]> {
        return never();
      }
    }
    const repository = new HungPeers([
      { entity: council("c1", 100_000), payloads: [payload("s", { waste_recycling_rate: 48 })] },
      { entity: council("c2", 100_000), official: official({ ratesRevenue: 50_000_000 }) },
    ]);
    const profile = await builderFor([], silentLogger, repository, 30).build("c1");
    expect(profile?.observations.waste_recycling_rate?.value).toBe(48);
    expect(profile?.observations.rates_revenue_per_capita).toBeUndefined();
  });
});

describe("assembleProfile", () => {
  it("builds a profile from pre-fetched inputs", () => {
    const profile = assembleProfile(
      {
        entity: council("c9", 50_000),
        flat: flattenPayload({ recycling_rate: 48 }),
        peers: [],
        dataSources: ["manual"],
      },
      {
        catalog,
        matcher: createMetricMatcher(catalog),
        normalizer: createValueNormalizer(catalog, silentLogger),
        peerOptions: DEFAULT_PEER_SET_OPTIONS,
      },
      NOW
    );
    expect(profile.observations).toEqual({
      waste_recycling_rate: { value: 48, rawValue: 48, source: "direct", confidence: "high" },
    });
    expect(profile.entity.id).toBe("c9");
  });
});
