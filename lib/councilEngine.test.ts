import { describe, it, expect } from "vitest";
import { ComparisonRequestError, createCouncilEngine } from "./councilEngine";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./engineConfig";
import { MemoryEntityRepository, type MemoryEntityData } from "./entityRepository";
import { silentLogger } from "./logger";
import type { EntityRecord, IssueRecord, OfficialMetrics, RatingRecord } from "./metricContract";

const NOW = new Date("2024-06-30T00:00:00.000Z");
const DAY_MS = 24 * 60 * 60 * 1000;

function daysAgo(days: number): string {
  return new Date(NOW.getTime() - days * DAY_MS).toISOString();
}

function council(id: string, population: number, region = "Victoria"): EntityRecord {
  return { id, name: `Council ${id}`, region, population, areaKm2: null };
}

const noOfficial: OfficialMetrics = {
  ratesRevenue: null,
  totalRevenue: null,
  totalExpenditure: null,
  populationServed: null,
  areaKm2: null,
  roadsMaintainedKm: null,
  customerSatisfaction: null,
  serviceDeliveryScore: null,
};

function rating(value: number, age: number): RatingRecord {
  return { rating: value, category: "roads", createdAt: daysAgo(age), moderationStatus: "approved" };
}

function issue(age: number, resolutionTimeDays: number | null = null): IssueRecord {
  return {
    status: resolutionTimeDays == null ? "reported" : "resolved",
    createdAt: daysAgo(age),
    resolutionTimeDays,
    priority: "medium",
  };
}

const fixtures: MemoryEntityData[] = [
  {
    entity: council("a", 100_000),
    payloads: [{ source: "annual_report", payload: { waste_recycling_rate: 40, rates_revenue: 50_000_000 } }],
    official: { ...noOfficial, customerSatisfaction: 70, ratesRevenue: 60_000_000 },
    ratings: [rating(5, 10), rating(5, 20), rating(5, 30), rating(1, 40), rating(5, 800)],
    issues: [issue(5, 5), issue(15, 15), issue(120)],
  },
  {
    entity: council("b", 120_000),
    payloads: [{ source: "annual_report", payload: { "Recycling Rate": 60 } }],
  },
  {
    entity: council("c", 90_000),
    payloads: [{ source: "state_return", payload: { waste_recycling_rate: 50 } }],
  },
  {
    entity: council("nsw-1", 100_000, "NSW"),
    payloads: [{ source: "state_return", payload: { da_processing_time: 42 } }],
  },
];

function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

function engineFor(repository = new MemoryEntityRepository(fixtures), config: EngineConfig = DEFAULT_ENGINE_CONFIG) {
  return createCouncilEngine({
    repository,
    config,
    logger: silentLogger,
    now: () => NOW,
  });
}

describe("createCouncilEngine", () => {
  it("builds a profile through the injected repository", async () => {
    const profile = await engineFor().buildProfile("a");
    expect(profile?.observations.waste_recycling_rate?.value).toBe(40);
    expect(profile?.observations.rates_revenue_per_capita?.source).toBe("calculated");
    expect(profile?.builtAt).toBe("2024-06-30T00:00:00.000Z");
  });

  it("aggregates a region", async () => {
    const result = await engineFor().aggregateRegion("Victoria");
    expect(result.totalEntities).toBe(3);
    expect(result.cancelled).toBe(false);
    expect(result.metrics.waste_recycling_rate).toMatchObject({
      valueCount: 3,
      coverage: 1,
      mean: 50,
      median: 50,
      best: 60,
      worst: 40,
      rankingByEntity: { b: 1, c: 2, a: 3 },
    });
  });

  it("compares only the entities that can be profiled", async () => {
    const matrix = await engineFor().compareEntities(["c", "missing", "a"]);
    expect(matrix.entityIds).toEqual(["c", "a"]);
    expect(matrix.metrics.waste_recycling_rate.values).toEqual({ c: 50, a: 40 });
    expect(matrix.metrics.waste_recycling_rate.ranking).toEqual({ c: 1, a: 2 });
  });

  it("filters a comparison to the requested metrics", async () => {
    const matrix = await engineFor().compareEntities(["c", "a", "c"], { metrics: ["waste_recycling_rate"] });
    expect(matrix.entityIds).toEqual(["c", "a"]);
    expect(Object.keys(matrix.metrics)).toEqual(["waste_recycling_rate"]);
  });

  it("rejects comparisons outside 2-10 entities", async () => {
    const engine = engineFor();
    await expect(engine.compareEntities(["a", "a"])).rejects.toThrow(ComparisonRequestError);
    const eleven = Array.from({ length: 11 }, (_, i) => `c${i}`);
    await expect(engine.compareEntities(eleven)).rejects.toThrow("comparison needs 2-10 entities, got 11");
  });

  it("benchmarks an entity against its region", async () => {
    const benchmark = await engineFor().benchmarkEntity("a");
    expect(benchmark?.regionEntityCount).toBe(3);
    expect(benchmark?.metrics.waste_recycling_rate).toMatchObject({
      value: 40,
      regionMean: 50,
      regionMedian: 50,
      rank: 3,
      total: 3,
    });
    expect(benchmark?.metrics.waste_recycling_rate.percentileRank).toBeCloseTo(200 / 3, 10);
    // b and c are estimated from a's official rates (600 per person)
    expect(benchmark?.metrics.rates_revenue_per_capita).toMatchObject({ value: 500, regionMedian: 600, rank: 3 });
  });

  it("returns no benchmark for an unknown entity", async () => {
    expect(await engineFor().benchmarkEntity("missing")).toBeNull();
  });

  it("lists a region's top performers for a metric", async () => {
    const top = await engineFor().topPerformers("waste_recycling_rate", { region: "Victoria", limit: 2 });
    expect(top?.performers.map((p) => [p.entityId, p.value])).toEqual([
      ["b", 60],
      ["c", 50],
    ]);
    expect(top?.totalWithValue).toBe(3);
  });

  it("returns null top performers for a metric outside the catalog", async () => {
    expect(await engineFor().topPerformers("library_visits", { region: "Victoria" })).toBeNull();
  });

  it("gives up on a hung entity lookup when building a profile", async () => {
    class HungEntity extends MemoryEntityRepository {
      override getEntity(): Promise<EntityRecord | null> {
        return never();
      }
    }
    const engine = engineFor(new HungEntity(fixtures), { ...DEFAULT_ENGINE_CONFIG, dataAccessTimeoutMs: 30 });
    expect(await engine.buildProfile("a")).toBeNull();
  });

  it("returns a cancelled aggregation when aborted during a hung region listing", async () => {
    class HungListing extends MemoryEntityRepository {
      override listEntitiesByRegion(): Promise<EntityRecord[]> {
        return never();
      }
    }
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const result = await engineFor(new HungListing(fixtures)).aggregateRegion("Victoria", { signal: controller.signal });
    expect(result.cancelled).toBe(true);
    expect(result.totalEntities).toBe(0);
  });

  it("reports scoring model windows from its config", () => {
    const engine = engineFor(undefined, { ...DEFAULT_ENGINE_CONFIG, ratingWindowDays: 365 });
    expect(engine.scoringModel().rating_window_days).toBe(365);
    expect(engine.scoringModel().red_flag.window_days).toBe(90);
  });

  it("scores an entity from official figures, windowed ratings and issues", async () => {
    const score = await engineFor().compositeScore("a");
    expect(score?.components.customerSatisfaction.score).toBe(80);
    expect(score?.components.valueForRates.score).toBe(81.7);
    expect(score?.components.responsiveness.score).toBe(75);
    expect(score?.sampleSizes).toEqual({ ratings: 4, issues: 3 });
    expect(score?.overallScore).toBe(79.8);
  });

  it("returns null for an unknown entity", async () => {
    expect(await engineFor().compositeScore("missing")).toBeNull();
  });

  it("degrades components when a repository read fails", async () => {
    class RatingsDown extends MemoryEntityRepository {
      override async getRatings(): Promise<RatingRecord[]> {
        throw new Error("ratings service down");
      }
    }
    const score = await engineFor(new RatingsDown(fixtures)).compositeScore("a");
    expect(score?.components.customerSatisfaction).toEqual({
      score: 50,
      confidence: "low",
      sampleSize: 0,
      reason: "insufficient_data",
    });
    expect(score?.components.responsiveness.score).toBe(75);
  });

  it("computes the red-flag index from issue history", async () => {
    expect(await engineFor().redFlagIndex("a")).toEqual({
      recentCount: 2,
      previousCount: 1,
      spikeRatio: 2,
      score: 50,
      confidence: "low",
    });
  });

  it("reports data consistency for a region", async () => {
    const report = await engineFor().consistencyReport("Victoria");
    expect(report.entityCount).toBe(3);
    expect(report.metricCoverage.waste_recycling_rate).toBe(1);
    expect(report.entitiesWithoutMetrics).toEqual([]);
  });
});
