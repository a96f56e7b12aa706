/**
 * Region-wide aggregation over a bounded worker pool.
 * The region listing and each entity's profile build are timeout-bounded; a
 * timed-out or failed entity is excluded (visible as lower coverage) instead of
 * failing the whole run. Aborting stops waiting on the listing and on in-flight
 * builds and skips work not yet started. Profiles already built are still
 * aggregated, and the result is marked cancelled when any work was skipped.
 */

import pLimit from "p-limit";
import type { EntityProfile, RegionAggregation } from "./metricContract";
import type { MetricCatalog } from "./metricCatalog";
import type { EntityRepository } from "./entityRepository";
import type { ProfileBuilder } from "./profileBuilder";
import type { Logger } from "./logger";
import { aggregateAll } from "./aggregator";
import { DataAccessTimeoutError, errorMessage, withTimeout } from "./dataAccess";

export class AggregationAbortedError extends Error {
  constructor() {
    super("aggregation aborted");
    this.name = "AggregationAbortedError";
  }
}

/** Rejects with AggregationAbortedError as soon as the signal fires. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  let onAbort: (() => void) | undefined;
  // Raced even when already aborted so a later rejection of `promise` stays handled.
  const aborted = new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(new AggregationAbortedError());
      return;
    }
    onAbort = () => reject(new AggregationAbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  });
}

export type AggregationPoolOptions = {
  concurrency: number;
  /** Deadline for the region listing. */
  timeoutMs: number;
  /** Deadline for one whole profile build; defaults to `timeoutMs`. */
  buildTimeoutMs?: number;
};

type BuildOutcome =
  | { status: "built"; profile: EntityProfile }
  | { status: "missing" | "failed" | "timed_out" | "skipped"; entityId: string };

export type AggregateRegionOptions = {
  signal?: AbortSignal;
};

export type AggregationPool = {
  aggregateRegion(region: string, options?: AggregateRegionOptions): Promise<RegionAggregation>;
  /** Build profiles for explicit ids with the same pool limits; failures are left out. */
  buildProfiles(entityIds: string[], options?: AggregateRegionOptions): Promise<EntityProfile[]>;
};

export function createAggregationPool(deps: {
  catalog: MetricCatalog;
  repository: EntityRepository;
  builder: ProfileBuilder;
  options: AggregationPoolOptions;
  logger: Logger;
}): AggregationPool {
  const { catalog, repository, builder, options, logger } = deps;
  const buildTimeoutMs = options.buildTimeoutMs ?? options.timeoutMs;

  async function runBuilds(entityIds: string[], signal: AbortSignal | undefined): Promise<BuildOutcome[]> {
    const limit = pLimit(Math.max(1, options.concurrency));
    const tasks = entityIds.map((entityId) =>
      limit(async (): Promise<BuildOutcome> => {
        if (signal?.aborted) return { status: "skipped", entityId };
        try {
          const profile = await untilAborted(
            withTimeout(builder.build(entityId), buildTimeoutMs, `profile ${entityId}`),
            signal
          );
          return profile ? { status: "built", profile } : { status: "missing", entityId };
        } catch (err) {
          if (err instanceof AggregationAbortedError) return { status: "skipped", entityId };
          if (err instanceof DataAccessTimeoutError) {
            logger.warn("entity excluded: data access timed out", { entityId, timeoutMs: err.timeoutMs });
            return { status: "timed_out", entityId };
          }
          logger.warn("entity excluded: profile build failed", {
            entityId,
            error: errorMessage(err),
          });
          return { status: "failed", entityId };
        }
      })
    );
    return Promise.all(tasks);
  }

  return {
    async aggregateRegion(region, runOptions = {}) {
      const { signal } = runOptions;
      let entityIds: string[] = [];
      let listingAborted = false;
      try {
        const entities = await untilAborted(
          withTimeout(repository.listEntitiesByRegion(region), options.timeoutMs, `region listing ${region}`),
          signal
        );
        entityIds = entities.map((e) => e.id);
      } catch (err) {
        if (err instanceof AggregationAbortedError) {
          listingAborted = true;
        } else {
          logger.error("region listing failed", { region, error: errorMessage(err) });
        }
      }

      const outcomes = await runBuilds(entityIds, signal);
      const profiles: EntityProfile[] = [];
      const excluded: string[] = [];
      for (const o of outcomes) {
        if (o.status === "built") profiles.push(o.profile);
        else excluded.push(o.entityId);
      }

      const cancelled = listingAborted || outcomes.some((o) => o.status === "skipped");
      if (cancelled) logger.warn("region aggregation cancelled; returning partial result", { region, built: profiles.length });

      return {
        region,
        totalEntities: entityIds.length,
        profiledEntities: profiles.length,
        excludedEntities: excluded,
        cancelled,
        metrics: aggregateAll(profiles, catalog, entityIds.length),
      };
    },

    async buildProfiles(entityIds, runOptions = {}) {
      const outcomes = await runBuilds(entityIds, runOptions.signal);
      const profiles: EntityProfile[] = [];
      for (const o of outcomes) {
        if (o.status === "built") profiles.push(o.profile);
      }
      return profiles;
    },
  };
}
