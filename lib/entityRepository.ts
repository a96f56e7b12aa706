/**
 * Read-side data access used by the engine. Each method is an explicit query
 * returning plain values; implementations throw on store errors and the
 * engine degrades around them.
 */

import type {
  EntityRecord,
  IssueRecord,
  OfficialMetrics,
  RatingRecord,
} from "./metricContract";
import type { RawPayload } from "./rawPayload";

export type SourcePayload = {
  source: string;
  payload: RawPayload;
};

export type PeerQuery = {
  region: string;
  minPopulation: number;
  maxPopulation: number;
  limit: number;
  excludeId: string;
};

export interface EntityRepository {
  getEntity(id: string): Promise<EntityRecord | null>;
  listEntitiesByRegion(region: string): Promise<EntityRecord[]>;
  findPeerCandidates(query: PeerQuery): Promise<EntityRecord[]>;
  /** Raw payloads per data source, in precedence order (later overrides earlier). */
  getRawPayloads(id: string): Promise<SourcePayload[]>;
  getOfficialMetrics(id: string): Promise<OfficialMetrics | null>;
  /** Ratings created at or after `since` (ISO timestamp). */
  getRatings(id: string, since: string): Promise<RatingRecord[]>;
  getIssues(id: string): Promise<IssueRecord[]>;
}

export type MemoryEntityData = {
  entity: EntityRecord;
  payloads?: SourcePayload[];
  official?: OfficialMetrics | null;
  ratings?: RatingRecord[];
  issues?: IssueRecord[];
};

/** In-process repository for fixtures and tests. */
export class MemoryEntityRepository implements EntityRepository {
  private readonly byId = new Map<string, MemoryEntityData>();

  constructor(entries: MemoryEntityData[] = []) {
    for (const e of entries) this.byId.set(e.entity.id, e);
  }

  async getEntity(id: string): Promise<EntityRecord | null> {
    return this.byId.get(id)?.entity ?? null;
  }

  async listEntitiesByRegion(region: string): Promise<EntityRecord[]> {
    return Array.from(this.byId.values())
      .map((e) => e.entity)
      .filter((e) => e.region === region);
  }

  async findPeerCandidates(query: PeerQuery): Promise<EntityRecord[]> {
    return Array.from(this.byId.values())
      .map((e) => e.entity)
      .filter(
        (e) =>
          e.region === query.region &&
          e.id !== query.excludeId &&
          e.population != null &&
          e.population >= query.minPopulation &&
          e.population <= query.maxPopulation
      )
      .slice(0, query.limit);
  }

  async getRawPayloads(id: string): Promise<SourcePayload[]> {
    return this.byId.get(id)?.payloads ?? [];
  }

  async getOfficialMetrics(id: string): Promise<OfficialMetrics | null> {
    return this.byId.get(id)?.official ?? null;
  }

  async getRatings(id: string, since: string): Promise<RatingRecord[]> {
    const sinceMs = Date.parse(since);
    return (this.byId.get(id)?.ratings ?? []).filter((r) => Date.parse(r.createdAt) >= sinceMs);
  }

  async getIssues(id: string): Promise<IssueRecord[]> {
    return this.byId.get(id)?.issues ?? [];
  }
}
