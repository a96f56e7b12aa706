import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  issuePrioritySchema,
  issueStatusSchema,
  moderationStatusSchema,
  type EntityRecord,
  type IssueRecord,
  type OfficialMetrics,
  type RatingRecord,
} from "../metricContract";
import type { EntityRepository, PeerQuery, SourcePayload } from "../entityRepository";
import type { Logger } from "../logger";
import { toRawPayload } from "../rawPayload";

/**
 * EntityRepository over the councils schema. Rows are validated with zod;
 * a row that does not parse is dropped with a warning, a query error throws.
 */

export class RepositoryQueryError extends Error {
  readonly table: string;

  constructor(table: string, message: string) {
    super(`${table}: ${message}`);
    this.name = "RepositoryQueryError";
    this.table = table;
  }
}

const idColumn = z.union([z.string(), z.number()]).transform(String);
/** numeric columns may arrive as strings; missing or null → null */
const numericColumn = z.coerce.number().finite().nullable().default(null);

const councilRowSchema = z.object({
  id: idColumn,
  name: z.string(),
  state: z.string(),
  population: numericColumn,
  area_km2: numericColumn,
});

const payloadRowSchema = z.object({
  source: z.string(),
  payload: z.unknown(),
});

const metricsRowSchema = z.object({
  rates_revenue: numericColumn,
  total_revenue: numericColumn,
  total_expenditure: numericColumn,
  population_served: numericColumn,
  area_km2: numericColumn,
  roads_maintained_km: numericColumn,
  customer_satisfaction: numericColumn,
  service_delivery_score: numericColumn,
});

const ratingRowSchema = z.object({
  rating: z.coerce.number().int().min(1).max(5),
  service_category: z.string(),
  created_at: z.string(),
  moderation_status: moderationStatusSchema,
});

const issueRowSchema = z.object({
  status: issueStatusSchema,
  created_at: z.string(),
  resolution_time_days: numericColumn,
  priority: issuePrioritySchema,
});

const COUNCIL_COLUMNS = "id, name, state, population, area_km2";

function toEntity(row: z.infer<typeof councilRowSchema>): EntityRecord {
  return {
    id: row.id,
    name: row.name,
    region: row.state,
    population: row.population,
    areaKm2: row.area_km2,
  };
}

export function createSupabaseEntityRepository(supabase: SupabaseClient, logger: Logger): EntityRepository {
  function parseRows<S extends z.ZodTypeAny>(table: string, schema: S, rows: unknown[] | null): z.infer<S>[] {
    const out: z.infer<S>[] = [];
    for (const row of rows ?? []) {
      const parsed = schema.safeParse(row);
      if (parsed.success) out.push(parsed.data);
      else logger.warn("dropping invalid row", { table, issue: parsed.error.issues[0]?.message ?? "invalid" });
    }
    return out;
  }

  return {
    async getEntity(id) {
      const { data, error } = await supabase.from("councils").select(COUNCIL_COLUMNS).eq("id", id).maybeSingle();
      if (error) throw new RepositoryQueryError("councils", error.message);
      if (!data) return null;
      const [row] = parseRows("councils", councilRowSchema, [data]);
      return row ? toEntity(row) : null;
    },

    async listEntitiesByRegion(region) {
      const { data, error } = await supabase
        .from("councils")
        .select(COUNCIL_COLUMNS)
        .eq("state", region)
        .order("id", { ascending: true });
      if (error) throw new RepositoryQueryError("councils", error.message);
      return parseRows("councils", councilRowSchema, data).map(toEntity);
    },

    async findPeerCandidates(query: PeerQuery) {
      const { data, error } = await supabase
        .from("councils")
        .select(COUNCIL_COLUMNS)
        .eq("state", query.region)
        .neq("id", query.excludeId)
        .gte("population", query.minPopulation)
        .lte("population", query.maxPopulation)
        .order("id", { ascending: true })
        .limit(query.limit);
      if (error) throw new RepositoryQueryError("councils", error.message);
      return parseRows("councils", councilRowSchema, data).map(toEntity);
    },

    async getRawPayloads(id) {
      const { data, error } = await supabase
        .from("council_metric_payloads")
        .select("source, payload")
        .eq("council_id", id)
        .order("fetched_at", { ascending: true });
      if (error) throw new RepositoryQueryError("council_metric_payloads", error.message);
      const out: SourcePayload[] = [];
      for (const row of parseRows("council_metric_payloads", payloadRowSchema, data)) {
        const payload = toRawPayload(row.payload);
        if (payload) out.push({ source: row.source, payload });
        else logger.warn("dropping non-object payload", { councilId: id, source: row.source });
      }
      return out;
    },

    async getOfficialMetrics(id) {
      const { data, error } = await supabase
        .from("council_metrics")
        .select(
          "rates_revenue, total_revenue, total_expenditure, population_served, area_km2, roads_maintained_km, customer_satisfaction, service_delivery_score"
        )
        .eq("council_id", id)
        .order("year", { ascending: false })
        .limit(1)
        .maybeSingle();
      if (error) throw new RepositoryQueryError("council_metrics", error.message);
      if (!data) return null;
      const [row] = parseRows("council_metrics", metricsRowSchema, [data]);
      if (!row) return null;
      const metrics: OfficialMetrics = {
        ratesRevenue: row.rates_revenue,
        totalRevenue: row.total_revenue,
        totalExpenditure: row.total_expenditure,
        populationServed: row.population_served,
        areaKm2: row.area_km2,
        roadsMaintainedKm: row.roads_maintained_km,
        customerSatisfaction: row.customer_satisfaction,
        serviceDeliveryScore: row.service_delivery_score,
      };
      return metrics;
    },

    async getRatings(id, since) {
      const { data, error } = await supabase
        .from("ratings")
        .select("rating, service_category, created_at, moderation_status")
        .eq("council_id", id)
        .gte("created_at", since);
      if (error) throw new RepositoryQueryError("ratings", error.message);
      return parseRows("ratings", ratingRowSchema, data).map(
        (r): RatingRecord => ({
          rating: r.rating,
          category: r.service_category,
          createdAt: r.created_at,
          moderationStatus: r.moderation_status,
        })
      );
    },

    async getIssues(id) {
      const { data, error } = await supabase
        .from("issue_reports")
        .select("status, created_at, resolution_time_days, priority")
        .eq("council_id", id);
      if (error) throw new RepositoryQueryError("issue_reports", error.message);
      return parseRows("issue_reports", issueRowSchema, data).map(
        (i): IssueRecord => ({
          status: i.status,
          createdAt: i.created_at,
          resolutionTimeDays: i.resolution_time_days,
          priority: i.priority,
        })
      );
    },
  };
}
