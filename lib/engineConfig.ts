/**
 * Engine settings from environment variables. Bad values never throw: they
 * fall back to the default and a warning is logged.
 */

import { z } from "zod";
import type { Logger } from "./logger";

export type EngineConfig = {
  /** Max peers considered per estimation. */
  peerGroupLimit: number;
  /** Peer population band as a fraction either side of the target (0.5 = ±50%). */
  peerPopulationBand: number;
  ratingWindowDays: number;
  redFlagWindowDays: number;
  aggregationConcurrency: number;
  dataAccessTimeoutMs: number;
  debug: boolean;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  peerGroupLimit: 5,
  peerPopulationBand: 0.5,
  ratingWindowDays: 730,
  redFlagWindowDays: 90,
  aggregationConcurrency: 8,
  dataAccessTimeoutMs: 5000,
  debug: false,
};

const positiveInt = z.coerce.number().int().positive();

const ENV_FIELDS: {
  env: string;
  key: Exclude<keyof EngineConfig, "debug">;
  schema: z.ZodType<number, z.ZodTypeDef, unknown>;
}[] = [
  { env: "PEER_GROUP_LIMIT", key: "peerGroupLimit", schema: positiveInt },
  { env: "PEER_POPULATION_BAND", key: "peerPopulationBand", schema: z.coerce.number().gt(0).lt(1) },
  { env: "RATING_WINDOW_DAYS", key: "ratingWindowDays", schema: positiveInt },
  { env: "RED_FLAG_WINDOW_DAYS", key: "redFlagWindowDays", schema: positiveInt },
  { env: "AGGREGATION_CONCURRENCY", key: "aggregationConcurrency", schema: positiveInt.max(64) },
  { env: "DATA_ACCESS_TIMEOUT_MS", key: "dataAccessTimeoutMs", schema: positiveInt },
];

function parseFlag(raw: string | undefined): boolean {
  if (raw == null) return false;
  const s = raw.trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes";
}

export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env,
  logger?: Logger
): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, debug: parseFlag(env.ENGINE_DEBUG) };
  for (const field of ENV_FIELDS) {
    const raw = env[field.env];
    if (raw == null || raw.trim() === "") continue;
    const parsed = field.schema.safeParse(raw.trim());
    if (parsed.success) {
      config[field.key] = parsed.data;
    } else {
      logger?.warn(`invalid ${field.env}, using default`, {
        value: raw,
        default: DEFAULT_ENGINE_CONFIG[field.key],
      });
    }
  }
  return config;
}
