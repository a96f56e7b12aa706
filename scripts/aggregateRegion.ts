/**
 * Region benchmark: builds every council profile in a state/region and prints
 * per-metric coverage, mean, median, best and worst. Excluded councils (timeout
 * or load failure) are listed; Ctrl-C stops early and prints the partial result.
 *
 * Usage: npx tsx scripts/aggregateRegion.ts <region> [--json]
 */

import { createServiceRoleClient } from "../lib/supabase/service";
import { createSupabaseEntityRepository } from "../lib/supabase/entityRepository";
import { createCouncilEngine } from "../lib/councilEngine";
import { loadEngineConfig } from "../lib/engineConfig";
import { createLogger } from "../lib/logger";

function fmt(n: number | null): string {
  return n == null ? "n/a" : n.toFixed(2);
}

async function main() {
  const args = process.argv.slice(2);
  const asJson = args.includes("--json");
  const region = args.find((a) => !a.startsWith("--"));
  if (!region) {
    console.error("Usage: npx tsx scripts/aggregateRegion.ts <region> [--json]");
    process.exit(1);
  }

  const bootLogger = createLogger("aggregate-region");
  const config = loadEngineConfig(process.env, bootLogger);
  const logger = createLogger("aggregate-region", { debug: config.debug });
  const repository = createSupabaseEntityRepository(createServiceRoleClient(), logger);
  const engine = createCouncilEngine({ repository, config, logger });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("Interrupted: finishing with partial results.");
    controller.abort();
  });

  const result = await engine.aggregateRegion(region, { signal: controller.signal });

  if (asJson) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(`Region: ${result.region}${result.cancelled ? " (cancelled, partial)" : ""}`);
  console.log(`Councils: ${result.totalEntities}, profiled: ${result.profiledEntities}`);
  if (result.excludedEntities.length > 0) {
    console.log(`Excluded: ${result.excludedEntities.join(", ")}`);
  }
  for (const def of engine.catalog.all()) {
    const agg = result.metrics[def.canonicalName];
    if (!agg) continue;
    console.log(
      `${def.canonicalName}: coverage ${(agg.coverage * 100).toFixed(0)}%, mean ${fmt(agg.mean)}, median ${fmt(
        agg.median
      )}, best ${fmt(agg.best)}, worst ${fmt(agg.worst)}`
    );
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
