import { createClient, type SupabaseClient } from "@supabase/supabase-js";

/**
 * Server-only. Use only in scripts or trusted server processes.
 * Requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 */
export function createServiceRoleClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new Error("Missing SUPABASE_URL and/or SUPABASE_SERVICE_ROLE_KEY for service role client");
  }
  return createClient(url, key, { auth: { persistSession: false } });
}
