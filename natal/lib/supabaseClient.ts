import { createClient, type SupabaseClient } from "@supabase/supabase-js";

function missingEnvError() {
  return new Error(
    "Missing Supabase env vars (SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY preferred)"
  );
}

let client: SupabaseClient | null = null;

/**
 * Shared client, created on first use so that importing this module never
 * requires the environment to be configured.
 */
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const supabaseUrl = process.env.SUPABASE_URL;
  const key =
    process.env.SUPABASE_SERVICE_ROLE_KEY ??
    process.env.SUPABASE_ANON_KEY ??
    process.env.SUPABASE_KEY;

  if (!supabaseUrl || !key) {
    throw missingEnvError();
  }

  client = createClient(supabaseUrl, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return client;
}

export const EPHEMERIS_FUNCTION_NAME = process.env.EPHEMERIS_FUNCTION_NAME ?? "ephemeris";
export const COMPATIBILITY_FUNCTION_NAME = process.env.COMPATIBILITY_FUNCTION_NAME ?? "match";
