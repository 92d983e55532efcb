import type { SupabaseClient } from "@supabase/supabase-js";
import { EPHEMERIS_FUNCTION_NAME, getSupabase } from "../lib/supabaseClient.js";
import {
  parseEphemerisResponse,
  type ChartRequest,
  type EphemerisSource,
} from "./ephemerisSource.js";

/**
 * Ephemeris source backed by the remote `ephemeris` edge function.
 *
 * Transport errors are thrown as returned by the client; retry policy
 * belongs to the caller.
 */
export function createSupabaseEphemerisSource(
  options: { client?: SupabaseClient; functionName?: string } = {}
): EphemerisSource {
  const functionName = options.functionName ?? EPHEMERIS_FUNCTION_NAME;

  return {
    async fetchTropicalPositions(request: ChartRequest) {
      const supabase = options.client ?? getSupabase();
      const { data, error } = await supabase.functions.invoke<unknown>(functionName, {
        body: request,
      });

      if (error) {
        throw error;
      }

      return parseEphemerisResponse(data);
    },
  };
}
