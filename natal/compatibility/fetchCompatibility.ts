import type { SupabaseClient } from "@supabase/supabase-js";
import type { BirthMoment, ChartReadyBirthMoment } from "../birth/birthMoment.schema.js";
import {
  formatCalendarDate,
  formatTimeOfDay,
  requireChartReady,
} from "../birth/normalizeBirthMoment.js";
import { formatOffset } from "../birth/timezone.js";
import {
  fail,
  formatZodIssues,
  ok,
  type IncompleteBirthDataError,
  type MalformedCompatibilityError,
  type Result,
} from "../errors.js";
import { COMPATIBILITY_FUNCTION_NAME, getSupabase } from "../lib/supabaseClient.js";
import { chartLogHelpers } from "../logging/chartLog.js";
import {
  CompatibilityContractSchema,
  MatchResponseSchema,
  type CompatibilityContract,
} from "./compatibility.schema.js";

export type MatchUser = {
  birth_date: string;
  birth_time: string;
  timezone: string;
  latitude: number;
  longitude: number;
};

export type MatchPartner = MatchUser & { name: string };

export type MatchRequest = {
  user: MatchUser;
  partner: MatchPartner;
  matchType: string;
  systems: string[];
};

export const DEFAULT_SYSTEMS = ["vedic", "chinese"] as const;

function toMatchUser(moment: ChartReadyBirthMoment): MatchUser {
  return {
    birth_date: formatCalendarDate(moment.calendar_date),
    birth_time: formatTimeOfDay(moment.local_time),
    timezone: moment.place.resolved_timezone_id ?? formatOffset(moment.timezone_offset_minutes),
    latitude: moment.place.latitude,
    longitude: moment.place.longitude,
  };
}

export function toMatchRequest(
  user: ChartReadyBirthMoment,
  partner: ChartReadyBirthMoment,
  systems: readonly string[] = DEFAULT_SYSTEMS,
  matchType: string = "romantic"
): MatchRequest {
  return {
    user: toMatchUser(user),
    partner: { name: partner.full_name, ...toMatchUser(partner) },
    matchType,
    systems: [...systems],
  };
}

/**
 * Validate a payload that is already in contract shape.
 */
export function validateCompatibility(
  payload: unknown
): Result<CompatibilityContract, MalformedCompatibilityError> {
  const parsed = CompatibilityContractSchema.safeParse(payload);
  if (!parsed.success) {
    return fail({
      kind: "MalformedCompatibility",
      category: "external_data",
      message: "Compatibility response did not match the contract",
      issues: formatZodIssues(parsed.error),
    });
  }
  return ok(parsed.data);
}

/**
 * Map a match service response onto the contract, then validate it.
 * Absent per-system scores are left out rather than defaulted.
 */
export function parseMatchResponse(
  payload: unknown
): Result<CompatibilityContract, MalformedCompatibilityError> {
  const parsed = MatchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return fail({
      kind: "MalformedCompatibility",
      category: "external_data",
      message: "Match response did not match the expected shape",
      issues: formatZodIssues(parsed.error),
    });
  }

  const response = parsed.data;
  const perSystem: Record<string, number> = {};
  const systemScores: Array<[string, number | null | undefined]> = [
    ["vedic", response.vedicScore],
    ["chinese", response.chineseScore],
    ["western", response.westernScore],
  ];
  for (const [system, score] of systemScores) {
    if (typeof score === "number") perSystem[system] = score;
  }

  return validateCompatibility({
    overall_score: response.overallScore ?? null,
    per_system_scores: perSystem,
    synastry_aspect_descriptions: response.synastryAspects,
  });
}

export interface FetchCompatibilityOptions {
  systems?: readonly string[];
  matchType?: string;
  client?: SupabaseClient;
  functionName?: string;
}

/**
 * Request a compatibility report for two chart-ready birth moments.
 * Transport errors are thrown; shape problems come back as results.
 */
export async function fetchCompatibility(
  user: BirthMoment,
  partner: BirthMoment,
  options: FetchCompatibilityOptions = {}
): Promise<Result<CompatibilityContract, IncompleteBirthDataError | MalformedCompatibilityError>> {
  const readyUser = requireChartReady(user);
  if (!readyUser.ok) return readyUser;
  const readyPartner = requireChartReady(partner);
  if (!readyPartner.ok) return readyPartner;

  const request = toMatchRequest(
    readyUser.value,
    readyPartner.value,
    options.systems,
    options.matchType
  );
  const supabase = options.client ?? getSupabase();
  const { data, error } = await supabase.functions.invoke<unknown>(
    options.functionName ?? COMPATIBILITY_FUNCTION_NAME,
    { body: request }
  );

  if (error) {
    chartLogHelpers.compatibilityFailed({
      error_kind: "transport",
      error_message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  const result = parseMatchResponse(data);
  if (!result.ok) {
    chartLogHelpers.compatibilityFailed({
      error_kind: result.error.kind,
      error_message: result.error.message,
    });
    return result;
  }

  chartLogHelpers.compatibilitySucceeded({
    overall_score: result.value.overall_score,
    system_count: Object.keys(result.value.per_system_scores).length,
  });
  return result;
}
