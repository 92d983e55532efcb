/**
 * Boundary with the remote ephemeris/chart service.
 *
 * The service computes tropical longitudes for the exact UTC instant of the
 * request; this module only shapes the request and validates the response.
 */

import { z } from "zod";
import {
  PLANET_IDS,
  type PlanetId,
  type TropicalPosition,
} from "../../astro/schemas/positions.schema.js";
import type { ChartReadyBirthMoment } from "../birth/birthMoment.schema.js";
import { formatCalendarDate, formatTimeOfDay } from "../birth/normalizeBirthMoment.js";
import { formatOffset } from "../birth/timezone.js";
import {
  fail,
  formatZodIssues,
  ok,
  type MalformedEphemerisResponseError,
  type Result,
} from "../errors.js";

export type ChartRequest = {
  name: string;
  birth_date: string; // YYYY-MM-DD
  birth_time: string; // HH:MM, local
  latitude: number;
  longitude: number;
  timezone: string; // IANA id, or ±HH:MM for an explicit offset
  city: string | null;
  state: string | null;
  country: string;
  planets: PlanetId[];
};

export interface EphemerisSource {
  fetchTropicalPositions(
    request: ChartRequest
  ): Promise<Result<TropicalPosition[], MalformedEphemerisResponseError>>;
}

export function toChartRequest(
  moment: ChartReadyBirthMoment,
  planets: readonly PlanetId[]
): ChartRequest {
  return {
    name: moment.full_name,
    birth_date: formatCalendarDate(moment.calendar_date),
    birth_time: formatTimeOfDay(moment.local_time),
    latitude: moment.place.latitude,
    longitude: moment.place.longitude,
    timezone:
      moment.place.resolved_timezone_id ?? formatOffset(moment.timezone_offset_minutes),
    city: moment.place.city,
    state: moment.place.state,
    country: moment.place.country,
    planets: [...planets],
  };
}

export const EphemerisResponseSchema = z.object({
  planets: z.array(
    z.object({
      name: z.string().min(1),
      degree: z.number().finite(),
      retrograde: z.boolean().optional(),
      sign: z.string().optional(),
    })
  ),
  timestamp: z.string().optional(),
});

// Vedic node names used by some chart systems
const PLANET_ALIASES: Record<string, PlanetId> = {
  rahu: "north_node",
  ketu: "south_node",
  true_node: "north_node",
  mean_node: "north_node",
};

function isPlanetId(value: string): value is PlanetId {
  return PLANET_IDS.some((id) => id === value);
}

/**
 * "Sun" → "sun", "North Node" → "north_node", "Rahu" → "north_node".
 */
export function toPlanetId(name: string): PlanetId | null {
  const normalized = name.trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (isPlanetId(normalized)) return normalized;
  return PLANET_ALIASES[normalized] ?? null;
}

/**
 * Validate a raw ephemeris payload into tropical positions, in response order.
 * Bodies with no planet id (Chiron, Ascendant, ...) are skipped; a requested
 * planet that goes missing this way surfaces later as IncompleteEphemerisData.
 */
export function parseEphemerisResponse(
  payload: unknown
): Result<TropicalPosition[], MalformedEphemerisResponseError> {
  const parsed = EphemerisResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return fail({
      kind: "MalformedEphemerisResponse",
      category: "external_data",
      message: "Ephemeris response did not match the expected shape",
      issues: formatZodIssues(parsed.error),
    });
  }

  const positions: TropicalPosition[] = [];
  for (const entry of parsed.data.planets) {
    const planet = toPlanetId(entry.name);
    if (planet === null) continue;
    const position: TropicalPosition = { planet, longitude_deg: entry.degree };
    if (entry.retrograde !== undefined) position.retrograde = entry.retrograde;
    positions.push(position);
  }

  return ok(positions);
}
