/**
 * Best-effort "City, State, Country" split.
 *
 * Known limitation: names that do not follow that order (or use commas
 * inside a segment) come out wrong. A single segment is both city and country.
 */

export const UNKNOWN_COUNTRY = "Unknown";

export interface ParsedPlace {
  city: string | null;
  state: string | null;
  country: string;
}

export function parsePlaceName(rawName: string): ParsedPlace {
  const segments = rawName
    .split(",")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  const city = segments[0] ?? null;
  const country = segments[segments.length - 1] ?? UNKNOWN_COUNTRY;
  const state = segments.length > 2 ? (segments[segments.length - 2] ?? null) : null;

  return { city, state, country };
}
