/**
 * Chart Assembly
 *
 * Pure: birth moment + ephemeris longitudes → ChartBundle. The same inputs
 * always give a deeply equal bundle (no generated timestamps).
 */

import { ayanamsa, LAHIRI_LINEAR } from "../../astro/ayanamsa.js";
import { julianDateFor } from "../../astro/julianDate.js";
import type {
  PlanetId,
  SiderealPosition,
  TropicalPlacement,
  TropicalPosition,
} from "../../astro/schemas/positions.schema.js";
import { toSidereal, toTropicalPlacements } from "../../astro/toSidereal.js";
import type { BirthMoment } from "../birth/birthMoment.schema.js";
import { toUtcComponents, type UtcComponents } from "../birth/timezone.js";
import { fail, ok, type EphemerisDataError, type Result } from "../errors.js";
import type { ChartBundle } from "./chartBundle.schema.js";

export interface ChartBundleParts {
  birth_moment: BirthMoment;
  utc: UtcComponents;
  julian_date: number;
  ayanamsa_deg: number;
  requested_planets: readonly PlanetId[];
  tropical_positions: readonly TropicalPlacement[];
  sidereal_positions: readonly SiderealPosition[];
}

function duplicatedPlanets(planets: readonly PlanetId[]): PlanetId[] {
  const seen = new Set<PlanetId>();
  const duplicated = new Set<PlanetId>();
  for (const planet of planets) {
    if (seen.has(planet)) duplicated.add(planet);
    seen.add(planet);
  }
  return [...duplicated];
}

/**
 * Combine precomputed parts into a bundle. Every tropical position must have a
 * sidereal counterpart for the same planet at the same index, and no planet
 * may repeat. Parts that do not pair come back as `PositionMismatch`.
 */
export function assembleChartBundle(parts: ChartBundleParts): Result<ChartBundle, EphemerisDataError> {
  const tropicalPlanets = parts.tropical_positions.map((p) => p.planet);

  const duplicated = duplicatedPlanets(tropicalPlanets);
  if (duplicated.length > 0) {
    return fail({
      kind: "DuplicatePlanet",
      category: "external_data",
      message: `Ephemeris returned duplicate planets: ${duplicated.join(", ")}`,
      duplicated_planets: duplicated,
    });
  }

  const missing = parts.requested_planets.filter((planet) => !tropicalPlanets.includes(planet));
  if (missing.length > 0) {
    return fail({
      kind: "IncompleteEphemerisData",
      category: "external_data",
      message: `Ephemeris returned ${tropicalPlanets.length} of ${parts.requested_planets.length} requested planets; missing ${missing.join(", ")}`,
      requested: parts.requested_planets.length,
      received: tropicalPlanets.length,
      missing_planets: missing,
    });
  }

  const pairCount = Math.max(parts.tropical_positions.length, parts.sidereal_positions.length);
  for (let i = 0; i < pairCount; i++) {
    const tropicalPlanet = parts.tropical_positions[i]?.planet ?? null;
    const siderealPlanet = parts.sidereal_positions[i]?.planet ?? null;
    if (tropicalPlanet === siderealPlanet) continue;
    return fail({
      kind: "PositionMismatch",
      category: "external_data",
      message:
        tropicalPlanet === null
          ? `Sidereal position ${i} (${siderealPlanet}) has no tropical counterpart`
          : `Sidereal position ${i} does not match tropical planet ${tropicalPlanet}`,
      index: i,
      tropical_planet: tropicalPlanet,
      sidereal_planet: siderealPlanet,
    });
  }

  return ok({
    birth_moment: parts.birth_moment,
    utc: parts.utc,
    julian_date: parts.julian_date,
    ayanamsa_model: LAHIRI_LINEAR.name,
    ayanamsa_deg: parts.ayanamsa_deg,
    requested_planets: [...parts.requested_planets],
    tropical_positions: [...parts.tropical_positions],
    sidereal_positions: [...parts.sidereal_positions],
  });
}

/**
 * Full pure pipeline: UTC conversion → Julian Date, birth year → ayanamsa,
 * tropical longitudes → sidereal placements. Positions are kept for the
 * requested planets only, in request order.
 */
export function computeChartBundle(
  moment: BirthMoment,
  tropicalPositions: readonly TropicalPosition[],
  requestedPlanets: readonly PlanetId[]
): Result<ChartBundle, EphemerisDataError> {
  // Unrequested bodies may repeat (aliases such as mean and true node collapse)
  const duplicated = duplicatedPlanets(
    tropicalPositions.map((p) => p.planet).filter((planet) => requestedPlanets.includes(planet))
  );
  if (duplicated.length > 0) {
    return fail({
      kind: "DuplicatePlanet",
      category: "external_data",
      message: `Ephemeris returned duplicate planets: ${duplicated.join(", ")}`,
      duplicated_planets: duplicated,
    });
  }

  const selected: TropicalPosition[] = [];
  const missing: PlanetId[] = [];
  for (const planet of requestedPlanets) {
    const position = tropicalPositions.find((p) => p.planet === planet);
    if (position) {
      selected.push(position);
    } else {
      missing.push(planet);
    }
  }
  if (missing.length > 0) {
    return fail({
      kind: "IncompleteEphemerisData",
      category: "external_data",
      message: `Ephemeris returned ${tropicalPositions.length} positions; missing ${missing.join(", ")}`,
      requested: requestedPlanets.length,
      received: tropicalPositions.length,
      missing_planets: missing,
    });
  }

  const utc = toUtcComponents(
    moment.calendar_date,
    moment.local_time,
    moment.timezone_offset_minutes
  );
  const ayanamsaDeg = ayanamsa(moment.calendar_date.year);

  return assembleChartBundle({
    birth_moment: moment,
    utc,
    julian_date: julianDateFor(utc, utc),
    ayanamsa_deg: ayanamsaDeg,
    requested_planets: requestedPlanets,
    tropical_positions: toTropicalPlacements(selected),
    sidereal_positions: toSidereal(selected, ayanamsaDeg),
  });
}
