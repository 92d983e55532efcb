/**
 * Tropical → sidereal conversion.
 * Layer 0: consumes ephemeris longitudes, never computes them.
 */

import type {
  SiderealPosition,
  TropicalPlacement,
  TropicalPosition,
} from "./schemas/positions.schema.js";
import { placeOnZodiac } from "./zodiac.js";

/**
 * Subtract the ayanamsa from each tropical longitude and place the result on
 * the sidereal zodiac. Output order and planet ids follow the input.
 *
 * Any finite longitude is accepted; 0 <= longitude_deg < 360 and
 * 0 <= degree_in_sign < 30 hold for every output.
 */
export function toSidereal(
  tropicalPositions: readonly TropicalPosition[],
  ayanamsaDeg: number
): SiderealPosition[] {
  if (!Number.isFinite(ayanamsaDeg)) {
    throw new Error("Invalid ayanamsa; expected a finite number of degrees");
  }

  return tropicalPositions.map((position) => {
    if (!Number.isFinite(position.longitude_deg)) {
      throw new Error(`Invalid tropical longitude for ${position.planet}`);
    }
    return {
      planet: position.planet,
      ...placeOnZodiac(position.longitude_deg - ayanamsaDeg),
    };
  });
}

/**
 * The same positions placed on the tropical zodiac, for dual display.
 */
export function toTropicalPlacements(
  tropicalPositions: readonly TropicalPosition[]
): TropicalPlacement[] {
  return tropicalPositions.map((position) => {
    const placement: TropicalPlacement = {
      planet: position.planet,
      ...placeOnZodiac(position.longitude_deg),
    };
    if (position.retrograde !== undefined) {
      placement.retrograde = position.retrograde;
    }
    return placement;
  });
}
