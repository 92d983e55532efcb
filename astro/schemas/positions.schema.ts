import { z } from "zod";
import { SIGN_NAMES } from "../zodiac.js";

/**
 * Zod schemas for ecliptic positions.
 *
 * Tropical positions come from the ephemeris collaborator; the longitude is
 * only required to be finite here because the sidereal mapper normalizes any
 * range. Sidereal positions are derived and must satisfy the sign bounds.
 */

export const PLANET_IDS = [
  "sun",
  "moon",
  "mercury",
  "venus",
  "mars",
  "jupiter",
  "saturn",
  "uranus",
  "neptune",
  "pluto",
  "north_node",
  "south_node",
] as const;

export const PlanetIdSchema = z.enum(PLANET_IDS);

export const SignNameSchema = z.enum(SIGN_NAMES);

export const TropicalPositionSchema = z.object({
  planet: PlanetIdSchema,
  longitude_deg: z.number().finite(),
  retrograde: z.boolean().optional(),
});

const SignPlacementSchema = z.object({
  longitude_deg: z.number().min(0).lt(360),
  sign_index: z.number().int().min(0).max(11),
  sign: SignNameSchema,
  degree_in_sign: z.number().min(0).lt(30),
});

export const SiderealPositionSchema = SignPlacementSchema.extend({
  planet: PlanetIdSchema,
});

export const TropicalPlacementSchema = SignPlacementSchema.extend({
  planet: PlanetIdSchema,
  retrograde: z.boolean().optional(),
});

export type PlanetId = z.infer<typeof PlanetIdSchema>;
export type TropicalPosition = z.infer<typeof TropicalPositionSchema>;
export type SiderealPosition = z.infer<typeof SiderealPositionSchema>;
export type TropicalPlacement = z.infer<typeof TropicalPlacementSchema>;
