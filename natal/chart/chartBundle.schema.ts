import { z } from "zod";
import { LAHIRI_LINEAR } from "../../astro/ayanamsa.js";
import {
  PlanetIdSchema,
  SiderealPositionSchema,
  TropicalPlacementSchema,
  type PlanetId,
} from "../../astro/schemas/positions.schema.js";
import { BirthMomentSchema } from "../birth/birthMoment.schema.js";

/**
 * Zod schema for a chart bundle: one birth moment, its Julian Date and
 * ayanamsa, and both zodiac placements for every requested planet.
 *
 * Not persisted here; caching and storage belong to the caller.
 */

const UtcComponentsSchema = z.object({
  year: z.number().int().min(1),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
});

export const ChartBundleSchema = z
  .object({
    birth_moment: BirthMomentSchema,
    utc: UtcComponentsSchema,
    julian_date: z.number().positive(),
    ayanamsa_model: z.literal(LAHIRI_LINEAR.name),
    ayanamsa_deg: z.number(),
    requested_planets: z.array(PlanetIdSchema),
    tropical_positions: z.array(TropicalPlacementSchema),
    sidereal_positions: z.array(SiderealPositionSchema),
  })
  .superRefine((val, ctx) => {
    const siderealPlanets = val.sidereal_positions.map((p) => p.planet);
    if (new Set(siderealPlanets).size !== siderealPlanets.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "sidereal_positions must not repeat a planet",
        path: ["sidereal_positions"],
      });
    }
    const tropicalPlanets = val.tropical_positions.map((p) => p.planet);
    if (tropicalPlanets.join(",") !== siderealPlanets.join(",")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "tropical_positions and sidereal_positions must list the same planets in order",
        path: ["tropical_positions"],
      });
    }
  });

export type ChartBundle = z.infer<typeof ChartBundleSchema>;

// Classical seven
export const DEFAULT_PLANETS: readonly PlanetId[] = [
  "sun",
  "moon",
  "mercury",
  "venus",
  "mars",
  "jupiter",
  "saturn",
];
