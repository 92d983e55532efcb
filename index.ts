export { julianDate, julianDateFor, julianDayNumber } from "./astro/julianDate.js";
export type { CalendarDate, TimeOfDay } from "./astro/julianDate.js";
export { ayanamsa, LAHIRI_LINEAR } from "./astro/ayanamsa.js";
export {
  SIGN_NAMES,
  formatDegreesMinutes,
  formatPlacement,
  normalizeDegrees,
  placeOnZodiac,
  signName,
} from "./astro/zodiac.js";
export type { SignName, SignPlacement } from "./astro/zodiac.js";
export { toSidereal, toTropicalPlacements } from "./astro/toSidereal.js";
export {
  PLANET_IDS,
  SiderealPositionSchema,
  TropicalPositionSchema,
} from "./astro/schemas/positions.schema.js";
export type {
  PlanetId,
  SiderealPosition,
  TropicalPlacement,
  TropicalPosition,
} from "./astro/schemas/positions.schema.js";

export { BirthMomentSchema, RawBirthProfileSchema } from "./natal/birth/birthMoment.schema.js";
export type {
  BirthMoment,
  BirthPlace,
  ChartReadyBirthMoment,
  RawBirthProfile,
} from "./natal/birth/birthMoment.schema.js";
export {
  missingChartFields,
  normalizeBirthMoment,
  requireChartReady,
} from "./natal/birth/normalizeBirthMoment.js";
export type { NormalizeOptions } from "./natal/birth/normalizeBirthMoment.js";
export { parsePlaceName } from "./natal/birth/parsePlaceName.js";
export type { ParsedPlace } from "./natal/birth/parsePlaceName.js";
export { toUtcComponents } from "./natal/birth/timezone.js";
export type { UtcComponents } from "./natal/birth/timezone.js";

export { assembleChartBundle, computeChartBundle } from "./natal/chart/assembleChartBundle.js";
export { ChartBundleSchema, DEFAULT_PLANETS } from "./natal/chart/chartBundle.schema.js";
export type { ChartBundle } from "./natal/chart/chartBundle.schema.js";
export { ChartBundleCache } from "./natal/chart/chartBundleCache.js";
export { generateChartBundle } from "./natal/chart/generateChartBundle.js";
export type { GenerateChartOptions } from "./natal/chart/generateChartBundle.js";
export {
  describeCalculationSteps,
  formatCalculationSteps,
} from "./natal/chart/describeCalculationSteps.js";

export {
  parseEphemerisResponse,
  toChartRequest,
} from "./natal/ephemeris/ephemerisSource.js";
export type { ChartRequest, EphemerisSource } from "./natal/ephemeris/ephemerisSource.js";
export { createSupabaseEphemerisSource } from "./natal/ephemeris/supabaseEphemerisSource.js";

export { CompatibilityContractSchema } from "./natal/compatibility/compatibility.schema.js";
export type { CompatibilityContract } from "./natal/compatibility/compatibility.schema.js";
export {
  fetchCompatibility,
  parseMatchResponse,
  toMatchRequest,
  validateCompatibility,
} from "./natal/compatibility/fetchCompatibility.js";

export { isExternalDataError, isValidationError } from "./natal/errors.js";
export type { ChartError, NatalError, Result } from "./natal/errors.js";
