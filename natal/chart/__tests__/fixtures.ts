import type { TropicalPosition } from "../../../astro/schemas/positions.schema.js";
import type { BirthMoment } from "../../birth/birthMoment.schema.js";

// 24 Dec 1999, 07:00 at +05:30 → 01:30 UTC
export const scenarioMoment: BirthMoment = {
  full_name: "Test Person",
  calendar_date: { year: 1999, month: 12, day: 24 },
  local_time: { hour: 7, minute: 0 },
  time_precision: "exact",
  timezone_offset_minutes: 330,
  timezone_source: "iana",
  place: {
    raw_name: "Chennai, Tamil Nadu, India",
    city: "Chennai",
    state: "Tamil Nadu",
    country: "India",
    latitude: 13.08,
    longitude: 80.27,
    resolved_timezone_id: "Asia/Kolkata",
  },
};

export const dateOnlyMoment: BirthMoment = {
  ...scenarioMoment,
  local_time: { hour: 0, minute: 0 },
  time_precision: "date_only",
};

// Illustrative tropical longitudes, not ephemeris output
export const scenarioTropical: TropicalPosition[] = [
  { planet: "sun", longitude_deg: 271.7 },
  { planet: "moon", longitude_deg: 109.7 },
  { planet: "mercury", longitude_deg: 258.8333 },
  { planet: "venus", longitude_deg: 231.3333 },
  { planet: "mars", longitude_deg: 321.3667 },
  { planet: "jupiter", longitude_deg: 25.0167, retrograde: true },
  { planet: "saturn", longitude_deg: 40.6167, retrograde: true },
];
