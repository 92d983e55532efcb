import { z } from "zod";

/**
 * Raw profile fields as collected during onboarding or profile edit.
 * Wire format matches the chart service: YYYY-MM-DD dates, HH:MM times.
 */
export const RawBirthProfileSchema = z.object({
  full_name: z.string(),
  birth_date: z.string(),
  birth_time: z.string().nullish(),
  birth_place: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  // IANA identifier, e.g. "Asia/Kolkata"
  timezone: z.string().nullish(),
  // Used only when no IANA identifier is given
  timezone_offset_minutes: z.number().int().nullish(),
});

const CalendarDateSchema = z.object({
  year: z.number().int().min(1),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
});

const TimeOfDaySchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
});

const BirthPlaceSchema = z.object({
  raw_name: z.string().nullable(),
  city: z.string().nullable(),
  state: z.string().nullable(),
  country: z.string(),
  latitude: z.number().min(-90).max(90).nullable(),
  longitude: z.number().min(-180).max(180).nullable(),
  resolved_timezone_id: z.string().nullable(),
});

export const BirthMomentSchema = z.object({
  full_name: z.string(),
  calendar_date: CalendarDateSchema,
  local_time: TimeOfDaySchema,
  // "date_only" means local_time is the 00:00 stand-in and is low precision
  time_precision: z.enum(["exact", "date_only"]),
  timezone_offset_minutes: z.number().int().min(-840).max(840),
  timezone_source: z.enum(["iana", "explicit_offset", "assumed_utc"]),
  place: BirthPlaceSchema.nullable(),
});

export type RawBirthProfile = z.infer<typeof RawBirthProfileSchema>;
export type BirthPlace = z.infer<typeof BirthPlaceSchema>;
export type BirthMoment = z.infer<typeof BirthMomentSchema>;

export type ChartReadyBirthMoment = BirthMoment & {
  time_precision: "exact";
  timezone_source: "iana" | "explicit_offset";
  place: BirthPlace & { latitude: number; longitude: number };
};
