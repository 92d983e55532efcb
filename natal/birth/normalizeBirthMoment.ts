/**
 * Birth Moment Normalizer
 *
 * Turns raw profile fields into a validated BirthMoment. Pure: `now` is an
 * explicit option so the 120-year window is reproducible.
 */

import type { CalendarDate, TimeOfDay } from "../../astro/julianDate.js";
import {
  fail,
  ok,
  type BirthDataError,
  type IncompleteBirthDataError,
  type Result,
} from "../errors.js";
import type {
  BirthMoment,
  BirthPlace,
  ChartReadyBirthMoment,
  RawBirthProfile,
} from "./birthMoment.schema.js";
import { parsePlaceName } from "./parsePlaceName.js";
import { calendarDateIn, isKnownTimezone, offsetForLocalTime } from "./timezone.js";

export const MAX_AGE_YEARS = 120;
const MAX_OFFSET_MINUTES = 14 * 60;

const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0 };

export interface NormalizeOptions {
  now?: Date;
  // Require time, coordinates and timezone (full chart generation)
  forChart?: boolean;
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, "0")}-${String(date.month).padStart(2, "0")}-${String(date.day).padStart(2, "0")}`;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function parseCalendarDate(input: string): CalendarDate | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function parseTimeOfDay(input: string): TimeOfDay | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(input.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  return a.day - b.day;
}

function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isPresent(value: number | null | undefined): value is number {
  return typeof value === "number";
}

/**
 * Normalize raw profile fields into a BirthMoment.
 *
 * Check order: date format, timezone id (it decides "today"), date window,
 * time, explicit offset, coordinates, place, then (with forChart)
 * completeness. The first failure is returned.
 */
export function normalizeBirthMoment(
  input: RawBirthProfile,
  options: NormalizeOptions = {}
): Result<BirthMoment, BirthDataError> {
  const now = options.now ?? new Date();

  if (!hasText(input.birth_date)) {
    return fail({
      kind: "IncompleteBirthData",
      category: "validation",
      message: "Birth date is required",
      missing_fields: ["birth_date"],
    });
  }

  const calendarDate = parseCalendarDate(input.birth_date);
  if (!calendarDate) {
    return fail({
      kind: "InvalidBirthDate",
      category: "validation",
      message: `Birth date "${input.birth_date}" is not a valid YYYY-MM-DD calendar date`,
      input: input.birth_date,
    });
  }

  const timezoneId = hasText(input.timezone) ? input.timezone.trim() : null;
  if (timezoneId !== null && !isKnownTimezone(timezoneId)) {
    return fail({
      kind: "UnknownTimezone",
      category: "validation",
      message: `Unknown timezone "${timezoneId}"`,
      timezone: timezoneId,
    });
  }

  const today = calendarDateIn(now, timezoneId);
  if (compareCalendarDates(calendarDate, today) > 0) {
    return fail({
      kind: "FutureBirthDate",
      category: "validation",
      message: "Birth date is in the future",
      birth_date: formatCalendarDate(calendarDate),
      today: formatCalendarDate(today),
    });
  }

  const earliest: CalendarDate = { ...today, year: today.year - MAX_AGE_YEARS };
  if (compareCalendarDates(calendarDate, earliest) < 0) {
    return fail({
      kind: "BirthDateTooOld",
      category: "validation",
      message: `Birth date is more than ${MAX_AGE_YEARS} years ago`,
      birth_date: formatCalendarDate(calendarDate),
      earliest_allowed: formatCalendarDate(earliest),
    });
  }

  let localTime = MIDNIGHT;
  let timePrecision: BirthMoment["time_precision"] = "date_only";
  if (hasText(input.birth_time)) {
    const parsed = parseTimeOfDay(input.birth_time);
    if (!parsed) {
      return fail({
        kind: "InvalidBirthTime",
        category: "validation",
        message: `Birth time "${input.birth_time}" is not a valid HH:MM time`,
        input: input.birth_time,
      });
    }
    localTime = parsed;
    timePrecision = "exact";
  }

  let offsetMinutes = 0;
  let timezoneSource: BirthMoment["timezone_source"] = "assumed_utc";
  if (timezoneId !== null) {
    offsetMinutes = offsetForLocalTime(timezoneId, calendarDate, localTime);
    timezoneSource = "iana";
  } else if (isPresent(input.timezone_offset_minutes)) {
    const explicit = input.timezone_offset_minutes;
    if (!Number.isInteger(explicit) || Math.abs(explicit) > MAX_OFFSET_MINUTES) {
      return fail({
        kind: "UnknownTimezone",
        category: "validation",
        message: `Timezone offset ${explicit} minutes is outside ±${MAX_OFFSET_MINUTES}`,
        timezone: String(explicit),
      });
    }
    offsetMinutes = explicit;
    timezoneSource = "explicit_offset";
  }

  const latitude = isPresent(input.latitude) ? input.latitude : null;
  const longitude = isPresent(input.longitude) ? input.longitude : null;
  if ((latitude === null) !== (longitude === null)) {
    return fail({
      kind: "IncompleteBirthData",
      category: "validation",
      message: "Latitude and longitude must be given together",
      missing_fields: [latitude === null ? "latitude" : "longitude"],
    });
  }
  if (
    latitude !== null &&
    longitude !== null &&
    (!Number.isFinite(latitude) ||
      !Number.isFinite(longitude) ||
      Math.abs(latitude) > 90 ||
      Math.abs(longitude) > 180)
  ) {
    return fail({
      kind: "InvalidCoordinates",
      category: "validation",
      message: "Coordinates are out of range",
      latitude,
      longitude,
    });
  }

  const rawPlace = hasText(input.birth_place) ? input.birth_place : null;
  let place: BirthPlace | null = null;
  if (rawPlace !== null || latitude !== null || timezoneId !== null) {
    const parsedPlace = rawPlace !== null ? parsePlaceName(rawPlace) : null;
    if (rawPlace !== null && parsedPlace?.city == null) {
      return fail({
        kind: "MalformedPlaceName",
        category: "validation",
        message: `Place "${rawPlace}" has no usable city segment`,
        raw_name: rawPlace,
      });
    }
    place = {
      raw_name: rawPlace,
      city: parsedPlace?.city ?? null,
      state: parsedPlace?.state ?? null,
      country: parsedPlace?.country ?? "Unknown",
      latitude,
      longitude,
      resolved_timezone_id: timezoneId,
    };
  }

  const moment: BirthMoment = {
    full_name: input.full_name.trim(),
    calendar_date: calendarDate,
    local_time: localTime,
    time_precision: timePrecision,
    timezone_offset_minutes: offsetMinutes,
    timezone_source: timezoneSource,
    place,
  };

  if (options.forChart) {
    const ready = requireChartReady(moment);
    if (!ready.ok) return ready;
  }

  return ok(moment);
}

/**
 * Fields a BirthMoment lacks for full chart generation, in a stable order.
 */
export function missingChartFields(moment: BirthMoment): string[] {
  const missing: string[] = [];
  if (moment.time_precision !== "exact") missing.push("birth_time");
  if (moment.place?.latitude == null) missing.push("latitude");
  if (moment.place?.longitude == null) missing.push("longitude");
  if (moment.timezone_source === "assumed_utc") missing.push("timezone");
  return missing;
}

export function requireChartReady(
  moment: BirthMoment
): Result<ChartReadyBirthMoment, IncompleteBirthDataError> {
  const { place } = moment;
  if (
    moment.time_precision === "exact" &&
    moment.timezone_source !== "assumed_utc" &&
    place !== null &&
    place.latitude !== null &&
    place.longitude !== null
  ) {
    const ready: ChartReadyBirthMoment = {
      ...moment,
      time_precision: "exact",
      timezone_source: moment.timezone_source,
      place: { ...place, latitude: place.latitude, longitude: place.longitude },
    };
    return ok(ready);
  }

  const missing = missingChartFields(moment);
  return fail({
    kind: "IncompleteBirthData",
    category: "validation",
    message: `Birth data incomplete for chart generation: missing ${missing.join(", ")}`,
    missing_fields: missing,
  });
}
