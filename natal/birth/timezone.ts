/**
 * Timezone utilities for birth moments.
 *
 * Uses built-in Intl APIs (the runtime's IANA database) to avoid heavy dependencies.
 */

import type { CalendarDate, TimeOfDay } from "../../astro/julianDate.js";

export interface UtcComponents extends CalendarDate, TimeOfDay {}

const MINUTE_MS = 60_000;

/**
 * Epoch milliseconds for wall-clock fields read as UTC.
 * Date.UTC maps years 0–99 onto 1900–1999, so the year is set separately.
 */
export function wallClockMillis(date: CalendarDate, time: TimeOfDay): number {
  const d = new Date(0);
  d.setUTCFullYear(date.year, date.month - 1, date.day);
  d.setUTCHours(time.hour, time.minute, 0, 0);
  return d.getTime();
}

function componentsFromMillis(ms: number): UtcComponents {
  const d = new Date(ms);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
  };
}

export function isKnownTimezone(timeZone: string): boolean {
  if (timeZone.trim().length === 0) return false;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

function partValue(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): number {
  const part = parts.find((p) => p.type === type);
  if (!part) {
    throw new Error(`Intl.DateTimeFormat returned no ${type} part`);
  }
  return parseInt(part.value, 10);
}

/**
 * Offset (minutes east of UTC) in effect in `timeZone` at a UTC instant.
 */
export function zoneOffsetMinutesAt(timeZone: string, utcMillis: number): number {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    era: "short",
  });
  const parts = formatter.formatToParts(new Date(utcMillis));
  const era = parts.find((p) => p.type === "era")?.value;
  const rawYear = partValue(parts, "year");
  const year = era === "BC" ? 1 - rawYear : rawYear;

  const local = wallClockMillis(
    { year, month: partValue(parts, "month"), day: partValue(parts, "day") },
    { hour: partValue(parts, "hour"), minute: partValue(parts, "minute") }
  );
  const seconds = partValue(parts, "second");
  return Math.round((local + seconds * 1000 - utcMillis) / MINUTE_MS);
}

/**
 * Offset in effect for a local wall-clock time in `timeZone` (DST-aware).
 * Two passes: the offset at the naive instant, then at the corrected one.
 */
export function offsetForLocalTime(
  timeZone: string,
  date: CalendarDate,
  time: TimeOfDay
): number {
  const local = wallClockMillis(date, time);
  const first = zoneOffsetMinutesAt(timeZone, local);
  const second = zoneOffsetMinutesAt(timeZone, local - first * MINUTE_MS);
  return second;
}

/**
 * Apply an offset to local wall-clock fields, rolling the date as needed.
 * 07:00 at +330 → 01:30 UTC the same day; 00:30 at +330 → 19:00 UTC the day before.
 */
export function toUtcComponents(
  date: CalendarDate,
  time: TimeOfDay,
  offsetMinutes: number
): UtcComponents {
  return componentsFromMillis(wallClockMillis(date, time) - offsetMinutes * MINUTE_MS);
}

/**
 * Today's calendar date in `timeZone` (UTC when absent).
 */
export function calendarDateIn(now: Date, timeZone: string | null): CalendarDate {
  if (!timeZone) {
    return {
      year: now.getUTCFullYear(),
      month: now.getUTCMonth() + 1,
      day: now.getUTCDate(),
    };
  }
  const offset = zoneOffsetMinutesAt(timeZone, now.getTime());
  const shifted = componentsFromMillis(now.getTime() + offset * MINUTE_MS);
  return { year: shifted.year, month: shifted.month, day: shifted.day };
}

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${String(Math.floor(abs / 60)).padStart(2, "0")}:${String(abs % 60).padStart(2, "0")}`;
}
