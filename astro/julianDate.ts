/**
 * Julian Date from a proleptic Gregorian calendar date and a UTC time of day.
 *
 * Pure and deterministic. Hour and minute must already be UTC; applying the
 * birth timezone offset is the caller's job (see natal/birth/toUtcComponents).
 * No leap seconds, no dates before year 1.
 */

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

export interface TimeOfDay {
  hour: number; // 0-23
  minute: number; // 0-59
}

/**
 * Integer Julian Day Number of the civil date (the day whose noon it labels).
 */
export function julianDayNumber(year: number, month: number, day: number): number {
  assertCalendarDate(year, month, day);

  const a = Math.floor((14 - month) / 12);
  const y = year - a;
  const m = month + 12 * a - 3;

  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) +
    1721119
  );
}

/**
 * Continuous Julian Date for a UTC instant.
 *
 * Julian days begin at noon, so the civil day numbered by julianDayNumber()
 * starts at JDN - 0.5; the fraction of the day elapsed since midnight is added
 * on top. julianDate(1999, 12, 24, 1, 30) === 2451536.5625.
 */
export function julianDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number
): number {
  if (!Number.isFinite(hour) || !Number.isFinite(minute)) {
    throw new Error("Invalid time of day; hour and minute must be finite");
  }
  const jdn = julianDayNumber(year, month, day);
  const fractionalDay = (hour + minute / 60) / 24;
  return jdn - 0.5 + fractionalDay;
}

export function julianDateFor(date: CalendarDate, time: TimeOfDay): number {
  return julianDate(date.year, date.month, date.day, time.hour, time.minute);
}

function assertCalendarDate(year: number, month: number, day: number): void {
  if (!Number.isInteger(year) || year < 1) {
    throw new Error(`Invalid year ${year}; expected an integer >= 1`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new Error(`Invalid month ${month}; expected 1–12`);
  }
  if (!Number.isInteger(day) || day < 1 || day > 31) {
    throw new Error(`Invalid day ${day}; expected 1–31`);
  }
}
