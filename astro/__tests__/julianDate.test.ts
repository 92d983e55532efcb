import { describe, expect, it } from "vitest";
import { julianDate, julianDateFor, julianDayNumber } from "../julianDate.js";

describe("julianDayNumber", () => {
  it("numbers 2000-01-01 as 2451545", () => {
    expect(julianDayNumber(2000, 1, 1)).toBe(2451545);
  });

  it("numbers proleptic Gregorian 0001-01-01 as 1721426", () => {
    expect(julianDayNumber(1, 1, 1)).toBe(1721426);
  });

  it("rolls January and February into the previous computational year", () => {
    // Leap year: Feb 29 exists
    expect(julianDayNumber(2000, 3, 1) - julianDayNumber(2000, 2, 28)).toBe(2);
    // Century non-leap year
    expect(julianDayNumber(1900, 3, 1) - julianDayNumber(1900, 2, 28)).toBe(1);
    expect(julianDayNumber(2000, 1, 1) - julianDayNumber(1999, 12, 31)).toBe(1);
  });

  it("rejects out-of-range fields", () => {
    expect(() => julianDayNumber(0, 1, 1)).toThrow("Invalid year 0");
    expect(() => julianDayNumber(2000, 13, 1)).toThrow("Invalid month 13");
    expect(() => julianDayNumber(2000, 1, 0)).toThrow("Invalid day 0");
  });
});

describe("julianDate", () => {
  it("matches the 1999-12-24 01:30 UTC reference point", () => {
    expect(julianDate(1999, 12, 24, 1, 30)).toBe(2451536.5625);
  });

  it("puts J2000.0 (2000-01-01 12:00 UTC) at 2451545.0", () => {
    expect(julianDate(2000, 1, 1, 12, 0)).toBe(2451545);
  });

  it("puts the MJD epoch (1858-11-17 00:00 UTC) at 2400000.5", () => {
    expect(julianDate(1858, 11, 17, 0, 0)).toBe(2400000.5);
  });

  it("accepts date and time records", () => {
    expect(julianDateFor({ year: 1999, month: 12, day: 24 }, { hour: 1, minute: 30 })).toBe(
      2451536.5625
    );
  });

  it("increases strictly across minute, day, month and year boundaries", () => {
    const instants: Array<[number, number, number, number, number]> = [
      [1899, 12, 31, 23, 59],
      [1900, 1, 1, 0, 0],
      [1900, 2, 28, 23, 59],
      [1900, 3, 1, 0, 0],
      [1999, 12, 24, 1, 29],
      [1999, 12, 24, 1, 30],
      [1999, 12, 31, 23, 59],
      [2000, 1, 1, 0, 0],
      [2000, 2, 29, 12, 0],
      [2024, 12, 31, 23, 59],
      [2025, 1, 1, 0, 1],
    ];
    const values = instants.map(([y, m, d, h, min]) => julianDate(y, m, d, h, min));
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThan(values[i - 1] ?? -Infinity);
    }
  });

  it("advances by exactly one per day", () => {
    expect(julianDate(2024, 3, 1, 6, 0) - julianDate(2024, 2, 29, 6, 0)).toBe(1);
  });
});
