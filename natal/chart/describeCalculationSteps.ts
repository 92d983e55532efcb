/**
 * Human-readable walkthrough of how a chart bundle was derived.
 */

import { formatDegreesMinutes, formatPlacement, type SignName } from "../../astro/zodiac.js";
import { formatCalendarDate, formatTimeOfDay } from "../birth/normalizeBirthMoment.js";
import { formatOffset } from "../birth/timezone.js";
import type { ChartBundle } from "./chartBundle.schema.js";

export interface CalculationStep {
  step: number;
  title: string;
  detail: string;
  result: string;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function signLabel(sign: SignName): string {
  return capitalize(sign);
}

export function describeCalculationSteps(bundle: ChartBundle): CalculationStep[] {
  const moment = bundle.birth_moment;
  const localTime = formatTimeOfDay(moment.local_time);
  const utcTime = formatTimeOfDay(bundle.utc);
  const offset = formatOffset(moment.timezone_offset_minutes);
  const precisionNote =
    moment.time_precision === "date_only" ? " (time unknown, 00:00 assumed; low precision)" : "";

  const steps: CalculationStep[] = [
    {
      step: 0,
      title: "Convert Local Time → UTC",
      detail: `${formatCalendarDate(moment.calendar_date)} ${localTime} (${offset})${precisionNote}`,
      result: `${formatCalendarDate(bundle.utc)} ${utcTime} UTC`,
    },
    {
      step: 1,
      title: "Compute Julian Date",
      detail: `Y=${bundle.utc.year}, M=${bundle.utc.month}, D=${bundle.utc.day}, UT=${utcTime}`,
      result: String(bundle.julian_date),
    },
    {
      step: 2,
      title: "Pull Planetary Longitudes (Tropical)",
      detail: bundle.tropical_positions
        .map((p) => `${capitalize(p.planet)} ${formatDegreesMinutes(p.degree_in_sign)} ${signLabel(p.sign)}`)
        .join("; "),
      result: `${bundle.tropical_positions.length} positions`,
    },
    {
      step: 3,
      title: "Subtract Lahiri Ayanamsa",
      detail: `Ayanamsa ≈ ${bundle.ayanamsa_deg.toFixed(2)}° (${moment.calendar_date.year} value, linear model)`,
      result: `−${formatDegreesMinutes(bundle.ayanamsa_deg)}`,
    },
    {
      step: 4,
      title: "Map to 12 Signs",
      detail: bundle.sidereal_positions
        .map((p) => `${capitalize(p.planet)} ${formatDegreesMinutes(p.longitude_deg, 3)} → ${formatPlacement(p)}`)
        .join("; "),
      result: "Sign = floor(longitude ÷ 30°), degree = longitude mod 30°",
    },
  ];

  return steps;
}

export function formatCalculationSteps(steps: readonly CalculationStep[]): string {
  return steps
    .map((s) => `${s.step}. ${s.title}\n   ${s.detail}\n   → ${s.result}`)
    .join("\n");
}
