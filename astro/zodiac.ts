/**
 * Pure helpers for placing an ecliptic longitude on the zodiac.
 * Layer 0: no interpretation, only geometry.
 */

export const SIGN_NAMES = [
  "aries",
  "taurus",
  "gemini",
  "cancer",
  "leo",
  "virgo",
  "libra",
  "scorpio",
  "sagittarius",
  "capricorn",
  "aquarius",
  "pisces",
] as const;

export type SignName = (typeof SIGN_NAMES)[number];

const SIGN_ABBREVIATIONS: Record<SignName, string> = {
  aries: "Ari",
  taurus: "Tau",
  gemini: "Gem",
  cancer: "Can",
  leo: "Leo",
  virgo: "Vir",
  libra: "Lib",
  scorpio: "Sco",
  sagittarius: "Sag",
  capricorn: "Cap",
  aquarius: "Aqu",
  pisces: "Pis",
};

export const DEGREES_PER_SIGN = 30;

export interface SignPlacement {
  longitude_deg: number;
  sign_index: number;
  sign: SignName;
  degree_in_sign: number;
}

/**
 * Normalize degrees to the half-open range [0, 360).
 * Accepts any finite input, including negatives and values past a full turn.
 */
export function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  // -1e-15 + 360 rounds to 360 in double precision
  if (v >= 360) v -= 360;
  return v;
}

export function signName(signIndex: number): SignName {
  const name = SIGN_NAMES[((signIndex % 12) + 12) % 12];
  if (name === undefined) {
    throw new Error(`Invalid sign index: ${signIndex}`);
  }
  return name;
}

export function signAbbreviation(sign: SignName): string {
  return SIGN_ABBREVIATIONS[sign];
}

/**
 * Map a longitude onto (sign, degree within sign). Aries = 0 … Pisces = 11.
 */
export function placeOnZodiac(longitudeDeg: number): SignPlacement {
  const longitude = normalizeDegrees(longitudeDeg);
  let signIndex = Math.floor(longitude / DEGREES_PER_SIGN) % 12;
  let degreeInSign = longitude - signIndex * DEGREES_PER_SIGN;
  // The division can round across a sign cusp; re-seat the remainder.
  if (degreeInSign < 0) {
    signIndex = (signIndex + 11) % 12;
    degreeInSign += DEGREES_PER_SIGN;
  } else if (degreeInSign >= DEGREES_PER_SIGN) {
    signIndex = (signIndex + 1) % 12;
    degreeInSign -= DEGREES_PER_SIGN;
  }

  return {
    longitude_deg: longitude,
    sign_index: signIndex,
    sign: signName(signIndex),
    degree_in_sign: degreeInSign,
  };
}

/**
 * Render degrees as DD°MM′ with minutes truncated, e.g. 7.8639 → "07°51′".
 *
 * @param degreeDigits - minimum width of the degree part (3 for full longitudes)
 */
export function formatDegreesMinutes(value: number, degreeDigits: number = 2): string {
  const abs = Math.abs(value);
  let degrees = Math.floor(abs);
  let minutes = Math.floor((abs - degrees) * 60 + 1e-9);
  if (minutes >= 60) {
    degrees += 1;
    minutes -= 60;
  }
  const sign = value < 0 ? "-" : "";
  return `${sign}${String(degrees).padStart(degreeDigits, "0")}°${String(minutes).padStart(2, "0")}′`;
}

/**
 * "07°51′ Sag" style label for a placement.
 */
export function formatPlacement(placement: SignPlacement): string {
  return `${formatDegreesMinutes(placement.degree_in_sign)} ${signAbbreviation(placement.sign)}`;
}
