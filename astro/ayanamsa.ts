/**
 * Linear approximation of the Lahiri ayanamsa.
 *
 * This is not the published Lahiri table. The model is anchored at 22.46° in
 * 1900 and grows by 0.0139°/year (≈50.04″, against a true precession rate of
 * ≈50.3″/year), so it drifts from the reference values by a few arc-minutes
 * over a century. Reference-grade work needs a lookup table or a higher-order
 * polynomial in place of this module.
 */

export const LAHIRI_LINEAR = {
  name: "lahiri_linear",
  base_year: 1900.0,
  base_ayanamsa_deg: 22.46,
  rate_deg_per_year: 0.0139,
} as const;

/**
 * Ayanamsa in degrees for a calendar year. Keyed by year only.
 */
export function ayanamsa(year: number): number {
  if (!Number.isFinite(year)) {
    throw new Error("Invalid year for ayanamsa");
  }
  return (
    LAHIRI_LINEAR.base_ayanamsa_deg +
    (year - LAHIRI_LINEAR.base_year) * LAHIRI_LINEAR.rate_deg_per_year
  );
}
