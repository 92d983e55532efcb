/**
 * Chart generation: fetch tropical longitudes for a chart-ready birth moment,
 * then run the pure pipeline. The fetch is the only suspension point.
 */

import type { PlanetId } from "../../astro/schemas/positions.schema.js";
import type { BirthMoment } from "../birth/birthMoment.schema.js";
import { requireChartReady } from "../birth/normalizeBirthMoment.js";
import type { ChartError, Result } from "../errors.js";
import { toChartRequest, type EphemerisSource } from "../ephemeris/ephemerisSource.js";
import { chartLogHelpers } from "../logging/chartLog.js";
import { computeChartBundle } from "./assembleChartBundle.js";
import { DEFAULT_PLANETS, type ChartBundle } from "./chartBundle.schema.js";
import type { ChartBundleCache } from "./chartBundleCache.js";

export interface GenerateChartOptions {
  source: EphemerisSource;
  planets?: readonly PlanetId[];
  cache?: ChartBundleCache;
}

export async function generateChartBundle(
  moment: BirthMoment,
  options: GenerateChartOptions
): Promise<Result<ChartBundle, ChartError>> {
  const planets = options.planets ?? DEFAULT_PLANETS;

  const cached = options.cache?.get(moment, planets);
  if (cached) {
    chartLogHelpers.cacheHit({ planet_count: planets.length });
    return { ok: true, value: cached };
  }

  const ready = requireChartReady(moment);
  if (!ready.ok) {
    chartLogHelpers.assembleFailed({
      error_kind: ready.error.kind,
      error_category: ready.error.category,
      error_message: ready.error.message,
    });
    return ready;
  }

  chartLogHelpers.fetchStarted({ planet_count: planets.length });
  let fetched: Awaited<ReturnType<EphemerisSource["fetchTropicalPositions"]>>;
  try {
    fetched = await options.source.fetchTropicalPositions(toChartRequest(ready.value, planets));
  } catch (err) {
    chartLogHelpers.fetchFailed({
      planet_count: planets.length,
      error_message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }

  if (!fetched.ok) {
    chartLogHelpers.assembleFailed({
      error_kind: fetched.error.kind,
      error_category: fetched.error.category,
      error_message: fetched.error.message,
    });
    return fetched;
  }
  chartLogHelpers.fetchSucceeded({
    planet_count: planets.length,
    received_count: fetched.value.length,
  });

  const result = computeChartBundle(ready.value, fetched.value, planets);
  if (!result.ok) {
    chartLogHelpers.assembleFailed({
      error_kind: result.error.kind,
      error_category: result.error.category,
      error_message: result.error.message,
    });
    return result;
  }

  chartLogHelpers.assembleSucceeded({
    planet_count: result.value.sidereal_positions.length,
    julian_date: result.value.julian_date,
  });
  options.cache?.set(moment, planets, result.value);
  return result;
}
