import type { PlanetId } from "../../astro/schemas/positions.schema.js";
import type { BirthMoment } from "../birth/birthMoment.schema.js";
import type { ChartBundle } from "./chartBundle.schema.js";

/**
 * Caller-owned cache of chart bundles.
 *
 * Keyed on the exact birth moment value (minute, offset and coordinates, not
 * just the calendar day) plus the requested planet list. Nothing in the
 * pipeline holds one of these implicitly.
 *
 * Hits return the stored bundle itself, not a copy. Treat it as read-only.
 */
export class ChartBundleCache {
  private readonly entries = new Map<string, ChartBundle>();

  constructor(private readonly maxEntries: number = 32) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error("ChartBundleCache maxEntries must be a positive integer");
    }
  }

  static keyFor(moment: BirthMoment, planets: readonly PlanetId[]): string {
    const place = moment.place;
    return JSON.stringify([
      moment.full_name,
      moment.calendar_date.year,
      moment.calendar_date.month,
      moment.calendar_date.day,
      moment.local_time.hour,
      moment.local_time.minute,
      moment.time_precision,
      moment.timezone_offset_minutes,
      moment.timezone_source,
      place?.raw_name ?? null,
      place?.latitude ?? null,
      place?.longitude ?? null,
      place?.resolved_timezone_id ?? null,
      planets,
    ]);
  }

  get(moment: BirthMoment, planets: readonly PlanetId[]): ChartBundle | undefined {
    const key = ChartBundleCache.keyFor(moment, planets);
    const hit = this.entries.get(key);
    if (hit) {
      // Refresh recency
      this.entries.delete(key);
      this.entries.set(key, hit);
    }
    return hit;
  }

  set(moment: BirthMoment, planets: readonly PlanetId[], bundle: ChartBundle): void {
    const key = ChartBundleCache.keyFor(moment, planets);
    this.entries.delete(key);
    this.entries.set(key, bundle);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
