/**
 * Structured logging for chart pipeline events.
 *
 * Emits JSON logs with consistent structure for observability. Birth data is
 * personal: events carry counts, kinds and codes, never names or coordinates.
 */

export type ChartLogEvent =
  | "ephemeris.fetch.started"
  | "ephemeris.fetch.succeeded"
  | "ephemeris.fetch.failed"
  | "chart.assemble.succeeded"
  | "chart.assemble.failed"
  | "chart.cache.hit"
  | "compatibility.fetch.succeeded"
  | "compatibility.fetch.failed";

export type ChartLogData = {
  event: ChartLogEvent;
  planet_count?: number;
  received_count?: number;
  julian_date?: number;
  error_kind?: string;
  error_category?: string;
  error_message?: string;
  [key: string]: unknown; // Allow additional fields
};

/**
 * Emit a structured log entry (one line of JSON per event).
 */
export function chartLog(data: ChartLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const chartLogHelpers = {
  fetchStarted(params: { planet_count: number }): void {
    chartLog({ event: "ephemeris.fetch.started", planet_count: params.planet_count });
  },

  fetchSucceeded(params: { planet_count: number; received_count: number }): void {
    chartLog({
      event: "ephemeris.fetch.succeeded",
      planet_count: params.planet_count,
      received_count: params.received_count,
    });
  },

  fetchFailed(params: { planet_count: number; error_message: string }): void {
    chartLog({
      event: "ephemeris.fetch.failed",
      planet_count: params.planet_count,
      error_message: params.error_message,
    });
  },

  assembleSucceeded(params: { planet_count: number; julian_date: number }): void {
    chartLog({
      event: "chart.assemble.succeeded",
      planet_count: params.planet_count,
      julian_date: params.julian_date,
    });
  },

  assembleFailed(params: { error_kind: string; error_category: string; error_message: string }): void {
    chartLog({
      event: "chart.assemble.failed",
      error_kind: params.error_kind,
      error_category: params.error_category,
      error_message: params.error_message,
    });
  },

  cacheHit(params: { planet_count: number }): void {
    chartLog({ event: "chart.cache.hit", planet_count: params.planet_count });
  },

  compatibilitySucceeded(params: { overall_score: number | null; system_count: number }): void {
    chartLog({
      event: "compatibility.fetch.succeeded",
      overall_score: params.overall_score,
      system_count: params.system_count,
    });
  },

  compatibilityFailed(params: { error_kind: string; error_message: string }): void {
    chartLog({
      event: "compatibility.fetch.failed",
      error_kind: params.error_kind,
      error_message: params.error_message,
    });
  },
};
