import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import type { BirthMoment } from "../../birth/birthMoment.schema.js";
import { requireChartReady } from "../../birth/normalizeBirthMoment.js";
import { dateOnlyMoment, scenarioMoment } from "../../chart/__tests__/fixtures.js";
import {
  fetchCompatibility,
  parseMatchResponse,
  toMatchRequest,
  validateCompatibility,
} from "../fetchCompatibility.js";

const { invoke } = vi.hoisted(() => ({ invoke: vi.fn() }));

vi.mock("../../lib/supabaseClient.js", () => ({
  getSupabase: () => ({ functions: { invoke } }),
  EPHEMERIS_FUNCTION_NAME: "ephemeris",
  COMPATIBILITY_FUNCTION_NAME: "match",
}));

const partnerMoment: BirthMoment = {
  ...scenarioMoment,
  full_name: "Second Person",
  calendar_date: { year: 2001, month: 3, day: 9 },
  local_time: { hour: 18, minute: 45 },
  timezone_offset_minutes: -300,
  place: {
    raw_name: "Springfield, Illinois, USA",
    city: "Springfield",
    state: "Illinois",
    country: "USA",
    latitude: 39.8,
    longitude: -89.65,
    resolved_timezone_id: "America/Chicago",
  },
};

const expectedRequest = {
  user: {
    birth_date: "1999-12-24",
    birth_time: "07:00",
    timezone: "Asia/Kolkata",
    latitude: 13.08,
    longitude: 80.27,
  },
  partner: {
    name: "Second Person",
    birth_date: "2001-03-09",
    birth_time: "18:45",
    timezone: "America/Chicago",
    latitude: 39.8,
    longitude: -89.65,
  },
  matchType: "romantic",
  systems: ["vedic", "chinese"],
};

describe("validateCompatibility", () => {
  it("accepts a contract-shaped payload", () => {
    const payload = {
      overall_score: 78,
      per_system_scores: { vedic: 24, chinese: 80 },
      synastry_aspect_descriptions: ["Sun trine Moon"],
    };
    expect(validateCompatibility(payload)).toEqual({ ok: true, value: payload });
  });

  it("requires aspect descriptions when an overall score is present", () => {
    const result = validateCompatibility({
      overall_score: 78,
      per_system_scores: {},
      synastry_aspect_descriptions: [],
    });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "MalformedCompatibility",
        category: "external_data",
        message: "Compatibility response did not match the contract",
        issues: [
          "synastry_aspect_descriptions: synastry_aspect_descriptions must not be empty when overall_score is present",
        ],
      },
    });
  });

  it("allows an absent overall score with no descriptions", () => {
    const result = validateCompatibility({
      overall_score: null,
      per_system_scores: { chinese: 60 },
      synastry_aspect_descriptions: [],
    });
    expect(result.ok).toBe(true);
  });

  it("rejects scores outside 0-100", () => {
    const result = validateCompatibility({
      overall_score: 78,
      per_system_scores: { vedic: 120 },
      synastry_aspect_descriptions: ["Venus square Mars"],
    });
    expect(result.ok === false && result.error.issues).toEqual([
      "per_system_scores.vedic: Number must be less than or equal to 100",
    ]);
  });
});

describe("parseMatchResponse", () => {
  it("maps service fields onto the contract", () => {
    const result = parseMatchResponse({
      overallScore: 78,
      vedicScore: 24,
      chineseScore: 80,
      westernScore: null,
      synastryAspects: ["Sun trine Moon", "Venus conjunct Mars"],
      userChart: { sun: { degree: 247.86 } },
    });

    expect(result).toEqual({
      ok: true,
      value: {
        overall_score: 78,
        per_system_scores: { vedic: 24, chinese: 80 },
        synastry_aspect_descriptions: ["Sun trine Moon", "Venus conjunct Mars"],
      },
    });
  });

  it("treats a missing overall score as absent", () => {
    const result = parseMatchResponse({ chineseScore: 55 });

    expect(result).toEqual({
      ok: true,
      value: {
        overall_score: null,
        per_system_scores: { chinese: 55 },
        synastry_aspect_descriptions: [],
      },
    });
  });

  it("reports a wire shape mismatch", () => {
    const result = parseMatchResponse({ overallScore: "high" });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "MalformedCompatibility",
        category: "external_data",
        message: "Match response did not match the expected shape",
        issues: ["overallScore: Expected number, received string"],
      },
    });
  });
});

describe("toMatchRequest", () => {
  it("builds the service request from two chart-ready moments", () => {
    const user = requireChartReady(scenarioMoment);
    const partner = requireChartReady(partnerMoment);
    if (!user.ok || !partner.ok) throw new Error("fixtures must be chart-ready");

    expect(toMatchRequest(user.value, partner.value)).toEqual(expectedRequest);
    expect(toMatchRequest(user.value, partner.value, ["western"], "friendship")).toMatchObject({
      matchType: "friendship",
      systems: ["western"],
    });
  });
});

describe("fetchCompatibility", () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    invoke.mockReset();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it("invokes the match function and validates the reply", async () => {
    invoke.mockResolvedValue({
      data: { overallScore: 64, vedicScore: 20, synastryAspects: ["Moon sextile Venus"] },
      error: null,
    });

    const result = await fetchCompatibility(scenarioMoment, partnerMoment);

    expect(invoke).toHaveBeenCalledWith("match", { body: expectedRequest });
    expect(result).toEqual({
      ok: true,
      value: {
        overall_score: 64,
        per_system_scores: { vedic: 20 },
        synastry_aspect_descriptions: ["Moon sextile Venus"],
      },
    });
  });

  it("refuses a partner without a birth time before calling out", async () => {
    const result = await fetchCompatibility(scenarioMoment, dateOnlyMoment);

    expect(invoke).not.toHaveBeenCalled();
    expect(result.ok === false && result.error.kind).toBe("IncompleteBirthData");
  });

  it("returns a contract violation as an error result", async () => {
    invoke.mockResolvedValue({ data: { overallScore: 64 }, error: null });

    const result = await fetchCompatibility(scenarioMoment, partnerMoment);

    expect(result.ok === false && result.error.kind).toBe("MalformedCompatibility");
  });

  it("throws transport errors", async () => {
    invoke.mockResolvedValue({ data: null, error: new Error("Edge Function returned 500") });

    await expect(fetchCompatibility(scenarioMoment, partnerMoment)).rejects.toThrow(
      "Edge Function returned 500"
    );
  });
});
