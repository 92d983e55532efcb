import { describe, expect, it } from "vitest";
import { requireChartReady } from "../../birth/normalizeBirthMoment.js";
import { scenarioMoment } from "../../chart/__tests__/fixtures.js";
import { parseEphemerisResponse, toChartRequest, toPlanetId } from "../ephemerisSource.js";

describe("toPlanetId", () => {
  it("normalizes display names", () => {
    expect(toPlanetId("Sun")).toBe("sun");
    expect(toPlanetId(" North Node ")).toBe("north_node");
    expect(toPlanetId("south-node")).toBe("south_node");
  });

  it("maps node aliases", () => {
    expect(toPlanetId("Rahu")).toBe("north_node");
    expect(toPlanetId("Ketu")).toBe("south_node");
    expect(toPlanetId("True Node")).toBe("north_node");
  });

  it("returns null for bodies it does not know", () => {
    expect(toPlanetId("Chiron")).toBeNull();
  });
});

describe("parseEphemerisResponse", () => {
  it("keeps response order and retrograde flags", () => {
    const result = parseEphemerisResponse({
      planets: [
        { name: "Sun", degree: 271.7, sign: "Capricorn" },
        { name: "Rahu", degree: 10, retrograde: true },
      ],
      timestamp: "2026-10-18T12:00:00Z",
    });

    expect(result).toEqual({
      ok: true,
      value: [
        { planet: "sun", longitude_deg: 271.7 },
        { planet: "north_node", longitude_deg: 10, retrograde: true },
      ],
    });
  });

  it("reports shape problems with their paths", () => {
    const result = parseEphemerisResponse({ planets: [{ name: "Sun" }] });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "MalformedEphemerisResponse",
        category: "external_data",
        message: "Ephemeris response did not match the expected shape",
        issues: ["planets.0.degree: Required"],
      },
    });
  });

  it("rejects a payload that is not an object", () => {
    const result = parseEphemerisResponse(null);

    expect(result.ok === false && result.error.issues).toEqual([
      "(root): Expected object, received null",
    ]);
  });

  it("skips bodies it cannot map", () => {
    const result = parseEphemerisResponse({
      planets: [
        { name: "Sun", degree: 271.7 },
        { name: "Chiron", degree: 5 },
        { name: "Ascendant", degree: 190.4 },
      ],
    });

    expect(result).toEqual({ ok: true, value: [{ planet: "sun", longitude_deg: 271.7 }] });
  });
});

describe("toChartRequest", () => {
  it("sends an explicit offset when no zone id was resolved", () => {
    const ready = requireChartReady({
      ...scenarioMoment,
      timezone_source: "explicit_offset",
      timezone_offset_minutes: -150,
      place: scenarioMoment.place && { ...scenarioMoment.place, resolved_timezone_id: null },
    });
    if (!ready.ok) throw new Error(ready.error.message);

    const request = toChartRequest(ready.value, ["sun"]);
    expect(request.timezone).toBe("-02:30");
    expect(request.planets).toEqual(["sun"]);
  });
});
