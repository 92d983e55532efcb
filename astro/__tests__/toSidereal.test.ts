import { describe, expect, it } from "vitest";
import { ayanamsa } from "../ayanamsa.js";
import { SiderealPositionSchema, TropicalPlacementSchema } from "../schemas/positions.schema.js";
import { toSidereal, toTropicalPlacements } from "../toSidereal.js";

describe("toSidereal", () => {
  it("maps a 271.7° tropical Sun in 1999 to about 7.86° Sagittarius", () => {
    const [sun] = toSidereal([{ planet: "sun", longitude_deg: 271.7 }], ayanamsa(1999));

    expect(sun?.planet).toBe("sun");
    expect(sun?.longitude_deg).toBeCloseTo(247.8639, 9);
    expect(sun?.sign_index).toBe(8);
    expect(sun?.sign).toBe("sagittarius");
    expect(sun?.degree_in_sign).toBeCloseTo(7.8639, 9);
  });

  it("wraps below 0° into Pisces", () => {
    const [moon] = toSidereal([{ planet: "moon", longitude_deg: 10 }], 23.85);

    expect(moon?.longitude_deg).toBeCloseTo(346.15, 9);
    expect(moon?.sign).toBe("pisces");
    expect(moon?.degree_in_sign).toBeCloseTo(16.15, 9);
  });

  it("normalizes inputs beyond a full turn", () => {
    const [mars] = toSidereal([{ planet: "mars", longitude_deg: 725 }], 0);

    expect(mars?.longitude_deg).toBe(5);
    expect(mars?.sign).toBe("aries");
    expect(mars?.degree_in_sign).toBe(5);
  });

  it("keeps the bounds and the sign-degree round trip for any input", () => {
    const ayanamsas = [-400, -23.85, 0, 23.8361, 400.5];
    for (let tropical = -1000; tropical <= 1000; tropical += 7.3) {
      for (const a of ayanamsas) {
        const [position] = toSidereal([{ planet: "venus", longitude_deg: tropical }], a);
        if (!position) throw new Error("no position returned");

        expect(position.longitude_deg).toBeGreaterThanOrEqual(0);
        expect(position.longitude_deg).toBeLessThan(360);
        expect(position.degree_in_sign).toBeGreaterThanOrEqual(0);
        expect(position.degree_in_sign).toBeLessThan(30);
        expect(position.sign_index * 30 + position.degree_in_sign).toBeCloseTo(
          position.longitude_deg,
          9
        );
        expect(SiderealPositionSchema.safeParse(position).success).toBe(true);
      }
    }
  });

  it("handles the edges 0° and 359.999°", () => {
    const positions = toSidereal(
      [
        { planet: "sun", longitude_deg: 0 },
        { planet: "moon", longitude_deg: 359.999 },
      ],
      0
    );

    expect(positions.map((p) => p.sign)).toEqual(["aries", "pisces"]);
    expect(positions[1]?.degree_in_sign).toBeCloseTo(29.999, 9);
  });

  it("keeps input order and planet ids", () => {
    const positions = toSidereal(
      [
        { planet: "saturn", longitude_deg: 40.6 },
        { planet: "sun", longitude_deg: 271.7 },
        { planet: "jupiter", longitude_deg: 25.0 },
      ],
      23.8361
    );

    expect(positions.map((p) => p.planet)).toEqual(["saturn", "sun", "jupiter"]);
  });

  it("rejects a non-finite ayanamsa", () => {
    expect(() => toSidereal([], Number.NaN)).toThrow("Invalid ayanamsa");
  });
});

describe("toTropicalPlacements", () => {
  it("places longitudes on the tropical zodiac and keeps retrograde flags", () => {
    const [sun, saturn] = toTropicalPlacements([
      { planet: "sun", longitude_deg: 271.7 },
      { planet: "saturn", longitude_deg: 40.6, retrograde: true },
    ]);

    expect(sun?.sign).toBe("capricorn");
    expect(sun?.degree_in_sign).toBeCloseTo(1.7, 9);
    expect(sun && "retrograde" in sun).toBe(false);
    expect(saturn?.sign).toBe("taurus");
    expect(saturn?.retrograde).toBe(true);
    expect(TropicalPlacementSchema.safeParse(saturn).success).toBe(true);
  });
});
