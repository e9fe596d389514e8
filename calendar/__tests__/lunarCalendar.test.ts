import { describe, expect, it } from "vitest";
import {
  describeLunarDate,
  lunarTermSource,
  PRIMARY_TERMS,
  seasonOf,
  westernSign,
} from "../lunarCalendar.js";

describe("westernSign", () => {
  it("switches on the first day of each sign", () => {
    expect(westernSign(1, 19)).toBe("capricorn");
    expect(westernSign(1, 20)).toBe("aquarius");
    expect(westernSign(3, 21)).toBe("aries");
    expect(westernSign(10, 23)).toBe("libra");
    expect(westernSign(10, 24)).toBe("scorpio");
    expect(westernSign(12, 21)).toBe("sagittarius");
    expect(westernSign(12, 22)).toBe("capricorn");
  });
});

describe("seasonOf", () => {
  it("groups months into meteorological seasons", () => {
    expect(seasonOf(3)).toBe("spring");
    expect(seasonOf(8)).toBe("summer");
    expect(seasonOf(11)).toBe("autumn");
    expect(seasonOf(12)).toBe("winter");
    expect(seasonOf(2)).toBe("winter");
  });
});

describe("describeLunarDate", () => {
  it("reports the lunar new year day", () => {
    const info = describeLunarDate({ year: 2024, month: 2, day: 10, hour: 12, minute: 0 }, "卯");

    expect(info.lunar_year).toBe(2024);
    expect(info.lunar_month).toBe(1);
    expect(info.lunar_day).toBe(1);
    expect(info.is_leap_month).toBe(false);
    expect(info.lunar_zodiac).toBe("龙");
    expect(info.zodiac_animal).toBe("dragon");
    expect(info.western_sign).toBe("aquarius");
    expect(info.season).toBe("winter");
    expect(info.governing_term).toBe("立春");
    expect(info.month_command).toEqual({ branch: "卯", element: "wood" });
  });

  it("flags a leap month", () => {
    const info = describeLunarDate({ year: 2023, month: 3, day: 22, hour: 12, minute: 0 }, "辰");

    expect(info.lunar_month).toBe(2);
    expect(info.is_leap_month).toBe(true);
  });
});

describe("lunarTermSource", () => {
  it("returns only primary terms, sorted by instant", () => {
    const terms = lunarTermSource({ year: 2024, month: 6, day: 1, hour: 0, minute: 0 });

    expect(terms.length).toBeGreaterThanOrEqual(12);
    for (const term of terms) {
      expect(PRIMARY_TERMS).toContain(term.name);
    }
    for (let i = 1; i < terms.length; i++) {
      expect(terms[i].at_ms).toBeGreaterThan(terms[i - 1].at_ms);
    }
  });

  it("dates the start of spring in early February", () => {
    const terms = lunarTermSource({ year: 2024, month: 6, day: 1, hour: 0, minute: 0 });
    const lichun = terms.find((term) => term.name === "立春" && term.at.startsWith("2024-"));

    expect(lichun?.at.slice(0, 10)).toBe("2024-02-04");
  });
});
