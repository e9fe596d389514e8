import { beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidBirthInputError } from "../errors.js";
import { analyzeBirthChart, parseBirthInput } from "../analyzeBirthChart.js";
import { RuleRepository } from "../rules/ruleRepository.js";

const input = {
  name: "test-subject",
  gender: "male",
  year: 1990,
  month: 1,
  day: 1,
  hour: 0,
  minute: 0,
  annual_range: { start_year: 2024, count: 3 },
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("analyzeBirthChart", () => {
  it("runs every analyzer over the cast chart", () => {
    const result = analyzeBirthChart(input, { rules: new RuleRepository() });

    expect(result.analysis_policy_version).toBe("analysis_v1");
    expect(result.subject).toEqual({ name: "test-subject", gender: "male" });
    expect(result.birth_moment.true_solar_time_applied).toBe(false);
    expect([result.chart.year, result.chart.month, result.chart.day, result.chart.hour].map((p) => p.stem + p.branch)).toEqual([
      "庚午",
      "庚寅",
      "丙辰",
      "戊子",
    ]);
    expect(result.strength.level).toBe("strong");
    expect(result.favorable.useful).toEqual(["water"]);
    // 庚 month stem is indirect wealth to a 丙 day master
    expect(result.pattern.type).toBe("indirect_wealth_pattern");
    // goat blade on 午, calamity on 子, widow star on the 辰 day
    expect(result.spirit_markers.inauspicious).toEqual(["goat_blade", "calamity_sha", "widow_star"]);
    expect(result.major_cycles.direction).toBe("forward");
    expect(result.annual_cycles.map((c) => c.year)).toEqual([2024, 2025, 2026]);
    expect(result.interpersonal.zodiac).toBe("horse");
    expect(result.lunar.zodiac_animal).toBe("horse");
    expect(result.rule_tables.ten_god_traits).toEqual({ status: "loaded" });
  });

  it("is deterministic for the same input and rules", () => {
    const rules = new RuleRepository();

    expect(analyzeBirthChart(input, { rules })).toEqual(analyzeBirthChart(input, { rules }));
    expect(rules.diskReads).toBe(5);
  });

  it("defaults the annual range to ten years from the birth year", () => {
    const { annual_range: _omit, ...rest } = input;
    const result = analyzeBirthChart(rest, { rules: new RuleRepository() });

    expect(result.annual_cycles).toHaveLength(10);
    expect(result.annual_cycles[0].year).toBe(1990);
  });

  it("still analyzes when every rule table is missing", () => {
    const result = analyzeBirthChart(input, { rules: new RuleRepository({ rulesDir: "/nonexistent/rules" }) });

    expect(result.rule_tables.personality_scoring).toEqual({ status: "empty", reason: "source_missing" });
    expect(result.personality.core_traits).toEqual([]);
    expect(result.personality.scores.leadership).toEqual({ score: 5, level: "average", matched: null });
    expect(result.spirit_markers.auspicious).toEqual([]);
  });

  it("applies true solar time from explicit coordinates", () => {
    const result = analyzeBirthChart(
      { ...input, hour: 12, longitude: 130, use_true_solar_time: true },
      { rules: new RuleRepository() }
    );

    expect(result.birth_moment.offset_minutes).toBe(40);
    expect(result.birth_moment.effective).toEqual({ year: 1990, month: 1, day: 1, hour: 12, minute: 40 });
  });

  it("keeps the date pillars when the correction wraps past midnight", () => {
    const result = analyzeBirthChart(
      { ...input, minute: 10, longitude: 100, use_true_solar_time: true },
      { rules: new RuleRepository() }
    );

    expect(result.birth_moment.effective).toEqual({ year: 1990, month: 1, day: 1, hour: 22, minute: 50 });
    expect(result.chart.year.stem + result.chart.year.branch).toBe("庚午");
    expect(result.chart.day.stem + result.chart.day.branch).toBe("丙辰");
    // 22:50 on a 丙 day is 己亥
    expect(result.chart.hour.stem + result.chart.hour.branch).toBe("己亥");
  });
});

describe("parseBirthInput", () => {
  it("rejects an unknown gender", () => {
    expect(() => parseBirthInput({ ...input, gender: "other" })).toThrow(InvalidBirthInputError);
  });

  it("names the offending field", () => {
    try {
      parseBirthInput({ ...input, longitude: 200 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidBirthInputError);
      if (err instanceof InvalidBirthInputError) expect(err.field).toBe("longitude");
    }
  });

  it("rejects an impossible date during analysis", () => {
    expect(() => analyzeBirthChart({ ...input, month: 2, day: 30 }, { rules: new RuleRepository() })).toThrow(
      InvalidBirthInputError
    );
  });
});
