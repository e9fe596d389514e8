import { describe, expect, it } from "vitest";
import { assessStrength, tallyElements, type StrengthAssessment } from "../elements/analyzeElements.js";
import { classifyPattern, GENERIC_PATTERN } from "../pattern/classifyPattern.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1 } from "../policy/analysisPolicy.v1.js";
import { sampleChart, chartOf } from "./chartFixtures.js";

function weakened(strength: StrengthAssessment, score: number): StrengthAssessment {
  return { ...strength, score, level: "very_weak", status: "weak" };
}

describe("classifyPattern", () => {
  it("names an ordinary pattern from the month stem's ten god", () => {
    const chart = sampleChart();
    const result = classifyPattern(chart, assessStrength(chart), tallyElements(chart));

    expect(result).toEqual({
      type: "eating_god_pattern",
      category: "ordinary",
      level: "medium",
      description: "Month stem carries eating_god; eating_god_pattern.",
      basis: "eating_god",
    });
  });

  it("falls back to the generic pattern for peer month stems", () => {
    // month stem 丙 against a 丙 day master
    const chart = chartOf(["庚", "午"], ["丙", "戌"], ["丙", "寅"], ["戊", "子"]);
    const result = classifyPattern(chart, assessStrength(chart), tallyElements(chart));

    expect(result.type).toBe(GENERIC_PATTERN);
    expect(result.basis).toBe("companion");
  });

  it("takes the dominant pattern when the score is low and one element exceeds 70%", () => {
    // wood is 79.31% of this chart
    const chart = chartOf(["甲", "寅"], ["甲", "寅"], ["甲", "寅"], ["甲", "寅"]);
    const result = classifyPattern(chart, weakened(assessStrength(chart), 20), tallyElements(chart));

    expect(result).toEqual({
      type: "qu_zhi",
      category: "dominant",
      level: "high",
      description: "Wood dominates the chart; growth-oriented, benevolent temperament.",
      basis: "wood",
    });
  });

  it("ignores dominance at a score of 30 or more", () => {
    const chart = chartOf(["甲", "寅"], ["甲", "寅"], ["甲", "寅"], ["甲", "寅"]);
    const result = classifyPattern(chart, weakened(assessStrength(chart), 30), tallyElements(chart));

    expect(result.category).toBe("ordinary");
    // month stem 甲 against 甲
    expect(result.type).toBe(GENERIC_PATTERN);
  });

  it("uses the policy thresholds", () => {
    const loose: AnalysisPolicyV1 = {
      ...ANALYSIS_POLICY_V1,
      dominant_pattern: { max_score_exclusive: 100, min_share_pct_exclusive: 25 },
    };
    const chart = sampleChart();
    // wood 24.30%, fire 27.10%: fire is the first element over 25%
    const result = classifyPattern(chart, assessStrength(chart), tallyElements(chart), loose);

    expect(result.type).toBe("yan_shang");
    expect(result.basis).toBe("fire");
  });
});
