import { describe, expect, it } from "vitest";
import {
  assessStrength,
  deriveFavorableElements,
  strengthLevel,
  tallyElements,
} from "../elements/analyzeElements.js";
import { sampleChart, chartOf } from "./chartFixtures.js";

describe("tallyElements", () => {
  it("weighs stems and branches at 1.0 and hidden stems at 0.3", () => {
    const profile = tallyElements(sampleChart());

    expect(profile.counts).toEqual({ wood: 2.6, fire: 2.9, earth: 2.9, metal: 1, water: 1.3 });
    expect(profile.total).toBe(10.7);
    expect(profile.percentages.metal).toBe(9.35);
    expect(profile.percentages.water).toBe(12.15);
    expect(profile.percentages.earth).toBe(27.1);
  });

  it("breaks most/least ties by first encounter", () => {
    const profile = tallyElements(sampleChart());

    // fire (午) is met before earth (己 hidden in 午); both are 2.9
    expect(profile.most).toBe("fire");
    expect(profile.least).toBe("metal");
    expect(profile.missing).toEqual([]);
  });

  it("records where each contribution came from", () => {
    const profile = tallyElements(sampleChart());

    expect(profile.positions.metal).toEqual([{ position: "year", slot: "stem", symbol: "庚", weight: 1 }]);
    expect(profile.positions.water).toEqual([
      { position: "hour", slot: "branch", symbol: "子", weight: 1 },
      { position: "hour", slot: "hidden_stem", symbol: "癸", weight: 0.3 },
    ]);
  });

  it("flags absent elements as missing and skips them for least", () => {
    const profile = tallyElements(chartOf(["甲", "寅"], ["甲", "寅"], ["甲", "寅"], ["甲", "寅"]));

    expect(profile.counts).toEqual({ wood: 9.2, fire: 1.2, earth: 1.2, metal: 0, water: 0 });
    expect(profile.percentages.wood).toBe(79.31);
    expect(profile.missing).toEqual(["metal", "water"]);
    expect(profile.most).toBe("wood");
    expect(profile.least).toBe("fire");
  });
});

describe("strengthLevel", () => {
  it.each([
    [80, "very_strong", "strong"],
    [79, "strong", "strong"],
    [65, "strong", "strong"],
    [64, "balanced", "balanced"],
    [50, "balanced", "balanced"],
    [49, "weak", "weak"],
    [35, "weak", "weak"],
    [34, "very_weak", "weak"],
  ] as const)("maps %d to %s", (score, level, status) => {
    expect(strengthLevel(score)).toEqual({ level, status });
  });
});

describe("assessStrength", () => {
  it("scores base + rooted + one peer for the sample chart", () => {
    expect(assessStrength(sampleChart())).toEqual({
      score: 70,
      level: "strong",
      status: "strong",
      day_master_element: "fire",
      seasonal_support: false,
      rooted: true,
      peer_support_count: 1,
    });
  });

  it("adds seasonal support when the month branch shares the day-master element", () => {
    // 甲 day master in a 寅 month; every other slot is wood too
    const strength = assessStrength(chartOf(["甲", "寅"], ["甲", "寅"], ["甲", "寅"], ["甲", "寅"]));

    expect(strength.seasonal_support).toBe(true);
    expect(strength.peer_support_count).toBe(6);
    expect(strength.score).toBe(50 + 20 + 15 + 30);
    expect(strength.level).toBe("very_strong");
  });

  it("stays at the base score without root, season or peers", () => {
    // 甲 day master; no wood in any branch, hidden stem or other stem
    const strength = assessStrength(chartOf(["庚", "申"], ["庚", "申"], ["甲", "申"], ["庚", "申"]));

    expect(strength.rooted).toBe(false);
    expect(strength.score).toBe(50);
    expect(strength.status).toBe("balanced");
  });
});

describe("deriveFavorableElements", () => {
  it("drains a strong day master", () => {
    expect(deriveFavorableElements("strong", "fire")).toEqual({
      useful: ["water"],
      supportive: ["earth"],
      unfavorable: ["wood"],
      hostile: ["fire"],
    });
  });

  it("supports a weak day master; hostile feeds the unfavorable set", () => {
    expect(deriveFavorableElements("weak", "fire")).toEqual({
      useful: ["wood", "fire"],
      supportive: ["wood"],
      unfavorable: ["water", "earth"],
      // water is fed by metal, earth by fire
      hostile: ["metal", "fire"],
    });
  });

  it("lists the destroyer's generator before the drainer's", () => {
    const { hostile } = deriveFavorableElements("weak", "wood");
    // metal is fed by earth, fire by wood
    expect(hostile).toEqual(["earth", "wood"]);
  });

  it("leaves every role empty when balanced", () => {
    expect(deriveFavorableElements("balanced", "wood")).toEqual({
      useful: [],
      supportive: [],
      unfavorable: [],
      hostile: [],
    });
  });
});
