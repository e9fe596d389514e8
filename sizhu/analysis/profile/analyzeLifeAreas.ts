/**
 * Career, wealth, marriage and health summaries.
 *
 * These are coarse readings layered on the core results; they never feed
 * back into any other analyzer.
 */

import type { Element } from "../../../calendar/stemsBranches.js";
import type { PatternCareers } from "../../rules/rules.schemas.js";
import type { ElementProfile } from "../elements/analyzeElements.js";
import type { PatternResult } from "../pattern/classifyPattern.js";
import type { TenGod } from "../tenGods/classifyTenGod.js";

export type OutlookLevel = "good" | "above_average" | "average";

export interface CareerOutlook {
  pattern_type: string;
  suitable_fields: string[];
  avoid_fields: string[];
  advice: string;
}

export interface WealthOutlook {
  level: OutlookLevel;
  main_source: "salary" | "ventures" | "mixed" | "other";
  advice: string;
}

export interface MarriageOutlook {
  level: OutlookLevel;
  advice: string;
}

export interface HealthOutlook {
  constitution: "balanced" | "uneven";
  risk_systems: string[];
  advice: string;
}

/** Fields added when a label is present anywhere in the chart. */
const TEN_GOD_CAREER_SUPPLEMENTS: ReadonlyArray<readonly [TenGod[], string]> = [
  [["direct_officer"], "civil service"],
  [["seven_killings"], "military and police"],
  [["direct_wealth"], "finance and accounting"],
  [["eating_god", "hurting_officer"], "teaching and training"],
];

const ORGAN_SYSTEMS: Record<Element, string> = {
  wood: "liver and gallbladder",
  fire: "heart and small intestine",
  earth: "spleen and stomach",
  metal: "lungs and large intestine",
  water: "kidneys and bladder",
};

export function analyzeCareer(
  pattern: PatternResult,
  distribution: Record<TenGod, number>,
  careers: PatternCareers
): CareerOutlook {
  const entry = careers[pattern.type];
  const suitable = [...(entry?.suitable ?? [])];

  for (const [labels, field] of TEN_GOD_CAREER_SUPPLEMENTS) {
    if (labels.some((label) => distribution[label] > 0) && !suitable.includes(field)) {
      suitable.push(field);
    }
  }

  return {
    pattern_type: pattern.type,
    suitable_fields: suitable,
    avoid_fields: [...(entry?.avoid ?? [])],
    advice:
      pattern.category === "dominant"
        ? "Follow the dominant element; specialise rather than diversify."
        : "Favour steady roles that reward consistent execution.",
  };
}

export function analyzeWealth(distribution: Record<TenGod, number>): WealthOutlook {
  const direct = distribution.direct_wealth > 0;
  const indirect = distribution.indirect_wealth > 0;
  return {
    level: direct ? "above_average" : indirect ? "good" : "average",
    main_source: direct && indirect ? "mixed" : direct ? "salary" : indirect ? "ventures" : "other",
    advice: direct ? "Build steadily through earned income." : "Keep speculative exposure bounded.",
  };
}

export function analyzeMarriage(distribution: Record<TenGod, number>): MarriageOutlook {
  return {
    level: distribution.direct_wealth > 0 ? "above_average" : "average",
    advice: "Look for a patient, accommodating partner.",
  };
}

export function analyzeHealth(profile: ElementProfile): HealthOutlook {
  return {
    constitution: profile.missing.length === 0 ? "balanced" : "uneven",
    risk_systems: profile.missing.map((element) => ORGAN_SYSTEMS[element]),
    advice: "Keep regular check-ups, with attention to the listed systems.",
  };
}
