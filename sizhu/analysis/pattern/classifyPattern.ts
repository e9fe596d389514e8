/**
 * Layer 1: structural pattern.
 *
 * The dominant-element check runs first and wins outright; otherwise the
 * month stem's ten god names an ordinary pattern.
 */

import type { FourPillarChart } from "../../../calendar/schemas/fourPillarChart.schema.js";
import { ELEMENTS, type Element } from "../../../calendar/stemsBranches.js";
import type { ElementProfile, StrengthAssessment } from "../elements/analyzeElements.js";
import { ANALYSIS_POLICY_V1, DOMINANT_PATTERNS, type AnalysisPolicyV1 } from "../policy/analysisPolicy.v1.js";
import { classifyTenGod, type TenGod } from "../tenGods/classifyTenGod.js";

export type PatternCategory = "dominant" | "ordinary";
export type PatternLevel = "high" | "medium_high" | "medium";

export interface PatternResult {
  type: string;
  category: PatternCategory;
  level: PatternLevel;
  description: string;
  /** Month-stem label for ordinary patterns, dominant element for dominant ones. */
  basis: TenGod | Element;
}

const ORDINARY_PATTERNS: Partial<Record<TenGod, string>> = {
  direct_officer: "direct_officer_pattern",
  seven_killings: "seven_killings_pattern",
  direct_wealth: "direct_wealth_pattern",
  indirect_wealth: "indirect_wealth_pattern",
  direct_resource: "direct_resource_pattern",
  indirect_resource: "indirect_resource_pattern",
  eating_god: "eating_god_pattern",
  hurting_officer: "hurting_officer_pattern",
};

export const GENERIC_PATTERN = "ordinary";

/** First element (in element order) whose share exceeds the dominance threshold. */
function dominantElement(profile: ElementProfile, policy: AnalysisPolicyV1): Element | null {
  if (profile.total <= 0) return null;
  for (const element of ELEMENTS) {
    const share = (profile.counts[element] / profile.total) * 100;
    if (share > policy.dominant_pattern.min_share_pct_exclusive) return element;
  }
  return null;
}

export function classifyPattern(
  chart: FourPillarChart,
  strength: StrengthAssessment,
  profile: ElementProfile,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): PatternResult {
  if (strength.score < policy.dominant_pattern.max_score_exclusive) {
    const element = dominantElement(profile, policy);
    if (element) {
      const dominant = DOMINANT_PATTERNS[element];
      return {
        type: dominant.type,
        category: "dominant",
        level: dominant.level,
        description: dominant.description,
        basis: element,
      };
    }
  }

  const label = classifyTenGod(chart.month.stem, chart.day_master.stem);
  const type = ORDINARY_PATTERNS[label] ?? GENERIC_PATTERN;
  return {
    type,
    category: "ordinary",
    level: "medium",
    description: `Month stem carries ${label}; ${type}.`,
    basis: label,
  };
}
