/**
 * Layer 1: year cycles.
 *
 * Scores a calendar year's stem element against the primary useful and
 * primary unfavorable elements, and reports six-clash hits on the chart.
 */

import { pillarLabel, yearPillar } from "../../../calendar/computeFourPillars.js";
import {
  PILLAR_ORDER,
  type FourPillarChart,
  type PillarPosition,
} from "../../../calendar/schemas/fourPillarChart.schema.js";
import { clashPartner, destroys, generates, type Branch, type Element, type Stem } from "../../../calendar/stemsBranches.js";
import type { FavorableElementSet } from "../elements/analyzeElements.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1 } from "../policy/analysisPolicy.v1.js";

export type RelationTier = 1 | 2 | 3 | 4 | 5;

export type RelationName =
  | "great_fortune"
  | "fortune"
  | "neutral"
  | "minor_misfortune"
  | "great_misfortune"
  | "good"
  | "bad";

export interface RelationEvaluation {
  reference: Element | null;
  tier: RelationTier;
  name: RelationName;
}

export type ClashImportance = "highest" | "high" | "medium";

export interface ClashHit {
  position: PillarPosition;
  chart_branch: Branch;
  annual_branch: Branch;
  importance: ClashImportance;
}

export type AnnualVerdict = "favorable" | "neutral" | "unfavorable";

export interface AnnualCycle {
  year: number;
  stem: Stem;
  branch: Branch;
  label: string;
  stem_element: Element;
  useful_relation: RelationEvaluation;
  unfavorable_relation: RelationEvaluation;
  clashes: ClashHit[];
  total_score: number;
  verdict: AnnualVerdict;
}

const TIER_NAMES: Record<RelationTier, RelationName> = {
  5: "great_fortune",
  4: "fortune",
  3: "neutral",
  2: "minor_misfortune",
  1: "great_misfortune",
};

const CLASH_IMPORTANCE: Record<PillarPosition, ClashImportance> = {
  year: "medium",
  month: "high",
  day: "highest",
  hour: "medium",
};

/** Relation of an annual element to a reference element, as a 5-tier score. */
export function relationTier(annual: Element, reference: Element | null): RelationEvaluation {
  if (reference === null) return { reference, tier: 3, name: "neutral" };

  let tier: RelationTier = 3;
  if (generates(annual) === reference) tier = 5;
  else if (destroys(annual) === reference) tier = 1;
  else if (annual === reference) tier = 4;
  else if (generates(reference) === annual) tier = 2;

  return { reference, tier, name: TIER_NAMES[tier] };
}

/**
 * Against an unfavorable element the extremes swap meaning: feeding it is
 * bad, controlling it is good.
 */
export function invertForUnfavorable(evaluation: RelationEvaluation): RelationEvaluation {
  if (evaluation.tier === 5) return { ...evaluation, tier: 2, name: "bad" };
  if (evaluation.tier === 1) return { ...evaluation, tier: 4, name: "good" };
  return evaluation;
}

export function findClashes(chart: FourPillarChart, annualBranch: Branch): ClashHit[] {
  const partner = clashPartner(annualBranch);
  return PILLAR_ORDER.filter((position) => chart[position].branch === partner).map((position) => ({
    position,
    chart_branch: chart[position].branch,
    annual_branch: annualBranch,
    importance: CLASH_IMPORTANCE[position],
  }));
}

export function evaluateAnnualCycle(
  year: number,
  chart: FourPillarChart,
  favorable: FavorableElementSet,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): AnnualCycle {
  const pillar = yearPillar(year);
  const cfg = policy.annual_cycles;

  const useful = relationTier(pillar.stem_element, favorable.useful[0] ?? null);
  const unfavorable = invertForUnfavorable(relationTier(pillar.stem_element, favorable.unfavorable[0] ?? null));

  const totalScore = Number((cfg.useful_weight * useful.tier + cfg.unfavorable_weight * unfavorable.tier).toFixed(1));
  const verdict: AnnualVerdict =
    totalScore >= cfg.favorable_min ? "favorable" : totalScore >= cfg.neutral_min ? "neutral" : "unfavorable";

  return {
    year,
    stem: pillar.stem,
    branch: pillar.branch,
    label: pillarLabel(pillar),
    stem_element: pillar.stem_element,
    useful_relation: useful,
    unfavorable_relation: unfavorable,
    clashes: findClashes(chart, pillar.branch),
    total_score: totalScore,
    verdict,
  };
}

export function evaluateAnnualCycles(
  range: { start_year: number; count: number },
  chart: FourPillarChart,
  favorable: FavorableElementSet,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): AnnualCycle[] {
  const cycles: AnnualCycle[] = [];
  for (let offset = 0; offset < range.count; offset++) {
    cycles.push(evaluateAnnualCycle(range.start_year + offset, chart, favorable, policy));
  }
  return cycles;
}
