/**
 * Personality profile from the ten-god spread.
 *
 * Traits come from the ten-god trait table; dimension scores from the
 * personality scoring table, where the first rule whose predicate holds
 * decides the score.
 */

import type {
  PersonalityDimension,
  PersonalityScoring,
  TenGodTraits,
} from "../../rules/rules.schemas.js";
import type { TenGod, TenGodAnalysis } from "../tenGods/classifyTenGod.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1 } from "../policy/analysisPolicy.v1.js";
import { buildPredicates, type PredicateContext } from "./personalityPredicates.js";

export type ScoreLevel = "outstanding" | "prominent" | "good" | "average" | "low";

export interface DimensionScore {
  score: number;
  level: ScoreLevel;
  /** Predicate that decided the score; null when the default applied. */
  matched: string | null;
}

export interface PersonalityProfile {
  core_traits: string[];
  strengths: string[];
  weaknesses: string[];
  scores: Record<PersonalityDimension, DimensionScore>;
}

const MAX_LISTED = 5;

export function scoreLevel(score: number): ScoreLevel {
  if (score >= 8) return "outstanding";
  if (score >= 7) return "prominent";
  if (score >= 6) return "good";
  if (score >= 4) return "average";
  return "low";
}

function unique(values: string[]): string[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}

/** Labels in order of first appearance: per pillar, stem then main hidden stem. */
export function labelsInAppearanceOrder(tenGods: TenGodAnalysis): TenGod[] {
  const order: TenGod[] = [];
  for (const pillar of tenGods.pillars) {
    const main = pillar.hidden[0];
    for (const label of main ? [pillar.stem_label, main.label] : [pillar.stem_label]) {
      if (!order.includes(label)) order.push(label);
    }
  }
  return order;
}

export function scoreDimensions(
  scoring: PersonalityScoring,
  ctx: PredicateContext,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): Record<PersonalityDimension, DimensionScore> {
  const predicates = buildPredicates(policy);

  const scoreOne = (dimension: PersonalityDimension): DimensionScore => {
    for (const rule of scoring[dimension] ?? []) {
      if (predicates[rule.predicate](ctx)) {
        const [low, high] = rule.score_range;
        const score = Number(((low + high) / 2).toFixed(1));
        return { score, level: scoreLevel(score), matched: rule.predicate };
      }
    }
    const fallback = policy.personality.default_score;
    return { score: fallback, level: scoreLevel(fallback), matched: null };
  };

  return {
    extraversion: scoreOne("extraversion"),
    responsibility: scoreOne("responsibility"),
    emotional_stability: scoreOne("emotional_stability"),
    openness: scoreOne("openness"),
    agreeableness: scoreOne("agreeableness"),
    execution: scoreOne("execution"),
    leadership: scoreOne("leadership"),
    creativity: scoreOne("creativity"),
    sociability: scoreOne("sociability"),
    learning: scoreOne("learning"),
  };
}

export function analyzePersonality(
  tenGods: TenGodAnalysis,
  traits: TenGodTraits,
  scoring: PersonalityScoring,
  ctx: PredicateContext,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): PersonalityProfile {
  const core: string[] = [];
  const strengths: string[] = [];
  const weaknesses: string[] = [];

  for (const label of labelsInAppearanceOrder(tenGods)) {
    const entry = traits[label];
    if (!entry) continue;
    core.push(...entry.positive);
    strengths.push(...entry.positive.slice(0, 2));
    weaknesses.push(...entry.negative.slice(0, 2));
  }

  return {
    core_traits: unique(core),
    strengths: unique(strengths).slice(0, MAX_LISTED),
    weaknesses: unique(weaknesses).slice(0, MAX_LISTED),
    scores: scoreDimensions(scoring, ctx, policy),
  };
}
