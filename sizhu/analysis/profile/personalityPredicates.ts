import type { Element } from "../../../calendar/stemsBranches.js";
import type { StrengthStatus } from "../elements/analyzeElements.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1 } from "../policy/analysisPolicy.v1.js";
import type { PersonalityPredicate } from "../../rules/rules.schemas.js";
import { groupElement, groupWeight, type TenGod, type TenGodGroup } from "../tenGods/classifyTenGod.js";

export interface PredicateContext {
  distribution: Record<TenGod, number>;
  useful: readonly Element[];
  status: StrengthStatus;
  day_master: Element;
}

/**
 * A group is strong at `strong_group_min` weighted occurrences and useful when
 * the element it stands for is in the useful set.
 */
function strongAndUseful(group: TenGodGroup, policy: AnalysisPolicyV1) {
  return (ctx: PredicateContext): boolean =>
    groupWeight(ctx.distribution, group) >= policy.personality.strong_group_min &&
    ctx.useful.includes(groupElement(group, ctx.day_master));
}

export function buildPredicates(
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): Record<PersonalityPredicate, (ctx: PredicateContext) => boolean> {
  return {
    officer_strong_and_useful: strongAndUseful("officer", policy),
    companion_strong_and_useful: strongAndUseful("peer", policy),
    output_strong_and_useful: strongAndUseful("output", policy),
    resource_strong_and_useful: strongAndUseful("resource", policy),
    wealth_strong_and_useful: strongAndUseful("wealth", policy),
    day_master_weak: (ctx) => ctx.status === "weak",
    day_master_strong: (ctx) => ctx.status === "strong",
  };
}
