/**
 * Layer 1: ten-god classification.
 *
 * Each stem is labelled by its element relation to the day master
 * (same / produced / controls DM / controlled / feeds DM) and by polarity
 * match. The five relations cover every element pair, so a valid stem
 * always gets a label.
 */

import { PILLAR_ORDER, type FourPillarChart, type PillarPosition } from "../../../calendar/schemas/fourPillarChart.schema.js";
import {
  destroyerOf,
  destroys,
  generates,
  generatorOf,
  stemElement,
  stemPolarity,
  type Element,
  type Polarity,
  type Stem,
} from "../../../calendar/stemsBranches.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1 } from "../policy/analysisPolicy.v1.js";

export const TEN_GODS = [
  "companion",
  "rob_wealth",
  "eating_god",
  "hurting_officer",
  "seven_killings",
  "direct_officer",
  "indirect_wealth",
  "direct_wealth",
  "indirect_resource",
  "direct_resource",
] as const;

export type TenGod = (typeof TEN_GODS)[number];

/** Groups share an element relative to the day master. */
export type TenGodGroup = "peer" | "output" | "officer" | "wealth" | "resource";

export const TEN_GOD_GROUPS: Record<TenGodGroup, readonly [TenGod, TenGod]> = {
  peer: ["companion", "rob_wealth"],
  output: ["eating_god", "hurting_officer"],
  officer: ["seven_killings", "direct_officer"],
  wealth: ["indirect_wealth", "direct_wealth"],
  resource: ["indirect_resource", "direct_resource"],
};

export class UnclassifiableTenGodError extends Error {
  constructor(
    public candidate: string,
    public dayMaster: string
  ) {
    super(`No ten-god relation between ${candidate} and day master ${dayMaster}`);
    this.name = "UnclassifiableTenGodError";
  }
}

export function relationGroup(candidate: Element, dayMaster: Element): TenGodGroup | null {
  if (candidate === dayMaster) return "peer";
  if (generates(dayMaster) === candidate) return "output";
  if (destroys(candidate) === dayMaster) return "officer";
  if (destroys(dayMaster) === candidate) return "wealth";
  if (generates(candidate) === dayMaster) return "resource";
  return null;
}

/** The element a group stands for, relative to the day master's element. */
export function groupElement(group: TenGodGroup, dayMaster: Element): Element {
  switch (group) {
    case "peer":
      return dayMaster;
    case "output":
      return generates(dayMaster);
    case "officer":
      return destroyerOf(dayMaster);
    case "wealth":
      return destroys(dayMaster);
    case "resource":
      return generatorOf(dayMaster);
  }
}

export function classifyElementPolarity(
  element: Element,
  polarity: Polarity,
  dayMaster: { element: Element; polarity: Polarity }
): TenGod {
  const group = relationGroup(element, dayMaster.element);
  if (!group) {
    throw new UnclassifiableTenGodError(`${element}/${polarity}`, dayMaster.element);
  }
  const [samePolarity, differentPolarity] = TEN_GOD_GROUPS[group];
  return polarity === dayMaster.polarity ? samePolarity : differentPolarity;
}

export function classifyTenGod(candidate: Stem, dayMaster: Stem): TenGod {
  return classifyElementPolarity(stemElement(candidate), stemPolarity(candidate), {
    element: stemElement(dayMaster),
    polarity: stemPolarity(dayMaster),
  });
}

export interface PillarTenGods {
  position: PillarPosition;
  stem: Stem;
  /** The day stem is its own companion. */
  stem_label: TenGod;
  hidden: Array<{ stem: Stem; label: TenGod }>;
}

export interface TenGodCombination {
  name: "officer_killings_mixed" | "output_flourishing";
  kind: "auspicious" | "inauspicious";
  description: string;
}

export interface TenGodAnalysis {
  pillars: PillarTenGods[];
  distribution: Record<TenGod, number>;
  positions: Record<TenGod, PillarPosition[]>;
  combinations: TenGodCombination[];
}

function emptyByLabel<T>(make: () => T): Record<TenGod, T> {
  return {
    companion: make(),
    rob_wealth: make(),
    eating_god: make(),
    hurting_officer: make(),
    seven_killings: make(),
    direct_officer: make(),
    indirect_wealth: make(),
    direct_wealth: make(),
    indirect_resource: make(),
    direct_resource: make(),
  };
}

/**
 * Label every stem and hidden stem of the chart. The distribution weighs
 * the four stems (the day stem counts as companion) and each branch's main
 * hidden stem.
 */
export function assignTenGods(
  chart: FourPillarChart,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): TenGodAnalysis {
  const dm = chart.day_master.stem;
  const distribution = emptyByLabel(() => 0);
  const positions = emptyByLabel<PillarPosition[]>(() => []);
  const pillars: PillarTenGods[] = [];

  for (const position of PILLAR_ORDER) {
    const pillar = chart[position];
    const stemLabel = classifyTenGod(pillar.stem, dm);

    distribution[stemLabel] += policy.ten_god_weights.stem;
    if (!positions[stemLabel].includes(position)) positions[stemLabel].push(position);

    const hidden = pillar.hidden_stems.map((stem) => ({ stem, label: classifyTenGod(stem, dm) }));
    const main = hidden[0];
    if (main) {
      distribution[main.label] += policy.ten_god_weights.main_hidden_stem;
      if (!positions[main.label].includes(position)) positions[main.label].push(position);
    }

    pillars.push({
      position,
      stem: pillar.stem,
      stem_label: stemLabel,
      hidden,
    });
  }

  const combinations: TenGodCombination[] = [];
  if (distribution.direct_officer > 0 && distribution.seven_killings > 0) {
    combinations.push({
      name: "officer_killings_mixed",
      kind: "inauspicious",
      description: "Direct officer and seven killings both present; pressure from conflicting authority.",
    });
  }
  if (distribution.eating_god > 0 && distribution.hurting_officer > 0) {
    combinations.push({
      name: "output_flourishing",
      kind: "auspicious",
      description: "Eating god and hurting officer both present; strong creative output.",
    });
  }

  return { pillars, distribution, positions, combinations };
}

/** Weighted tally of a group (both polarities). */
export function groupWeight(distribution: Record<TenGod, number>, group: TenGodGroup): number {
  const [a, b] = TEN_GOD_GROUPS[group];
  return distribution[a] + distribution[b];
}
