/**
 * Layer 1: element balance.
 *
 * Tally, day-master strength and the favorable-element roles all derive
 * from the frozen chart plus ANALYSIS_POLICY_V1; nothing here reads rule data.
 */

import {
  PILLAR_ORDER,
  type FourPillarChart,
  type PillarPosition,
} from "../../../calendar/schemas/fourPillarChart.schema.js";
import {
  destroyerOf,
  ELEMENTS,
  generates,
  generatorOf,
  stemElement,
  type Element,
} from "../../../calendar/stemsBranches.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1, type StrengthLevel } from "../policy/analysisPolicy.v1.js";

export type ElementSlot = "stem" | "branch" | "hidden_stem";

export interface ElementContribution {
  position: PillarPosition;
  slot: ElementSlot;
  symbol: string;
  weight: number;
}

export interface ElementProfile {
  counts: Record<Element, number>;
  percentages: Record<Element, number>;
  total: number;
  positions: Record<Element, ElementContribution[]>;
  most: Element;
  least: Element;
  missing: Element[];
}

export type StrengthStatus = "strong" | "weak" | "balanced";

export interface StrengthAssessment {
  score: number;
  level: StrengthLevel;
  status: StrengthStatus;
  day_master_element: Element;
  seasonal_support: boolean;
  rooted: boolean;
  peer_support_count: number;
}

export interface FavorableElementSet {
  useful: Element[];
  supportive: Element[];
  unfavorable: Element[];
  hostile: Element[];
}

function round2(value: number): number {
  return Number(value.toFixed(2));
}

function emptyRecord<T>(make: () => T): Record<Element, T> {
  return {
    wood: make(),
    fire: make(),
    earth: make(),
    metal: make(),
    water: make(),
  };
}

/**
 * Walk the chart in fixed order: per pillar, stem, branch, then hidden
 * stems. The order of first contribution is the tie-break for most/least.
 */
export function tallyElements(
  chart: FourPillarChart,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): ElementProfile {
  const raw = emptyRecord(() => 0);
  const positions = emptyRecord<ElementContribution[]>(() => []);
  const encounterOrder: Element[] = [];

  const add = (element: Element, contribution: ElementContribution) => {
    raw[element] += contribution.weight;
    positions[element].push(contribution);
    if (!encounterOrder.includes(element)) encounterOrder.push(element);
  };

  for (const position of PILLAR_ORDER) {
    const pillar = chart[position];
    add(pillar.stem_element, {
      position,
      slot: "stem",
      symbol: pillar.stem,
      weight: policy.element_weights.stem,
    });
    add(pillar.branch_element, {
      position,
      slot: "branch",
      symbol: pillar.branch,
      weight: policy.element_weights.branch,
    });
    for (const hidden of pillar.hidden_stems) {
      add(stemElement(hidden), {
        position,
        slot: "hidden_stem",
        symbol: hidden,
        weight: policy.element_weights.hidden_stem,
      });
    }
  }

  const counts = emptyRecord(() => 0);
  for (const element of ELEMENTS) counts[element] = round2(raw[element]);
  const total = round2(ELEMENTS.reduce((sum, element) => sum + raw[element], 0));

  const percentages = emptyRecord(() => 0);
  for (const element of ELEMENTS) {
    percentages[element] = total > 0 ? round2((counts[element] / total) * 100) : 0;
  }

  // Counts are compared after rounding so float noise never breaks a tie.
  let most = encounterOrder[0];
  let least = encounterOrder[0];
  for (const element of encounterOrder) {
    if (counts[element] > counts[most]) most = element;
    if (counts[element] < counts[least]) least = element;
  }

  const missing = ELEMENTS.filter(
    (element) => counts[element] === 0 || percentages[element] < policy.missing_share_pct
  );

  return { counts, percentages, total, positions, most, least, missing };
}

/** Inclusive lower bounds, checked from the top. */
export function strengthLevel(
  score: number,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): { level: StrengthLevel; status: StrengthStatus } {
  const band = policy.strength.bands.find((candidate) => score >= candidate.min_score);
  const level: StrengthLevel = band ? band.level : "very_weak";
  const status: StrengthStatus =
    level === "very_strong" || level === "strong"
      ? "strong"
      : level === "weak" || level === "very_weak"
        ? "weak"
        : "balanced";
  return { level, status };
}

export function assessStrength(
  chart: FourPillarChart,
  policy: AnalysisPolicyV1 = ANALYSIS_POLICY_V1
): StrengthAssessment {
  const dm = chart.day_master.element;

  const seasonalSupport = chart.month.branch_element === dm;

  const rooted = PILLAR_ORDER.some((position) => {
    const pillar = chart[position];
    return pillar.branch_element === dm || pillar.hidden_stems.some((stem) => stemElement(stem) === dm);
  });

  let peers = 0;
  for (const position of ["year", "month", "hour"] as const) {
    const pillar = chart[position];
    if (pillar.stem_element === dm) peers += 1;
    if (pillar.branch_element === dm) peers += 1;
  }

  const { strength } = policy;
  const score =
    strength.base +
    (seasonalSupport ? strength.seasonal_support : 0) +
    (rooted ? strength.rooted : 0) +
    strength.per_peer * peers;

  return {
    score,
    ...strengthLevel(score, policy),
    day_master_element: dm,
    seasonal_support: seasonalSupport,
    rooted,
    peer_support_count: peers,
  };
}

/**
 * Role groups from strength status.
 *
 * Weak hostile: the generators of the destroyer and the drainer, in that
 * order. For a weak day master the drainer's generator is the day master's
 * own element, so it appears both as useful and as hostile.
 */
export function deriveFavorableElements(status: StrengthStatus, dayMaster: Element): FavorableElementSet {
  if (status === "strong") {
    return {
      useful: [destroyerOf(dayMaster)],
      supportive: [generates(dayMaster)],
      unfavorable: [generatorOf(dayMaster)],
      hostile: [dayMaster],
    };
  }

  if (status === "weak") {
    const useful = [generatorOf(dayMaster), dayMaster];
    const unfavorable = [destroyerOf(dayMaster), generates(dayMaster)];
    const hostile: Element[] = [];
    for (const element of unfavorable) {
      const feeder = generatorOf(element);
      if (!hostile.includes(feeder)) hostile.push(feeder);
    }
    return {
      useful,
      supportive: [generatorOf(dayMaster)],
      unfavorable,
      hostile,
    };
  }

  return { useful: [], supportive: [], unfavorable: [], hostile: [] };
}
