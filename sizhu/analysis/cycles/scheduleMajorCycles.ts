/**
 * Layer 1: decade cycles.
 *
 * Direction comes from the year stem's polarity and gender; the start age
 * from the distance to the governing primary term (3 days = 1 year,
 * 1 day = 4 months). Steps walk the sexagenary cycle from the month pillar.
 */

import { civilToMs, formatCivilDate, MS_PER_DAY, msToCivil } from "../../../calendar/civilTime.js";
import { buildPillar, pillarLabel } from "../../../calendar/computeFourPillars.js";
import { lunarTermSource, type SolarTermSource, type TermBoundary } from "../../../calendar/lunarCalendar.js";
import type { CivilMoment, FourPillarChart } from "../../../calendar/schemas/fourPillarChart.schema.js";
import type { Branch, Element, Stem } from "../../../calendar/stemsBranches.js";
import type { FavorableElementSet } from "../elements/analyzeElements.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1 } from "../policy/analysisPolicy.v1.js";

export type Gender = "male" | "female";
export type CycleDirection = "forward" | "reverse";
export type CycleEvaluation = "favorable" | "unfavorable" | "neutral";

export interface MajorCycle {
  step: number;
  stem: Stem;
  branch: Branch;
  label: string;
  stem_element: Element;
  branch_element: Element;
  start_age: number;
  end_age: number;
  start_year: number;
  end_year: number;
  evaluation: CycleEvaluation;
}

export interface MajorCycleSchedule {
  direction: CycleDirection;
  /** null when no term boundary was found and the default start was used. */
  governing_term: { name: string; at: string } | null;
  day_difference: number | null;
  start_age: number;
  start_months: number;
  start_date: string;
  cycles: MajorCycle[];
}

export interface ScheduleMajorCyclesInput {
  chart: FourPillarChart;
  gender: Gender;
  /** The effective (corrected) birth moment. */
  birth: CivilMoment;
  favorable: FavorableElementSet;
  termSource?: SolarTermSource;
  policy?: AnalysisPolicyV1;
}

export function cycleDirection(yearStemPolarity: "yang" | "yin", gender: Gender): CycleDirection {
  const forward =
    (yearStemPolarity === "yang" && gender === "male") || (yearStemPolarity === "yin" && gender === "female");
  return forward ? "forward" : "reverse";
}

/** Nearest boundary strictly after (forward) or strictly before (reverse) the birth instant. */
export function findGoverningTerm(
  birthMs: number,
  terms: readonly TermBoundary[],
  direction: CycleDirection
): TermBoundary | null {
  let best: TermBoundary | null = null;
  let bestDiff = Number.POSITIVE_INFINITY;
  for (const term of terms) {
    const diff = direction === "forward" ? term.at_ms - birthMs : birthMs - term.at_ms;
    if (diff > 0 && diff < bestDiff) {
      best = term;
      bestDiff = diff;
    }
  }
  return best;
}

/** Whole days, plus one when the leftover is at least `roundUpHours`. */
export function dayDifference(diffMs: number, roundUpHours: number): number {
  const exactDays = Math.abs(diffMs) / MS_PER_DAY;
  let days = Math.floor(exactDays);
  const remainderHours = (exactDays - days) * 24;
  if (remainderHours >= roundUpHours) days += 1;
  return days;
}

export function evaluateCycleElements(
  stemElement: Element,
  branchElement: Element,
  favorable: FavorableElementSet
): CycleEvaluation {
  if (favorable.useful.includes(stemElement) || favorable.useful.includes(branchElement)) return "favorable";
  if (favorable.unfavorable.includes(stemElement) || favorable.unfavorable.includes(branchElement)) {
    return "unfavorable";
  }
  return "neutral";
}

export function scheduleMajorCycles(input: ScheduleMajorCyclesInput): MajorCycleSchedule {
  const policy = input.policy ?? ANALYSIS_POLICY_V1;
  const cfg = policy.major_cycles;
  const termSource = input.termSource ?? lunarTermSource;
  const { chart, birth, favorable } = input;

  const direction = cycleDirection(chart.year.stem_polarity, input.gender);
  const birthMs = civilToMs(birth);
  const term = findGoverningTerm(birthMs, termSource(birth), direction);

  let startAge: number;
  let startMonths: number;
  let days: number | null;
  let startDate: string;
  if (term) {
    days = dayDifference(term.at_ms - birthMs, cfg.round_up_remainder_hours);
    startAge = Math.floor(days / cfg.days_per_year_of_age);
    startMonths = (days % cfg.days_per_year_of_age) * cfg.months_per_remaining_day;
    startDate = formatCivilDate(msToCivil(birthMs + days * MS_PER_DAY));
  } else {
    days = null;
    startAge = cfg.fallback_start_age;
    startMonths = 0;
    startDate = formatCivilDate(msToCivil(birthMs + cfg.fallback_start_days * MS_PER_DAY));
  }

  const sign = direction === "forward" ? 1 : -1;
  const cycles: MajorCycle[] = [];
  for (let step = 1; step <= cfg.steps; step++) {
    const pillar = buildPillar(chart.month.stem_index + sign * step, chart.month.branch_index + sign * step);
    const start = startAge + (step - 1) * cfg.years_per_step;
    const end = start + cfg.years_per_step - 1;
    cycles.push({
      step,
      stem: pillar.stem,
      branch: pillar.branch,
      label: pillarLabel(pillar),
      stem_element: pillar.stem_element,
      branch_element: pillar.branch_element,
      start_age: start,
      end_age: end,
      start_year: birth.year + start,
      end_year: birth.year + end,
      evaluation: evaluateCycleElements(pillar.stem_element, pillar.branch_element, favorable),
    });
  }

  return {
    direction,
    governing_term: term ? { name: term.name, at: term.at } : null,
    day_difference: days,
    start_age: startAge,
    start_months: startMonths,
    start_date: startDate,
    cycles,
  };
}
