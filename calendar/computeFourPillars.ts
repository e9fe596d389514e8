/**
 * Layer 0: four-pillar calendar.
 *
 * Pure, deterministic conversion of an (already corrected) civil moment into
 * four sexagenary pillars. Month boundaries follow the calendar month rather
 * than exact solar-term instants, and the year turns on January 1.
 */

import { assertValidCivilMoment, civilToMs, MS_PER_DAY } from "./civilTime.js";
import {
  FourPillarChartSchema,
  type CivilMoment,
  type FourPillarChart,
  type StemBranchPillar,
} from "./schemas/fourPillarChart.schema.js";
import {
  branchAt,
  branchElement,
  branchPolarity,
  hiddenStems,
  mod,
  stemAt,
  stemElement,
  stemPolarity,
} from "./stemsBranches.js";

/** 1900 is a 庚子 year. */
export const YEAR_ANCHOR = { year: 1900, stem_index: 6, branch_index: 0 } as const;

/** 1900-01-01 is counted as a 甲子 day. */
export const DAY_ANCHOR = { year: 1900, month: 1, day: 1, stem_index: 0, branch_index: 0 } as const;

/** Calendar month (1-based) → month branch index. January is 寅. */
const MONTH_BRANCH_INDEX: readonly number[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 0, 1];

/** Five-tiger base: year stem index % 5 → offset added to the month branch index (子 = 0). */
const FIVE_TIGER_BASE: readonly number[] = [2, 4, 6, 8, 0];

/** Five-rat rule: day stem index % 5 → stem index of the 子 hour. */
const FIVE_RAT_BASE: readonly number[] = [0, 2, 4, 6, 8];

export function buildPillar(stemIndex: number, branchIndex: number): StemBranchPillar {
  const stem = stemAt(stemIndex);
  const branch = branchAt(branchIndex);
  return {
    stem,
    stem_index: mod(stemIndex, 10),
    branch,
    branch_index: mod(branchIndex, 12),
    stem_element: stemElement(stem),
    branch_element: branchElement(branch),
    stem_polarity: stemPolarity(stem),
    branch_polarity: branchPolarity(branch),
    hidden_stems: hiddenStems(branch),
  };
}

export function yearPillar(year: number): StemBranchPillar {
  const offset = year - YEAR_ANCHOR.year;
  return buildPillar(YEAR_ANCHOR.stem_index + offset, YEAR_ANCHOR.branch_index + offset);
}

export function monthPillar(yearStemIndex: number, month: number): StemBranchPillar {
  const branchIndex = MONTH_BRANCH_INDEX[month - 1];
  const base = FIVE_TIGER_BASE[mod(yearStemIndex, 5)];
  return buildPillar(base + branchIndex, branchIndex);
}

export function dayPillar(moment: Pick<CivilMoment, "year" | "month" | "day">): StemBranchPillar {
  const anchorMs = civilToMs({
    year: DAY_ANCHOR.year,
    month: DAY_ANCHOR.month,
    day: DAY_ANCHOR.day,
    hour: 0,
    minute: 0,
  });
  const dayMs = civilToMs({ year: moment.year, month: moment.month, day: moment.day, hour: 0, minute: 0 });
  const days = Math.round((dayMs - anchorMs) / MS_PER_DAY);
  return buildPillar(DAY_ANCHOR.stem_index + days, DAY_ANCHOR.branch_index + days);
}

/** Two-hour windows; 23:00–00:59 is 子. */
export function hourBranchIndex(hour: number): number {
  return Math.floor((hour + 1) / 2) % 12;
}

export function hourPillar(dayStemIndex: number, hour: number): StemBranchPillar {
  const branchIndex = hourBranchIndex(hour);
  const base = FIVE_RAT_BASE[mod(dayStemIndex, 5)];
  return buildPillar(base + branchIndex, branchIndex);
}

/**
 * Compute the chart for an effective civil moment.
 *
 * The day pillar does not roll over at 23:00; only the hour branch wraps.
 */
export function computeFourPillars(moment: CivilMoment): FourPillarChart {
  assertValidCivilMoment(moment);

  const year = yearPillar(moment.year);
  const month = monthPillar(year.stem_index, moment.month);
  const day = dayPillar(moment);
  const hour = hourPillar(day.stem_index, moment.hour);

  return FourPillarChartSchema.parse({
    year,
    month,
    day,
    hour,
    day_master: {
      stem: day.stem,
      element: day.stem_element,
      polarity: day.stem_polarity,
    },
  });
}

export function pillarLabel(pillar: Pick<StemBranchPillar, "stem" | "branch">): string {
  return `${pillar.stem}${pillar.branch}`;
}
