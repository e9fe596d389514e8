/**
 * Lunar calendar adapter.
 *
 * Everything that needs real astronomical data (lunar dates, solar-term
 * instants) goes through lunar-javascript here; the pillar arithmetic in
 * computeFourPillars.ts stays table-driven and does not call it.
 */

import lunarJs from "lunar-javascript";
import { civilToMs } from "./civilTime.js";
import type { CivilMoment } from "./schemas/fourPillarChart.schema.js";
import { branchElement, type Branch, type Element, type ZodiacAnimal, zodiacAnimal } from "./stemsBranches.js";
import { yearPillar } from "./computeFourPillars.js";

const { Solar } = lunarJs;

/** The 12 primary terms (jie) that open each solar month. */
export const PRIMARY_TERMS = [
  "立春",
  "惊蛰",
  "清明",
  "立夏",
  "芒种",
  "小暑",
  "立秋",
  "白露",
  "寒露",
  "立冬",
  "大雪",
  "小寒",
] as const;

export type PrimaryTerm = (typeof PRIMARY_TERMS)[number];

/**
 * lunar-javascript keys the terms that spill outside the lunar year by their
 * pinyin name; those are the same terms one year over.
 */
const SPILLOVER_KEYS: Record<string, PrimaryTerm> = {
  DA_XUE: "大雪",
  XIAO_HAN: "小寒",
  LI_CHUN: "立春",
  JING_ZHE: "惊蛰",
};

export interface TermBoundary {
  name: PrimaryTerm;
  /** Naive civil instant, same scale as civilToMs. */
  at_ms: number;
  at: string;
}

/** Term lookup is injectable so cycle scheduling can be tested without ephemeris data. */
export type SolarTermSource = (moment: CivilMoment) => readonly TermBoundary[];

function isPrimaryTerm(key: string): key is PrimaryTerm {
  return PRIMARY_TERMS.some((term) => term === key);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Primary term boundaries of the lunar year containing `moment`, including
 * the spill-over terms on either side, sorted by instant.
 */
export const lunarTermSource: SolarTermSource = (moment) => {
  const lunar = Solar.fromYmdHms(moment.year, moment.month, moment.day, moment.hour, moment.minute, 0).getLunar();
  const table = lunar.getJieQiTable();

  const seen = new Set<string>();
  const boundaries: TermBoundary[] = [];
  for (const [key, solar] of Object.entries(table)) {
    const name = isPrimaryTerm(key) ? key : SPILLOVER_KEYS[key];
    if (!name) continue;

    const civil: CivilMoment = {
      year: solar.getYear(),
      month: solar.getMonth(),
      day: solar.getDay(),
      hour: solar.getHour(),
      minute: solar.getMinute(),
    };
    const atMs = civilToMs(civil, solar.getSecond());
    const dedupeKey = `${name}:${atMs}`;
    if (seen.has(dedupeKey)) continue;
    seen.add(dedupeKey);

    boundaries.push({
      name,
      at_ms: atMs,
      at: `${civil.year}-${pad2(civil.month)}-${pad2(civil.day)} ${pad2(civil.hour)}:${pad2(civil.minute)}:${pad2(solar.getSecond())}`,
    });
  }

  return boundaries.sort((a, b) => a.at_ms - b.at_ms);
};

export type WesternSign =
  | "capricorn"
  | "aquarius"
  | "pisces"
  | "aries"
  | "taurus"
  | "gemini"
  | "cancer"
  | "leo"
  | "virgo"
  | "libra"
  | "scorpio"
  | "sagittarius";

/** [sign, month, first day]; a sign runs until the next entry starts. */
const SIGN_STARTS: ReadonlyArray<readonly [WesternSign, number, number]> = [
  ["aquarius", 1, 20],
  ["pisces", 2, 19],
  ["aries", 3, 21],
  ["taurus", 4, 20],
  ["gemini", 5, 21],
  ["cancer", 6, 22],
  ["leo", 7, 23],
  ["virgo", 8, 23],
  ["libra", 9, 23],
  ["scorpio", 10, 24],
  ["sagittarius", 11, 23],
  ["capricorn", 12, 22],
];

export function westernSign(month: number, day: number): WesternSign {
  let sign: WesternSign = "capricorn";
  for (const [name, startMonth, startDay] of SIGN_STARTS) {
    if (month > startMonth || (month === startMonth && day >= startDay)) {
      sign = name;
    }
  }
  return sign;
}

export type Season = "spring" | "summer" | "autumn" | "winter";

export function seasonOf(month: number): Season {
  if (month >= 3 && month <= 5) return "spring";
  if (month >= 6 && month <= 8) return "summer";
  if (month >= 9 && month <= 11) return "autumn";
  return "winter";
}

/** The primary term that opens each calendar month, approximately. */
const MONTH_OPENING_TERM: readonly PrimaryTerm[] = [
  "小寒",
  "立春",
  "惊蛰",
  "清明",
  "立夏",
  "芒种",
  "小暑",
  "立秋",
  "白露",
  "寒露",
  "立冬",
  "大雪",
];

export interface LunarDateInfo {
  lunar_year: number;
  lunar_month: number;
  lunar_day: number;
  is_leap_month: boolean;
  lunar_zodiac: string;
  zodiac_animal: ZodiacAnimal;
  western_sign: WesternSign;
  season: Season;
  governing_term: PrimaryTerm;
  month_command: { branch: Branch; element: Element };
}

/**
 * Lunar date and seasonal context. The zodiac animal follows the calendar
 * year pillar (January 1 boundary); `lunar_zodiac` is lunar-javascript's own
 * animal for the lunar year and can differ around New Year.
 */
export function describeLunarDate(moment: CivilMoment, monthBranch: Branch): LunarDateInfo {
  const lunar = Solar.fromYmdHms(moment.year, moment.month, moment.day, moment.hour, moment.minute, 0).getLunar();
  const rawMonth = lunar.getMonth();

  return {
    lunar_year: lunar.getYear(),
    lunar_month: Math.abs(rawMonth),
    lunar_day: lunar.getDay(),
    // lunar-javascript encodes a leap month as a negative month number.
    is_leap_month: rawMonth < 0,
    lunar_zodiac: lunar.getYearShengXiao(),
    zodiac_animal: zodiacAnimal(yearPillar(moment.year).branch),
    western_sign: westernSign(moment.month, moment.day),
    season: seasonOf(moment.month),
    governing_term: MONTH_OPENING_TERM[moment.month - 1],
    month_command: { branch: monthBranch, element: branchElement(monthBranch) },
  };
}
