import { InvalidBirthInputError } from "./errors.js";
import type { CivilMoment } from "./schemas/fourPillarChart.schema.js";

export const MS_PER_DAY = 86_400_000;
const MINUTES_PER_DAY = 24 * 60;

/**
 * Naive civil time as epoch milliseconds. The fields are read as if they were
 * UTC so that day arithmetic never sees a DST jump.
 */
export function civilToMs(moment: CivilMoment, second = 0): number {
  const date = new Date(0);
  date.setUTCFullYear(moment.year, moment.month - 1, moment.day);
  date.setUTCHours(moment.hour, moment.minute, second, 0);
  return date.getTime();
}

export function msToCivil(ms: number): CivilMoment {
  const date = new Date(ms);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
  };
}

/** Move the clock by `minutes`, wrapping within 00:00..23:59. The date is kept. */
export function wrapClockMinutes(moment: CivilMoment, minutes: number): CivilMoment {
  const total = (((moment.hour * 60 + moment.minute + minutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return { ...moment, hour: Math.floor(total / 60), minute: total % 60 };
}

export function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

/** Whole-day count between two civil dates (time of day ignored). */
export function daysBetween(from: CivilMoment, to: CivilMoment): number {
  const start = civilToMs({ ...from, hour: 0, minute: 0 });
  const end = civilToMs({ ...to, hour: 0, minute: 0 });
  return Math.round((end - start) / MS_PER_DAY);
}

export function formatCivilDate(moment: CivilMoment): string {
  const mm = String(moment.month).padStart(2, "0");
  const dd = String(moment.day).padStart(2, "0");
  return `${String(moment.year).padStart(4, "0")}-${mm}-${dd}`;
}

/** Throws InvalidBirthInputError on the first out-of-range field. */
export function assertValidCivilMoment(moment: CivilMoment): void {
  const checks: Array<[keyof CivilMoment, boolean, string]> = [
    ["year", Number.isInteger(moment.year) && moment.year >= 1 && moment.year <= 9999, "must be an integer in 1..9999"],
    ["month", Number.isInteger(moment.month) && moment.month >= 1 && moment.month <= 12, "must be an integer in 1..12"],
    ["hour", Number.isInteger(moment.hour) && moment.hour >= 0 && moment.hour <= 23, "must be an integer in 0..23"],
    ["minute", Number.isInteger(moment.minute) && moment.minute >= 0 && moment.minute <= 59, "must be an integer in 0..59"],
  ];
  for (const [field, ok, detail] of checks) {
    if (!ok) throw new InvalidBirthInputError(field, `${detail}, got ${moment[field]}`);
  }

  const maxDay = daysInMonth(moment.year, moment.month);
  if (!Number.isInteger(moment.day) || moment.day < 1 || moment.day > maxDay) {
    throw new InvalidBirthInputError(
      "day",
      `must be an integer in 1..${maxDay} for ${moment.year}-${moment.month}, got ${moment.day}`
    );
  }
}
