import { z } from "zod";
import { BRANCHES, ELEMENTS, STEMS } from "../stemsBranches.js";

/**
 * Zod schemas for the Layer 0 calendar output.
 *
 * A chart is built once per analysis and frozen; every analyzer reads it by
 * reference. `.readonly()` freezes the parsed objects, so a stray write fails
 * loudly instead of leaking into a later stage.
 */

export const StemSchema = z.enum(STEMS);
export const BranchSchema = z.enum(BRANCHES);
export const ElementSchema = z.enum(ELEMENTS);
export const PolaritySchema = z.enum(["yang", "yin"]);

export const PillarPositionSchema = z.enum(["year", "month", "day", "hour"]);
export type PillarPosition = z.infer<typeof PillarPositionSchema>;

/** Fixed scan order. First-match tie-breaks everywhere depend on it. */
export const PILLAR_ORDER: readonly PillarPosition[] = ["year", "month", "day", "hour"];

export const StemBranchPillarSchema = z
  .object({
    stem: StemSchema,
    stem_index: z.number().int().min(0).max(9),
    branch: BranchSchema,
    branch_index: z.number().int().min(0).max(11),
    stem_element: ElementSchema,
    branch_element: ElementSchema,
    stem_polarity: PolaritySchema,
    branch_polarity: PolaritySchema,
    hidden_stems: z.array(StemSchema).min(1).max(3).readonly(),
  })
  .readonly();

export type StemBranchPillar = z.infer<typeof StemBranchPillarSchema>;

export const DayMasterSchema = z
  .object({
    stem: StemSchema,
    element: ElementSchema,
    polarity: PolaritySchema,
  })
  .readonly();

export type DayMaster = z.infer<typeof DayMasterSchema>;

export const FourPillarChartSchema = z
  .object({
    year: StemBranchPillarSchema,
    month: StemBranchPillarSchema,
    day: StemBranchPillarSchema,
    hour: StemBranchPillarSchema,
    day_master: DayMasterSchema,
  })
  .readonly();

export type FourPillarChart = z.infer<typeof FourPillarChartSchema>;

/**
 * Wall-clock civil moment. No timezone: all arithmetic treats the fields as
 * naive local time.
 */
export const CivilMomentSchema = z.object({
  year: z.number().int(),
  month: z.number().int(),
  day: z.number().int(),
  hour: z.number().int(),
  minute: z.number().int(),
});

export type CivilMoment = z.infer<typeof CivilMomentSchema>;

export const EffectiveBirthMomentSchema = z
  .object({
    clock: CivilMomentSchema,
    effective: CivilMomentSchema,
    longitude: z.number(),
    latitude: z.number(),
    place_source: z.enum(["coordinates", "place_table", "default_meridian"]),
    place_name: z.string().nullable(),
    true_solar_time_applied: z.boolean(),
    offset_minutes: z.number().int(),
  })
  .readonly();

export type EffectiveBirthMoment = z.infer<typeof EffectiveBirthMomentSchema>;

export function pillarOf(chart: FourPillarChart, position: PillarPosition): StemBranchPillar {
  return chart[position];
}
