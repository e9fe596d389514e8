import { assertValidCivilMoment, wrapClockMinutes } from "./civilTime.js";
import { DEFAULT_LATITUDE_DEG, REFERENCE_MERIDIAN_DEG, resolvePlace } from "./places.js";
import {
  EffectiveBirthMomentSchema,
  type CivilMoment,
  type EffectiveBirthMoment,
} from "./schemas/fourPillarChart.schema.js";

export interface BirthMomentInput extends CivilMoment {
  longitude?: number | null;
  latitude?: number | null;
  province?: string | null;
  city?: string | null;
  use_true_solar_time?: boolean;
}

/** 4 minutes of clock time per degree east of the reference meridian. */
export const MINUTES_PER_DEGREE = 4;

export function solarOffsetMinutes(longitude: number): number {
  return Math.round((longitude - REFERENCE_MERIDIAN_DEG) * MINUTES_PER_DEGREE);
}

/**
 * Resolve where and when the chart is cast.
 *
 * Coordinates given explicitly win; otherwise the place table is consulted;
 * otherwise the reference meridian is assumed. When correction is enabled the
 * clock time is shifted by the longitude offset and wraps at midnight; the
 * calendar date is never moved.
 */
export function resolveBirthMoment(input: BirthMomentInput): EffectiveBirthMoment {
  const clock: CivilMoment = {
    year: input.year,
    month: input.month,
    day: input.day,
    hour: input.hour,
    minute: input.minute,
  };
  assertValidCivilMoment(clock);

  let longitude = REFERENCE_MERIDIAN_DEG;
  let latitude = DEFAULT_LATITUDE_DEG;
  let placeSource: EffectiveBirthMoment["place_source"] = "default_meridian";
  let placeName: string | null = null;

  if (typeof input.longitude === "number") {
    longitude = input.longitude;
    latitude = typeof input.latitude === "number" ? input.latitude : DEFAULT_LATITUDE_DEG;
    placeSource = "coordinates";
  } else {
    const place = resolvePlace({ province: input.province, city: input.city });
    if (place) {
      longitude = place.longitude;
      latitude = place.latitude;
      placeSource = "place_table";
      placeName = place.name;
    }
  }

  const apply = input.use_true_solar_time === true;
  const offset = apply ? solarOffsetMinutes(longitude) : 0;

  return EffectiveBirthMomentSchema.parse({
    clock,
    effective: offset === 0 ? clock : wrapClockMinutes(clock, offset),
    longitude,
    latitude,
    place_source: placeSource,
    place_name: placeName,
    true_solar_time_applied: apply,
    offset_minutes: offset,
  });
}
