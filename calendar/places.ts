/**
 * Fixed place table for resolving a birth place to coordinates.
 */

export interface PlaceCoordinates {
  name: string;
  longitude: number;
  latitude: number;
}

/** Reference meridian of the civil clock (UTC+8). */
export const REFERENCE_MERIDIAN_DEG = 120.0;
export const DEFAULT_LATITUDE_DEG = 39.9;

// Lookup order matters: substring matching returns the first hit.
const PLACE_TABLE: readonly PlaceCoordinates[] = [
  { name: "北京", longitude: 116.4074, latitude: 39.9042 },
  { name: "上海", longitude: 121.4737, latitude: 31.2304 },
  { name: "广州", longitude: 113.2644, latitude: 23.1291 },
  { name: "深圳", longitude: 114.0579, latitude: 22.5431 },
  { name: "杭州", longitude: 120.1551, latitude: 30.2741 },
  { name: "成都", longitude: 104.0668, latitude: 30.5728 },
  { name: "重庆", longitude: 106.5516, latitude: 29.563 },
  { name: "西安", longitude: 108.9398, latitude: 34.3416 },
  { name: "南京", longitude: 118.7969, latitude: 32.0603 },
  { name: "昆明", longitude: 102.7123, latitude: 25.0406 },
  { name: "昆明市", longitude: 102.7123, latitude: 25.0406 },
  { name: "云南省", longitude: 102.7123, latitude: 25.0406 },
];

function matchPlace(query: string): PlaceCoordinates | null {
  const needle = query.trim();
  if (needle === "") return null;
  return (
    PLACE_TABLE.find((place) => needle.includes(place.name) || place.name.includes(needle)) ??
    null
  );
}

/**
 * Resolve a place by city first, then province. Either side may contain the
 * other ("昆明" matches "昆明市", "云南省昆明" matches "昆明").
 */
export function resolvePlace(place: {
  province?: string | null;
  city?: string | null;
}): PlaceCoordinates | null {
  if (place.city) {
    const byCity = matchPlace(place.city);
    if (byCity) return byCity;
  }
  if (place.province) {
    return matchPlace(place.province);
  }
  return null;
}
