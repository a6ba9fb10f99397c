// src/services/locationNormalizer.ts

import { NormalizedLocation } from "../types/migrationTypes";
import { isPlainRecord, pickField, toFloatOrNull } from "../utils/legacyFields";

const has = (obj: Record<string, unknown>, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(obj, key);

function firstParsable(obj: Record<string, unknown>, keys: readonly string[]): number | null {
  for (const key of keys) {
    const parsed = toFloatOrNull(obj[key]);
    if (parsed !== null) return parsed;
  }
  return null;
}

/**
 * Reshapes `{ latitude, longitude }` or `{ lat, lng }` (in that precedence)
 * into `{ lat, lng, accuracy_m }`. Returns null when either coordinate is not
 * a number; that means "no location", not an error.
 */
export function normalizeLocation(raw: unknown): NormalizedLocation | null {
  if (!isPlainRecord(raw)) return null;

  let lat: number | null = null;
  let lng: number | null = null;

  if (has(raw, "latitude") && has(raw, "longitude")) {
    lat = toFloatOrNull(raw.latitude);
    lng = toFloatOrNull(raw.longitude);
  }
  if (lat === null && has(raw, "lat") && has(raw, "lng")) {
    lat = toFloatOrNull(raw.lat);
    lng = toFloatOrNull(raw.lng);
  }
  // Mixed spellings, e.g. { lat, longitude }
  if (lat === null) lat = firstParsable(raw, ["lat", "latitude"]);
  if (lng === null) lng = firstParsable(raw, ["lng", "longitude"]);

  let accuracy: number | null = null;
  if (has(raw, "accuracy_m")) {
    accuracy = toFloatOrNull(raw.accuracy_m);
  } else if (has(raw, "accuracy")) {
    accuracy = toFloatOrNull(raw.accuracy);
  }

  if (lat === null || lng === null) return null;
  return { lat, lng, accuracy_m: accuracy };
}

export function isSameLocation(stored: unknown, normalized: NormalizedLocation): boolean {
  if (!isPlainRecord(stored)) return false;
  const keys = Object.keys(stored);
  return (
    keys.length === 3 &&
    stored.lat === normalized.lat &&
    stored.lng === normalized.lng &&
    has(stored, "accuracy_m") &&
    stored.accuracy_m === normalized.accuracy_m
  );
}

/**
 * Reads a submitted `{ lat, lng }` or `{ latitude, longitude }` location.
 * Returns a message instead when a coordinate is missing or not a number.
 */
export function readSubmittedLocation(raw: unknown): NormalizedLocation | string {
  const lat = pickField(raw, ["lat", "latitude"]);
  const lng = pickField(raw, ["lng", "longitude"]);
  if (lat === undefined || lat === null || lng === undefined || lng === null) {
    return "location with latitude/longitude (or lat/lng) is required.";
  }
  const parsedLat = toFloatOrNull(lat);
  const parsedLng = toFloatOrNull(lng);
  if (parsedLat === null || parsedLng === null) {
    return "latitude/longitude must be numbers.";
  }
  return {
    lat: parsedLat,
    lng: parsedLng,
    accuracy_m: toFloatOrNull(pickField(raw, ["accuracy_m"])),
  };
}
