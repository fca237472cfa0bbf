/**
 * Address normalization and distance helpers.
 */

import type { Coordinates } from "./types";

/**
 * Normalize an address for use as a geocode cache key:
 * - Lowercase
 * - Collapse whitespace (including non-breaking spaces)
 * - Tighten spacing around commas
 * - Remove trailing punctuation
 */
export function normalizeAddress(input: string): string {
  let addr = input.replace(/\u00a0/g, " ").toLowerCase().trim();

  addr = addr.replace(/\s*,\s*/g, ", ");
  addr = addr.replace(/\s+/g, " ").trim();
  addr = addr.replace(/[.,;]+$/, "").trim();

  return addr;
}

/**
 * Collapse whitespace in free text pulled out of HTML. Returns null for
 * empty input.
 */
export function cleanText(input: string | null | undefined): string | null {
  if (!input) return null;
  const text = input.replace(/[\u00a0\u202f]/g, " ").replace(/\s+/g, " ").trim();
  return text.length > 0 ? text : null;
}

const EARTH_RADIUS_KM = 6371.0;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Straight-line distance between two coordinates in kilometers.
 */
export function haversineKm(a: Coordinates, b: Coordinates): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}
