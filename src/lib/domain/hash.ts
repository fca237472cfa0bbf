import { createHash } from "crypto";
import type { Coordinates, PropertyKind } from "./types";

/**
 * Produce a stable SHA-256 hex hash of the input string.
 */
export function hashString(str: string): string {
  return createHash("sha256").update(str).digest("hex");
}

export interface FingerprintInput {
  workLocation: Coordinates | string;
  maxCommuteMinutes: number;
  kind: PropertyKind;
}

/**
 * Fingerprint of the commute-relevant settings. A record's cached distance
 * is only trusted while the fingerprint it was computed under still matches.
 */
export function configFingerprint(input: FingerprintInput): string {
  const location =
    typeof input.workLocation === "string"
      ? input.workLocation.trim().toLowerCase()
      : `${input.workLocation.lat.toFixed(6)},${input.workLocation.lng.toFixed(6)}`;
  return hashString(
    [location, String(input.maxCommuteMinutes), input.kind].join("|")
  ).slice(0, 16);
}
