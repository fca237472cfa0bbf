/**
 * Domain types shared by the extractor, the resolver, the stores and the
 * enrichment stage. Rental and sale listings live in separate partitions;
 * the pair (kind, externalId) is the record key.
 */

export const PROPERTY_KINDS = ["rental", "sale"] as const;

export type PropertyKind = (typeof PROPERTY_KINDS)[number];

export function isPropertyKind(value: string): value is PropertyKind {
  const kinds: readonly string[] = PROPERTY_KINDS;
  return kinds.includes(value);
}

export interface Coordinates {
  lat: number;
  lng: number;
}

export type TravelMode = "transit" | "walking";

/** Nearest hit of one place category, with travel times from the listing */
export interface NearbyPlace {
  name: string;
  /** Straight-line distance */
  distanceKm: number;
  /** Null for places stored before travel times were recorded */
  location: Coordinates | null;
  walkMinutes: number | null;
  transitMinutes: number | null;
}

/**
 * A listing as it comes out of an email or a master-list row, before the
 * resolver has looked at the store.
 */
export interface ListingDraft {
  kind: PropertyKind;
  externalId: string;
  title: string | null;
  rawAddress: string | null;
  price: string | null;
  size: string | null;
  link: string;
}

/** Where a draft was observed, and when. */
export interface Observation {
  draft: ListingDraft;
  source: "email" | "master_list";
  /** Message id for emails, file path + row for master lists */
  origin: string;
  observedAt: Date;
}

export interface ListingRecord {
  kind: PropertyKind;
  externalId: string;
  title: string | null;
  rawAddress: string | null;
  normalizedAddress: string | null;
  latitude: number | null;
  longitude: number | null;
  price: string | null;
  size: string | null;
  link: string;
  distanceMinutes: number | null;
  /** Config fingerprint the distance was computed under */
  fingerprint: string | null;
  nearbyPlaces: Record<string, NearbyPlace>;
  firstSeenAt: Date;
  lastSeenAt: Date;
  isAmbiguous: boolean;
}

export type RecordKey = `${PropertyKind}:${string}`;

export function recordKey(kind: PropertyKind, externalId: string): RecordKey {
  return `${kind}:${externalId}`;
}

export type ResolutionKind =
  | "NEW"
  | "UNCHANGED"
  | "NEEDS_RECOMPUTE"
  | "NEEDS_GEOCODE"
  | "AWAITING_REVIEW";

export type GeocodeOutcome =
  | { status: "ok"; coordinates: Coordinates; formattedAddress: string | null }
  | { status: "ambiguous"; candidates: GeocodeCandidate[] }
  | { status: "not_found" };

export interface GeocodeCandidate extends Coordinates {
  formattedAddress: string | null;
}

export interface AmbiguousAddressEntry {
  kind: PropertyKind;
  externalId: string;
  title: string | null;
  address: string | null;
  link: string;
  reason: string;
  candidates: GeocodeCandidate[];
  loggedAt: Date;
}
