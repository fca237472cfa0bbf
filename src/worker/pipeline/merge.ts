import type { ListingDraft, ListingRecord, Observation } from "@/lib/domain/types";

/**
 * Build the stored record for a listing seen for the first time.
 * first_seen_at is the observation time; last_seen_at is the run time.
 */
export function createRecord(obs: Observation, now: Date): ListingRecord {
  const { draft } = obs;
  return {
    kind: draft.kind,
    externalId: draft.externalId,
    title: draft.title,
    rawAddress: draft.rawAddress,
    normalizedAddress: null,
    latitude: null,
    longitude: null,
    price: draft.price,
    size: draft.size,
    link: draft.link,
    distanceMinutes: null,
    fingerprint: null,
    nearbyPlaces: {},
    firstSeenAt: obs.observedAt,
    lastSeenAt: now,
    isAmbiguous: false,
  };
}

/**
 * Merge a re-observed draft into the stored record. Only null fields are
 * filled; non-null fields, identity and first_seen_at are never touched.
 */
export function mergeDraft(
  existing: ListingRecord,
  draft: ListingDraft,
  now: Date
): ListingRecord {
  if (draft.kind !== existing.kind || draft.externalId !== existing.externalId) {
    throw new Error(
      `[merge] cannot merge ${draft.kind}:${draft.externalId} into ${existing.kind}:${existing.externalId}`
    );
  }

  return {
    ...existing,
    title: existing.title ?? draft.title,
    rawAddress: existing.rawAddress ?? draft.rawAddress,
    price: existing.price ?? draft.price,
    size: existing.size ?? draft.size,
    link: existing.link || draft.link,
    lastSeenAt: now > existing.lastSeenAt ? now : existing.lastSeenAt,
  };
}
