import { createRecord, mergeDraft } from "./merge";
import type { RecordStore } from "../store/recordStore";
import type {
  ListingRecord,
  Observation,
  ResolutionKind,
} from "@/lib/domain/types";

export interface ResolveOptions {
  /** Fingerprint of the current commute settings for this kind */
  fingerprint: string;
  /** Re-geocode records flagged ambiguous instead of waiting for review */
  retryAmbiguous: boolean;
}

export const RESOLUTION_KINDS: ResolutionKind[] = [
  "NEW",
  "UNCHANGED",
  "NEEDS_RECOMPUTE",
  "NEEDS_GEOCODE",
  "AWAITING_REVIEW",
];

/**
 * Decide what a stored record still needs this run:
 *
 * - ambiguous and not retried: AWAITING_REVIEW (no API calls)
 * - no coordinates: NEEDS_GEOCODE
 * - distance computed under the current fingerprint: UNCHANGED
 * - otherwise: NEEDS_RECOMPUTE (reuse coordinates, distance only)
 */
export function classifyRecord(
  record: ListingRecord,
  opts: ResolveOptions
): Exclude<ResolutionKind, "NEW"> {
  if (record.isAmbiguous) {
    return opts.retryAmbiguous ? "NEEDS_GEOCODE" : "AWAITING_REVIEW";
  }
  if (record.latitude === null || record.longitude === null) {
    return "NEEDS_GEOCODE";
  }
  if (record.distanceMinutes !== null && record.fingerprint === opts.fingerprint) {
    return "UNCHANGED";
  }
  return "NEEDS_RECOMPUTE";
}

export interface ResolveResult {
  /** One entry per distinct key observed this run */
  resolutions: Map<string, ResolutionKind>;
  counts: Record<ResolutionKind, number>;
}

export function emptyCounts(): Record<ResolutionKind, number> {
  return {
    NEW: 0,
    UNCHANGED: 0,
    NEEDS_RECOMPUTE: 0,
    NEEDS_GEOCODE: 0,
    AWAITING_REVIEW: 0,
  };
}

/**
 * Apply a run's observations to the store in chronological order. The
 * first observation of an unknown key creates the record (NEW); every
 * later observation, from any source, merges into it.
 */
export function resolveObservations(
  store: RecordStore,
  observations: Observation[],
  now: Date,
  opts: ResolveOptions
): ResolveResult {
  const resolutions = new Map<string, ResolutionKind>();
  const ordered = [...observations].sort(
    (a, b) => a.observedAt.getTime() - b.observedAt.getTime()
  );

  for (const obs of ordered) {
    const { draft } = obs;
    if (draft.kind !== store.kind) {
      console.warn(
        `[resolve] ${obs.origin}: ${draft.kind} listing ${draft.externalId} ignored in the ${store.kind} run`
      );
      continue;
    }

    const existing = store.get(draft.externalId);
    if (!existing) {
      store.put(createRecord(obs, now));
      resolutions.set(draft.externalId, "NEW");
      continue;
    }

    if (!resolutions.has(draft.externalId)) {
      resolutions.set(draft.externalId, classifyRecord(existing, opts));
    }
    store.put(mergeDraft(existing, draft, now));
  }

  const counts = emptyCounts();
  for (const kind of resolutions.values()) counts[kind]++;

  console.log(
    `[resolve] ${store.kind}: ${resolutions.size} listings observed (` +
      RESOLUTION_KINDS.map((k) => `${k} ${counts[k]}`).join(", ") +
      ")"
  );
  return { resolutions, counts };
}

/**
 * Every stored record that needs API work this run, with what it needs.
 * Records never observed this run are included so earlier failures are
 * retried.
 */
export function planWork(
  store: RecordStore,
  opts: ResolveOptions
): Array<{ record: ListingRecord; need: "NEEDS_GEOCODE" | "NEEDS_RECOMPUTE" }> {
  const work: Array<{ record: ListingRecord; need: "NEEDS_GEOCODE" | "NEEDS_RECOMPUTE" }> = [];
  for (const record of store.all()) {
    const need = classifyRecord(record, opts);
    if (need === "NEEDS_GEOCODE" || need === "NEEDS_RECOMPUTE") {
      work.push({ record, need });
    }
  }
  return work.sort((a, b) => a.record.firstSeenAt.getTime() - b.record.firstSeenAt.getTime());
}
