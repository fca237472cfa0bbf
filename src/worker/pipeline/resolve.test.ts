import { describe, it, expect, vi, afterEach } from "vitest";
import { classifyRecord, planWork, resolveObservations } from "./resolve";
import { createRecord, mergeDraft } from "./merge";
import { RecordStore } from "../store/recordStore";
import type { ListingDraft, ListingRecord, Observation } from "@/lib/domain/types";

const FP = "aaaaaaaaaaaaaaaa";
const OPTS = { fingerprint: FP, retryAmbiguous: false };
const NOW = new Date("2026-10-01T06:00:00.000Z");

afterEach(() => {
  vi.restoreAllMocks();
});

function draft(overrides: Partial<ListingDraft> = {}): ListingDraft {
  return {
    kind: "rental",
    externalId: "312345678",
    title: "Lys 2-roms",
    rawAddress: "Thorvald Meyers gate 12, 0555 Oslo",
    price: "3200 kr",
    size: "45 m²",
    link: "https://www.finn.no/realestate/lettings/ad.html?finnkode=312345678",
    ...overrides,
  };
}

function observe(d: ListingDraft, at: string, source: Observation["source"] = "email"): Observation {
  return { draft: d, source, origin: `${source}-${at}`, observedAt: new Date(at) };
}

function geocoded(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    ...createRecord(observe(draft(), "2026-09-01T08:00:00.000Z"), NOW),
    latitude: 59.92,
    longitude: 10.76,
    normalizedAddress: "thorvald meyers gate 12, 0555 oslo",
    distanceMinutes: 20,
    fingerprint: FP,
    ...overrides,
  };
}

function quietStore(kind: "rental" | "sale" = "rental"): RecordStore {
  vi.spyOn(console, "log").mockImplementation(() => {});
  return RecordStore.empty(kind, "/nonexistent");
}

describe("classifyRecord", () => {
  it("is UNCHANGED when the distance was computed under the current fingerprint", () => {
    expect(classifyRecord(geocoded(), OPTS)).toBe("UNCHANGED");
  });

  it("is NEEDS_RECOMPUTE when the fingerprint changed", () => {
    expect(classifyRecord(geocoded({ fingerprint: "bbbbbbbbbbbbbbbb" }), OPTS)).toBe("NEEDS_RECOMPUTE");
  });

  it("is NEEDS_RECOMPUTE when coordinates exist without a distance", () => {
    expect(classifyRecord(geocoded({ distanceMinutes: null, fingerprint: null }), OPTS)).toBe(
      "NEEDS_RECOMPUTE"
    );
  });

  it("is NEEDS_GEOCODE when coordinates are missing", () => {
    expect(
      classifyRecord(geocoded({ latitude: null, longitude: null, distanceMinutes: null }), OPTS)
    ).toBe("NEEDS_GEOCODE");
  });

  it("holds ambiguous records for review unless retrying is enabled", () => {
    const ambiguous = geocoded({ isAmbiguous: true, latitude: null, longitude: null, distanceMinutes: null });
    expect(classifyRecord(ambiguous, OPTS)).toBe("AWAITING_REVIEW");
    expect(classifyRecord(ambiguous, { ...OPTS, retryAmbiguous: true })).toBe("NEEDS_GEOCODE");
  });
});

describe("mergeDraft", () => {
  it("fills only null fields and keeps first_seen_at", () => {
    const existing = geocoded({ price: null, title: "Original title" });
    const merged = mergeDraft(
      existing,
      draft({ title: "New title", price: "3400 kr", size: null }),
      new Date("2026-10-02T06:00:00.000Z")
    );

    expect(merged.title).toBe("Original title");
    expect(merged.price).toBe("3400 kr");
    expect(merged.size).toBe("45 m²");
    expect(merged.firstSeenAt).toEqual(existing.firstSeenAt);
    expect(merged.lastSeenAt).toEqual(new Date("2026-10-02T06:00:00.000Z"));
    expect(merged.distanceMinutes).toBe(20);
  });

  it("refuses to merge a different key", () => {
    expect(() => mergeDraft(geocoded(), draft({ kind: "sale" }), NOW)).toThrow(/cannot merge/);
  });
});

describe("resolveObservations", () => {
  it("creates a record on first sight and merges later sightings", () => {
    const store = quietStore();
    const result = resolveObservations(
      store,
      [
        observe(draft({ price: null }), "2026-09-20T10:00:00.000Z", "email"),
        observe(draft({ title: null }), "2026-09-10T10:00:00.000Z", "master_list"),
      ],
      NOW,
      OPTS
    );

    expect(store.size).toBe(1);
    const stored = store.get("312345678");
    expect(stored?.firstSeenAt).toEqual(new Date("2026-09-10T10:00:00.000Z"));
    expect(stored?.lastSeenAt).toEqual(NOW);
    expect(stored?.title).toBe("Lys 2-roms");
    expect(stored?.price).toBe("3200 kr");
    expect(result.counts.NEW).toBe(1);
    expect(result.resolutions.get("312345678")).toBe("NEW");
  });

  it("never moves first_seen_at on re-observation", () => {
    const store = quietStore();
    const original = geocoded();
    store.put(original);

    for (let day = 2; day <= 5; day++) {
      resolveObservations(
        store,
        [observe(draft(), `2026-10-0${day}T06:00:00.000Z`)],
        new Date(`2026-10-0${day}T07:00:00.000Z`),
        OPTS
      );
    }

    expect(store.get("312345678")?.firstSeenAt).toEqual(original.firstSeenAt);
    expect(store.get("312345678")?.lastSeenAt).toEqual(new Date("2026-10-05T07:00:00.000Z"));
    expect(store.size).toBe(1);
  });

  it("classifies known records against the current fingerprint", () => {
    const store = quietStore();
    store.put(geocoded());
    store.put(geocoded({ externalId: "398765432", fingerprint: "old-fingerprint" }));

    const result = resolveObservations(
      store,
      [
        observe(draft(), "2026-09-30T10:00:00.000Z"),
        observe(draft({ externalId: "398765432" }), "2026-09-30T10:00:00.000Z"),
      ],
      NOW,
      OPTS
    );

    expect(result.resolutions.get("312345678")).toBe("UNCHANGED");
    expect(result.resolutions.get("398765432")).toBe("NEEDS_RECOMPUTE");
  });

  it("ignores drafts of the other kind", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const store = quietStore("sale");
    resolveObservations(store, [observe(draft(), "2026-09-30T10:00:00.000Z")], NOW, OPTS);
    expect(store.size).toBe(0);
  });
});

describe("planWork", () => {
  it("lists only records that need geocoding or a new distance", () => {
    const store = quietStore();
    store.put(geocoded({ externalId: "100000001" }));
    store.put(geocoded({ externalId: "100000002", fingerprint: "old" }));
    store.put(geocoded({ externalId: "100000003", latitude: null, longitude: null, distanceMinutes: null }));
    store.put(geocoded({ externalId: "100000004", isAmbiguous: true, latitude: null, longitude: null }));

    expect(planWork(store, OPTS).map((w) => [w.record.externalId, w.need])).toEqual([
      ["100000002", "NEEDS_RECOMPUTE"],
      ["100000003", "NEEDS_GEOCODE"],
    ]);
  });
});
