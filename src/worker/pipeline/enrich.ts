import type { ApiBudget } from "../http/budget";
import type { MapServices } from "../http/maps";
import type { AmbiguousAddressLog } from "../store/ambiguousLog";
import type { GeocodeCache } from "../store/geocodeCache";
import type { RecordStore } from "../store/recordStore";
import { normalizeAddress, haversineKm } from "@/lib/domain/normalize";
import {
  BudgetExceededError,
  ConfigError,
  DistanceFailureError,
  GeocodeFailureError,
} from "@/lib/errors";
import type { PlaceCategory } from "@/lib/config";
import type { Coordinates, GeocodeOutcome, ListingRecord, NearbyPlace } from "@/lib/domain/types";

export interface EnrichContext {
  maps: MapServices;
  budget: ApiBudget;
  cache: GeocodeCache;
  ambiguousLog: AmbiguousAddressLog;
  workLocation: Coordinates;
  fingerprint: string;
  now: Date;
}

export interface EnrichStats {
  geocoded: number;
  cacheHits: number;
  ambiguous: number;
  geocodeFailed: number;
  distanceComputed: number;
  distanceFailed: number;
  skippedForBudget: number;
}

export function emptyEnrichStats(): EnrichStats {
  return {
    geocoded: 0,
    cacheHits: 0,
    ambiguous: 0,
    geocodeFailed: 0,
    distanceComputed: 0,
    distanceFailed: 0,
    skippedForBudget: 0,
  };
}

function describe(record: ListingRecord): string {
  return `${record.kind} ${record.externalId}`;
}

/**
 * Resolve the configured work location to coordinates. A string anchor is
 * geocoded once (cache first); anything but a single match is a config
 * error.
 */
export async function resolveWorkLocation(
  location: Coordinates | string,
  maps: MapServices,
  budget: ApiBudget,
  cache: GeocodeCache
): Promise<Coordinates> {
  if (typeof location !== "string") return location;

  const key = normalizeAddress(location);
  const cached = cache.get(key);
  if (cached) return cached.coordinates;

  let outcome: GeocodeOutcome;
  try {
    outcome = await budget.call("geocoding", () => maps.geocoder.geocode(location));
  } catch (err) {
    if (err instanceof BudgetExceededError || err instanceof GeocodeFailureError) {
      throw new ConfigError(`work_location "${location}" could not be geocoded: ${err.message}`);
    }
    throw err;
  }

  if (outcome.status !== "ok") {
    throw new ConfigError(
      `work_location "${location}" is ${outcome.status === "ambiguous" ? "ambiguous" : "not found"}; use {lat, lng} instead`
    );
  }
  cache.set(key, { coordinates: outcome.coordinates, formattedAddress: outcome.formattedAddress });
  console.log(
    `[enrich] Work location "${location}" -> ${outcome.coordinates.lat}, ${outcome.coordinates.lng}`
  );
  return outcome.coordinates;
}

type GeocodeStep =
  | { kind: "coordinates"; coordinates: Coordinates }
  | { kind: "stop" };

/**
 * Coordinates for a record that has none, from the cache or one geocoding
 * call. Ambiguous results flag the record and log it for review.
 */
async function geocodeRecord(
  record: ListingRecord,
  ctx: EnrichContext,
  stats: EnrichStats
): Promise<GeocodeStep> {
  if (!record.rawAddress) {
    console.warn(`[enrich] ${describe(record)}: no address to geocode`);
    stats.geocodeFailed++;
    return { kind: "stop" };
  }

  const key = normalizeAddress(record.rawAddress);
  const cached = ctx.cache.get(key);
  if (cached) {
    stats.cacheHits++;
    record.normalizedAddress = key;
    record.isAmbiguous = false;
    ctx.ambiguousLog.resolve(record.externalId);
    return { kind: "coordinates", coordinates: cached.coordinates };
  }

  const address = record.rawAddress;
  const outcome = await ctx.budget.call("geocoding", () => ctx.maps.geocoder.geocode(address));
  record.normalizedAddress = key;

  switch (outcome.status) {
    case "ok":
      stats.geocoded++;
      record.isAmbiguous = false;
      ctx.ambiguousLog.resolve(record.externalId);
      ctx.cache.set(key, {
        coordinates: outcome.coordinates,
        formattedAddress: outcome.formattedAddress,
      });
      return { kind: "coordinates", coordinates: outcome.coordinates };

    case "ambiguous":
      stats.ambiguous++;
      record.isAmbiguous = true;
      ctx.ambiguousLog.add({
        kind: record.kind,
        externalId: record.externalId,
        title: record.title,
        address: record.rawAddress,
        link: record.link,
        reason: `${outcome.candidates.length} candidate locations`,
        candidates: outcome.candidates,
        loggedAt: ctx.now,
      });
      return { kind: "stop" };

    case "not_found":
      stats.geocodeFailed++;
      console.warn(`[enrich] ${describe(record)}: no geocoding result for "${address}"`);
      return { kind: "stop" };
  }
}

/**
 * Geocode (when needed) and compute the transit time to work for each
 * planned record. Coordinates land on the record only together with the
 * distance; a failed distance call leaves the record as it was.
 */
export async function enrichRecords(
  store: RecordStore,
  work: Array<{ record: ListingRecord; need: "NEEDS_GEOCODE" | "NEEDS_RECOMPUTE" }>,
  ctx: EnrichContext,
  limit?: number
): Promise<EnrichStats> {
  const stats = emptyEnrichStats();
  const batch = limit !== undefined ? work.slice(0, limit) : work;
  if (batch.length < work.length) {
    console.log(`[enrich] ${store.kind}: --limit ${limit}, ${work.length - batch.length} records left for later runs`);
  }

  for (const { need, record: stored } of batch) {
    const record: ListingRecord = { ...stored, nearbyPlaces: { ...stored.nearbyPlaces } };

    try {
      let coordinates: Coordinates | null =
        record.latitude !== null && record.longitude !== null
          ? { lat: record.latitude, lng: record.longitude }
          : null;

      if (need === "NEEDS_GEOCODE" || !coordinates) {
        const step = await geocodeRecord(record, ctx, stats);
        if (step.kind === "stop") {
          if (record.isAmbiguous) {
            // Ambiguous records never keep a distance from an earlier run
            record.latitude = null;
            record.longitude = null;
            record.distanceMinutes = null;
            record.fingerprint = null;
          }
          store.put(record);
          continue;
        }
        coordinates = step.coordinates;
      }

      const from = coordinates;
      const minutes = await ctx.budget.call("distance", () =>
        ctx.maps.distance.travelMinutes(from, ctx.workLocation, "transit")
      );

      record.latitude = from.lat;
      record.longitude = from.lng;
      record.distanceMinutes = minutes;
      record.fingerprint = ctx.fingerprint;
      stats.distanceComputed++;
      // Covers rows fixed by hand (coordinates set, flag cleared)
      ctx.ambiguousLog.resolve(record.externalId);
      store.put(record);
    } catch (err) {
      if (err instanceof BudgetExceededError) {
        stats.skippedForBudget++;
        store.put(record);
      } else if (err instanceof GeocodeFailureError) {
        stats.geocodeFailed++;
        console.warn(`[enrich] ${describe(record)}: ${err.message}, retrying next run`);
      } else if (err instanceof DistanceFailureError) {
        stats.distanceFailed++;
        console.warn(`[enrich] ${describe(record)}: ${err.message}, retrying next run`);
        store.put(record);
      } else {
        throw err;
      }
    }
  }

  console.log(
    `[enrich] ${store.kind}: ${stats.distanceComputed} distances computed, ` +
      `${stats.geocoded} geocoded, ${stats.cacheHits} cache hits, ${stats.ambiguous} ambiguous, ` +
      `${stats.geocodeFailed} geocode failures, ${stats.distanceFailed} distance failures, ` +
      `${stats.skippedForBudget} skipped for budget`
  );
  return stats;
}

export interface PlacesContext {
  maps: MapServices;
  budget: ApiBudget;
  categories: PlaceCategory[];
  radiusMeters: number;
}

function hasTravelTimes(place: NearbyPlace | undefined, category: PlaceCategory): boolean {
  if (!place || place.walkMinutes === null) return false;
  return !category.calculateTransit || place.transitMinutes !== null;
}

/** Nearest hit over all of a category's keywords, one places call per keyword. */
async function searchNearest(
  origin: Coordinates,
  category: PlaceCategory,
  ctx: PlacesContext
): Promise<NearbyPlace | null> {
  let nearest: NearbyPlace | null = null;
  for (const keyword of category.keywords) {
    const hits = await ctx.budget.call("places", () =>
      ctx.maps.places.search(keyword, origin, ctx.radiusMeters)
    );
    for (const hit of hits) {
      const distanceKm = Math.round(haversineKm(origin, hit.location) * 100) / 100;
      if (!nearest || distanceKm < nearest.distanceKm) {
        nearest = {
          name: hit.name,
          distanceKm,
          location: hit.location,
          walkMinutes: null,
          transitMinutes: null,
        };
      }
    }
  }
  return nearest;
}

/**
 * Find the nearest place of each configured category for the given
 * records, with the walking time to it (and the transit time when the
 * category asks for one). Searches go through the places budget, travel
 * times through the distance budget. A stored place with a location is not
 * searched again; only its missing times are filled in.
 */
export async function findNearbyPlaces(
  store: RecordStore,
  records: ListingRecord[],
  ctx: PlacesContext
): Promise<number> {
  let found = 0;
  let timed = 0;
  if (ctx.categories.length === 0) return found;

  for (const stored of records) {
    if (stored.latitude === null || stored.longitude === null) continue;
    const origin: Coordinates = { lat: stored.latitude, lng: stored.longitude };
    const record: ListingRecord = { ...stored, nearbyPlaces: { ...stored.nearbyPlaces } };
    let changed = false;

    for (const category of ctx.categories) {
      const existing = record.nearbyPlaces[category.name];
      if (hasTravelTimes(existing, category)) continue;

      try {
        let place: NearbyPlace | null = existing?.location ? { ...existing } : null;
        if (!place) {
          if (ctx.budget.isBlocked("places")) break;
          place = await searchNearest(origin, category, ctx);
          if (!place) continue;
          found++;
        }
        record.nearbyPlaces[category.name] = place;
        changed = true;

        const destination = place.location;
        if (!destination || ctx.budget.isBlocked("distance")) continue;
        if (place.walkMinutes === null) {
          place.walkMinutes = await ctx.budget.call("distance", () =>
            ctx.maps.distance.travelMinutes(origin, destination, "walking")
          );
          timed++;
        }
        if (category.calculateTransit && place.transitMinutes === null) {
          place.transitMinutes = await ctx.budget.call("distance", () =>
            ctx.maps.distance.travelMinutes(origin, destination, "transit")
          );
          timed++;
        }
      } catch (err) {
        if (err instanceof BudgetExceededError) break;
        console.warn(
          `[places] ${describe(record)} ${category.name}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
    if (changed) store.put(record);
  }

  console.log(`[places] ${store.kind}: ${found} nearby places found, ${timed} travel times computed`);
  return found;
}
