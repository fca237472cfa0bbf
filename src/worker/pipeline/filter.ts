import { parseAmount } from "../html/parse";
import type { KindFilter, PlaceCategory } from "@/lib/config";
import type { ListingRecord } from "@/lib/domain/types";

export interface FilterOptions {
  fingerprint: string;
  maxCommuteMinutes: number;
  filter?: KindFilter;
  /** Categories with max_walk_minutes reject records beyond that walk */
  placeCategories?: PlaceCategory[];
}

/** Why a record is left out, or null when it is kept. */
export function rejectionReason(record: ListingRecord, opts: FilterOptions): string | null {
  if (record.isAmbiguous) return "ambiguous address";
  if (record.distanceMinutes === null) return "no commute time";
  if (record.fingerprint !== opts.fingerprint) return "commute time from old settings";
  if (record.distanceMinutes > opts.maxCommuteMinutes) return "commute too long";

  const price = parseAmount(record.price);
  if (opts.filter?.maxPrice !== undefined && price !== null && price > opts.filter.maxPrice) {
    return "price above max_price";
  }
  const size = parseAmount(record.size);
  if (opts.filter?.minSizeSqm !== undefined && size !== null && size < opts.filter.minSizeSqm) {
    return "size below min_size_sqm";
  }

  for (const category of opts.placeCategories ?? []) {
    if (category.maxWalkMinutes === undefined) continue;
    const walk = record.nearbyPlaces[category.name]?.walkMinutes ?? null;
    if (walk === null) return `no walking time to ${category.name}`;
    if (walk > category.maxWalkMinutes) {
      return `${category.name} more than ${category.maxWalkMinutes} min walk`;
    }
  }
  return null;
}

/**
 * Records within the commute limit and the kind's price/size bounds,
 * shortest commute first.
 */
export function filterRecords(records: ListingRecord[], opts: FilterOptions): ListingRecord[] {
  return records
    .filter((r) => rejectionReason(r, opts) === null)
    .sort(
      (a, b) =>
        (a.distanceMinutes ?? Infinity) - (b.distanceMinutes ?? Infinity) ||
        a.externalId.localeCompare(b.externalId)
    );
}
