import * as path from "path";
import { writeCsvFileAtomic } from "../store/csv";
import type { CsvRow } from "../store/csv";
import type { PlaceCategory } from "@/lib/config";
import type { ListingRecord, PropertyKind } from "@/lib/domain/types";

const BASE_COLUMNS = [
  "title",
  "address",
  "price",
  "size",
  "link",
  "external_id",
  "distance_minutes",
  "latitude",
  "longitude",
  "first_seen_at",
];

export function filteredFileName(kind: PropertyKind): string {
  return `${kind}_listings_filtered.csv`;
}

export function outputColumns(categories: PlaceCategory[]): string[] {
  return [
    ...BASE_COLUMNS,
    ...categories.flatMap((c) => [
      `nearest_${c.name}`,
      `nearest_${c.name}_km`,
      `nearest_${c.name}_walk_min`,
      ...(c.calculateTransit ? [`nearest_${c.name}_transit_min`] : []),
    ]),
  ];
}

function minutesCell(minutes: number | null | undefined): string {
  return minutes === null || minutes === undefined ? "" : String(minutes);
}

function toOutputRow(record: ListingRecord, categories: PlaceCategory[]): CsvRow {
  const row: CsvRow = {
    title: record.title ?? "",
    address: record.rawAddress ?? "",
    price: record.price ?? "",
    size: record.size ?? "",
    link: record.link,
    external_id: record.externalId,
    distance_minutes: record.distanceMinutes === null ? "" : String(record.distanceMinutes),
    latitude: record.latitude === null ? "" : String(record.latitude),
    longitude: record.longitude === null ? "" : String(record.longitude),
    first_seen_at: record.firstSeenAt.toISOString(),
  };
  for (const c of categories) {
    const place = record.nearbyPlaces[c.name];
    row[`nearest_${c.name}`] = place?.name ?? "";
    row[`nearest_${c.name}_km`] = place ? String(place.distanceKm) : "";
    row[`nearest_${c.name}_walk_min`] = minutesCell(place?.walkMinutes);
    if (c.calculateTransit) row[`nearest_${c.name}_transit_min`] = minutesCell(place?.transitMinutes);
  }
  return row;
}

/**
 * Write the filtered listings of one kind. Returns the file path.
 */
export function writeFilteredListings(
  outputDir: string,
  kind: PropertyKind,
  records: ListingRecord[],
  categories: PlaceCategory[]
): string {
  const filePath = path.join(outputDir, filteredFileName(kind));
  writeCsvFileAtomic(
    filePath,
    outputColumns(categories),
    records.map((r) => toOutputRow(r, categories))
  );
  console.log(`[output] ${kind}: wrote ${records.length} listings to ${filePath}`);
  return filePath;
}
