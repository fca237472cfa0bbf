import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { readCsvFile, writeCsvFileAtomic } from "./csv";
import type { CsvRow, CsvTable } from "./csv";
import { StoreCorruptionError } from "@/lib/errors";
import { recordKey } from "@/lib/domain/types";
import type {
  ListingRecord,
  NearbyPlace,
  PropertyKind,
  RecordKey,
} from "@/lib/domain/types";
import { extractExternalId } from "../email/links";

export const CURRENT_SCHEMA_VERSION = 2;

export const STORE_COLUMNS = [
  "title",
  "address",
  "price",
  "size",
  "link",
  "external_id",
  "latitude",
  "longitude",
  "distance_minutes",
  "first_seen_at",
  "last_seen_at",
  "is_ambiguous",
  "normalized_address",
  "fingerprint",
  "nearby_places",
  "schema_version",
] as const;

type StoreColumn = (typeof STORE_COLUMNS)[number];

function isStoreColumn(name: string): name is StoreColumn {
  return STORE_COLUMNS.some((column) => column === name);
}

/** Column names written by version 1 files */
const LEGACY_COLUMNS: Record<string, StoreColumn> = {
  finnkode: "external_id",
  transit_time_work_minutes: "distance_minutes",
  lat: "latitude",
  lng: "longitude",
  url: "link",
};

/** Value a column takes when a row does not carry it */
const COLUMN_DEFAULTS: Record<StoreColumn, string> = {
  title: "",
  address: "",
  price: "",
  size: "",
  link: "",
  external_id: "",
  latitude: "",
  longitude: "",
  distance_minutes: "",
  first_seen_at: "",
  last_seen_at: "",
  is_ambiguous: "false",
  normalized_address: "",
  fingerprint: "",
  nearby_places: "{}",
  schema_version: "1",
};

/** Travel times and location were added after the first v2 files */
const StoredPlaceSchema = z.object({
  name: z.string(),
  distance_km: z.number(),
  lat: z.number().optional(),
  lng: z.number().optional(),
  walk_minutes: z.number().nullable().optional(),
  transit_minutes: z.number().nullable().optional(),
});

type StoredPlace = z.infer<typeof StoredPlaceSchema>;

const NearbyPlacesSchema = z.record(StoredPlaceSchema);

export function storeFileName(kind: PropertyKind): string {
  return `${kind}_listings.csv`;
}

/**
 * Bring a raw row to the current column set. Returns the migrated row and
 * the names of columns that were dropped.
 */
export function migrateRow(raw: CsvRow): { row: Record<StoreColumn, string>; dropped: string[] } {
  const row: Record<StoreColumn, string> = { ...COLUMN_DEFAULTS };
  const dropped: string[] = [];

  const legacy: Array<[StoreColumn, string]> = [];
  const current: Array<[StoreColumn, string]> = [];

  for (const [name, value] of Object.entries(raw)) {
    const key = name.trim().toLowerCase();
    if (isStoreColumn(key)) {
      current.push([key, value]);
    } else if (LEGACY_COLUMNS[key]) {
      legacy.push([LEGACY_COLUMNS[key], value]);
    } else {
      dropped.push(name);
    }
  }

  // Current names win over legacy ones when a file has both
  for (const [column, value] of [...legacy, ...current]) {
    row[column] = value.trim();
  }

  return { row, dropped };
}

function optional(value: string): string | null {
  return value.length > 0 ? value : null;
}

function parseNumber(value: string, column: string, where: string): number | null {
  if (!value) return null;
  const n = Number(value.replace(",", "."));
  if (!Number.isFinite(n)) {
    throw new StoreCorruptionError(where, `${column} is not a number: "${value}"`);
  }
  return n;
}

function parseDate(value: string, column: string, where: string): Date | null {
  if (!value) return null;
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) {
    throw new StoreCorruptionError(where, `${column} is not a timestamp: "${value}"`);
  }
  return d;
}

function parseBool(value: string, where: string): boolean {
  switch (value.toLowerCase()) {
    case "":
    case "false":
    case "0":
    case "no":
      return false;
    case "true":
    case "1":
    case "yes":
      return true;
    default:
      throw new StoreCorruptionError(where, `is_ambiguous is not a boolean: "${value}"`);
  }
}

function parseNearbyPlaces(value: string, where: string): Record<string, NearbyPlace> {
  let json: unknown;
  try {
    json = JSON.parse(value || "{}");
  } catch {
    throw new StoreCorruptionError(where, `nearby_places is not JSON: "${value}"`);
  }
  const result = NearbyPlacesSchema.safeParse(json);
  if (!result.success) {
    throw new StoreCorruptionError(where, "nearby_places has an unexpected shape");
  }
  const places: Record<string, NearbyPlace> = {};
  for (const [category, place] of Object.entries(result.data)) {
    places[category] = {
      name: place.name,
      distanceKm: place.distance_km,
      location:
        place.lat !== undefined && place.lng !== undefined
          ? { lat: place.lat, lng: place.lng }
          : null,
      walkMinutes: place.walk_minutes ?? null,
      transitMinutes: place.transit_minutes ?? null,
    };
  }
  return places;
}

/**
 * Convert one migrated row into a record. `fallbackSeenAt` stands in for
 * timestamps that version 1 files did not write.
 */
export function rowToRecord(
  row: Record<StoreColumn, string>,
  kind: PropertyKind,
  where: string,
  fallbackSeenAt: Date
): ListingRecord {
  const version = parseNumber(row.schema_version, "schema_version", where) ?? 1;
  if (version > CURRENT_SCHEMA_VERSION) {
    throw new StoreCorruptionError(
      where,
      `schema_version ${version} is newer than supported (${CURRENT_SCHEMA_VERSION})`
    );
  }

  const link = row.link;
  const externalId = optional(row.external_id) ?? (link ? extractExternalId(link) : null);
  if (!externalId) {
    throw new StoreCorruptionError(where, "row has no external_id and no link to derive one from");
  }

  const firstSeenAt =
    parseDate(row.first_seen_at, "first_seen_at", where) ??
    parseDate(row.last_seen_at, "last_seen_at", where) ??
    fallbackSeenAt;
  const lastSeenAt = parseDate(row.last_seen_at, "last_seen_at", where) ?? firstSeenAt;

  return {
    kind,
    externalId,
    title: optional(row.title),
    rawAddress: optional(row.address),
    normalizedAddress: optional(row.normalized_address),
    latitude: parseNumber(row.latitude, "latitude", where),
    longitude: parseNumber(row.longitude, "longitude", where),
    price: optional(row.price),
    size: optional(row.size),
    link,
    distanceMinutes: parseNumber(row.distance_minutes, "distance_minutes", where),
    fingerprint: optional(row.fingerprint),
    nearbyPlaces: parseNearbyPlaces(row.nearby_places, where),
    firstSeenAt,
    lastSeenAt,
    isAmbiguous: parseBool(row.is_ambiguous, where),
  };
}

function numberCell(n: number | null): string {
  return n === null ? "" : String(n);
}

export function recordToRow(record: ListingRecord): Record<StoreColumn, string> {
  const places: Record<string, StoredPlace> = {};
  for (const [category, place] of Object.entries(record.nearbyPlaces)) {
    places[category] = {
      name: place.name,
      distance_km: place.distanceKm,
      ...(place.location ? { lat: place.location.lat, lng: place.location.lng } : {}),
      walk_minutes: place.walkMinutes,
      transit_minutes: place.transitMinutes,
    };
  }

  return {
    title: record.title ?? "",
    address: record.rawAddress ?? "",
    price: record.price ?? "",
    size: record.size ?? "",
    link: record.link,
    external_id: record.externalId,
    latitude: numberCell(record.latitude),
    longitude: numberCell(record.longitude),
    distance_minutes: numberCell(record.distanceMinutes),
    first_seen_at: record.firstSeenAt.toISOString(),
    last_seen_at: record.lastSeenAt.toISOString(),
    is_ambiguous: record.isAmbiguous ? "true" : "false",
    normalized_address: record.normalizedAddress ?? "",
    fingerprint: record.fingerprint ?? "",
    nearby_places: JSON.stringify(places),
    schema_version: String(CURRENT_SCHEMA_VERSION),
  };
}

/**
 * One partition of the record set, keyed by (kind, externalId). Loaded
 * whole at the start of a run, mutated in memory and written back in one
 * atomic replace.
 */
export class RecordStore {
  private readonly records = new Map<RecordKey, ListingRecord>();

  private constructor(
    readonly kind: PropertyKind,
    readonly filePath: string
  ) {}

  static empty(kind: PropertyKind, dataDir: string): RecordStore {
    return new RecordStore(kind, path.join(dataDir, storeFileName(kind)));
  }

  /**
   * Load the partition file. A missing file is an empty store; anything
   * unreadable throws StoreCorruptionError.
   */
  static load(kind: PropertyKind, dataDir: string): RecordStore {
    const store = RecordStore.empty(kind, dataDir);
    if (!fs.existsSync(store.filePath)) {
      console.log(`[store] ${kind}: no store at ${store.filePath}, starting empty`);
      return store;
    }

    let table: CsvTable;
    let fileTime: Date;
    try {
      table = readCsvFile(store.filePath);
      fileTime = fs.statSync(store.filePath).mtime;
    } catch (err) {
      throw new StoreCorruptionError(
        store.filePath,
        err instanceof Error ? err.message : String(err)
      );
    }

    const dropped = new Set<string>();
    let migrated = 0;

    table.rows.forEach((raw, i) => {
      const where = `${store.filePath} row ${i + 2}`;
      const { row, dropped: droppedHere } = migrateRow(raw);
      droppedHere.forEach((c) => dropped.add(c));
      if (row.schema_version !== String(CURRENT_SCHEMA_VERSION)) migrated++;

      const record = rowToRecord(row, kind, where, fileTime);
      const key = recordKey(kind, record.externalId);
      if (store.records.has(key)) {
        throw new StoreCorruptionError(where, `duplicate external_id ${record.externalId}`);
      }
      store.records.set(key, record);
    });

    if (dropped.size > 0) {
      console.warn(`[store] ${kind}: dropping unknown columns: ${[...dropped].join(", ")}`);
    }
    if (migrated > 0) {
      console.log(`[store] ${kind}: migrated ${migrated} rows to schema v${CURRENT_SCHEMA_VERSION}`);
    }
    console.log(`[store] ${kind}: loaded ${store.records.size} records`);
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  get(externalId: string): ListingRecord | undefined {
    return this.records.get(recordKey(this.kind, externalId));
  }

  has(externalId: string): boolean {
    return this.records.has(recordKey(this.kind, externalId));
  }

  /** Insert or replace. Records of the other kind are rejected. */
  put(record: ListingRecord): void {
    if (record.kind !== this.kind) {
      throw new Error(
        `[store] refusing ${record.kind} record ${record.externalId} in the ${this.kind} store`
      );
    }
    this.records.set(recordKey(record.kind, record.externalId), record);
  }

  all(): ListingRecord[] {
    return [...this.records.values()];
  }

  save(): void {
    const rows = this.all()
      .sort((a, b) => a.firstSeenAt.getTime() - b.firstSeenAt.getTime())
      .map(recordToRow);
    writeCsvFileAtomic(this.filePath, [...STORE_COLUMNS], rows);
    console.log(`[store] ${this.kind}: saved ${rows.length} records to ${this.filePath}`);
  }
}
