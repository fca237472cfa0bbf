import * as fs from "fs";
import * as path from "path";
import { readCsvFile, writeCsvFileAtomic } from "./csv";
import type { CsvRow } from "./csv";
import { StoreCorruptionError } from "@/lib/errors";
import type { Coordinates } from "@/lib/domain/types";

export interface CachedGeocode {
  coordinates: Coordinates;
  formattedAddress: string | null;
}

const COLUMNS = ["normalized_address", "latitude", "longitude", "formatted_address"];

/**
 * Address -> coordinates, shared by both partitions. Only single-candidate
 * answers are stored, so a hit is always usable as-is.
 */
export class GeocodeCache {
  private readonly entries = new Map<string, CachedGeocode>();
  private dirty = false;

  private constructor(readonly filePath: string) {}

  static load(dataDir: string): GeocodeCache {
    const cache = new GeocodeCache(path.join(dataDir, "geocode_cache.csv"));
    if (!fs.existsSync(cache.filePath)) return cache;

    let rows: CsvRow[];
    try {
      rows = readCsvFile(cache.filePath).rows;
    } catch (err) {
      throw new StoreCorruptionError(
        cache.filePath,
        err instanceof Error ? err.message : String(err)
      );
    }

    rows.forEach((row, i) => {
      const lat = Number(row.latitude);
      const lng = Number(row.longitude);
      if (!row.normalized_address || !row.latitude || !row.longitude || !Number.isFinite(lat) || !Number.isFinite(lng)) {
        throw new StoreCorruptionError(cache.filePath, `row ${i + 2} is not a usable cache entry`);
      }
      cache.entries.set(row.normalized_address, {
        coordinates: { lat, lng },
        formattedAddress: row.formatted_address || null,
      });
    });
    return cache;
  }

  get(normalizedAddress: string): CachedGeocode | undefined {
    return this.entries.get(normalizedAddress);
  }

  set(normalizedAddress: string, value: CachedGeocode): void {
    this.entries.set(normalizedAddress, value);
    this.dirty = true;
  }

  save(): void {
    if (!this.dirty) return;
    const rows = [...this.entries].map(([address, entry]) => ({
      normalized_address: address,
      latitude: String(entry.coordinates.lat),
      longitude: String(entry.coordinates.lng),
      formatted_address: entry.formattedAddress ?? "",
    }));
    writeCsvFileAtomic(this.filePath, COLUMNS, rows);
    this.dirty = false;
  }
}
