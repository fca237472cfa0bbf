import * as fs from "fs";
import * as path from "path";
import { readCsvFile, writeCsvFileAtomic } from "./csv";
import type { CsvRow } from "./csv";
import { StoreCorruptionError } from "@/lib/errors";
import type { AmbiguousAddressEntry, PropertyKind } from "@/lib/domain/types";

const COLUMNS = [
  "external_id",
  "title",
  "address",
  "link",
  "reason",
  "candidates",
  "logged_at",
];

function toRow(entry: AmbiguousAddressEntry): CsvRow {
  return {
    external_id: entry.externalId,
    title: entry.title ?? "",
    address: entry.address ?? "",
    link: entry.link,
    reason: entry.reason,
    candidates: entry.candidates
      .map((c) => `${c.lat},${c.lng}${c.formattedAddress ? ` (${c.formattedAddress})` : ""}`)
      .join(" | "),
    logged_at: entry.loggedAt.toISOString(),
  };
}

/**
 * Addresses waiting for manual review, one row per listing. Re-logging a
 * listing replaces its row; a listing that geocodes cleanly later is removed.
 */
export class AmbiguousAddressLog {
  private readonly rows = new Map<string, CsvRow>();
  private dirty = false;

  private constructor(
    readonly kind: PropertyKind,
    readonly filePath: string
  ) {}

  static load(kind: PropertyKind, dataDir: string): AmbiguousAddressLog {
    const log = new AmbiguousAddressLog(
      kind,
      path.join(dataDir, `${kind}_ambiguous_addresses.csv`)
    );
    if (!fs.existsSync(log.filePath)) return log;

    try {
      for (const row of readCsvFile(log.filePath).rows) {
        if (row.external_id) log.rows.set(row.external_id, row);
      }
    } catch (err) {
      throw new StoreCorruptionError(
        log.filePath,
        err instanceof Error ? err.message : String(err)
      );
    }
    return log;
  }

  add(entry: AmbiguousAddressEntry): void {
    this.rows.set(entry.externalId, toRow(entry));
    this.dirty = true;
    console.warn(
      `[review] ${this.kind} ${entry.externalId} "${entry.address ?? entry.title ?? entry.link}": ${entry.reason}`
    );
  }

  /** Drop a listing whose address now resolves to a single location. */
  resolve(externalId: string): void {
    if (!this.rows.delete(externalId)) return;
    this.dirty = true;
    console.log(`[review] ${this.kind} ${externalId}: address resolved, removed from review`);
  }

  save(): void {
    if (!this.dirty) return;
    writeCsvFileAtomic(this.filePath, COLUMNS, [...this.rows.values()]);
    this.dirty = false;
  }
}
