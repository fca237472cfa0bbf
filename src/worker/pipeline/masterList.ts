import * as fs from "fs";
import { readCsvFile } from "../store/csv";
import type { CsvRow } from "../store/csv";
import {
  kindFromLink,
  listingIdFor,
  resolveListingLink,
} from "../email/links";
import { parseArea, parsePrice } from "../html/parse";
import { cleanText } from "@/lib/domain/normalize";
import { StoreCorruptionError } from "@/lib/errors";
import type { Observation, PropertyKind } from "@/lib/domain/types";

/** Accepted header names per field, compared lowercased */
const HEADER_ALIASES = {
  title: ["title", "tittel"],
  address: ["address", "adresse"],
  price: ["price", "pris"],
  size: ["size", "størrelse", "area"],
  link: ["url", "link", "lenke"],
  externalId: ["finnkode", "external_id", "id"],
} as const;

type MasterField = keyof typeof HEADER_ALIASES;

function pick(row: CsvRow, field: MasterField): string | null {
  const aliases: readonly string[] = HEADER_ALIASES[field];
  for (const [name, value] of Object.entries(row)) {
    if (aliases.includes(name.trim().toLowerCase())) {
      const text = cleanText(value);
      if (text) return text;
    }
  }
  return null;
}

/**
 * Normalize a free-form cell to the same shape the email extractor
 * produces ("3200 kr", "45 m²"). Cells without a recognizable unit are
 * kept as written.
 */
function normalizeAmount(
  value: string | null,
  parse: (text: string) => string | null
): string | null {
  if (!value) return null;
  return parse(value) ?? value;
}

/**
 * Read a curated listing file into observations. Every row is observed at
 * the file's modification time. Rows without a usable link are skipped.
 */
export function readMasterList(filePath: string, kind: PropertyKind): Observation[] {
  if (!fs.existsSync(filePath)) {
    console.warn(`[master] ${kind}: master list ${filePath} not found, skipping`);
    return [];
  }

  let rows: CsvRow[];
  let observedAt: Date;
  try {
    rows = readCsvFile(filePath).rows;
    observedAt = fs.statSync(filePath).mtime;
  } catch (err) {
    throw new StoreCorruptionError(filePath, err instanceof Error ? err.message : String(err));
  }

  const observations: Observation[] = [];
  rows.forEach((row, i) => {
    const origin = `${filePath}:${i + 2}`;
    const href = pick(row, "link");
    if (!href) {
      console.warn(`[master] ${origin}: row has no URL, skipped`);
      return;
    }

    const resolved = resolveListingLink(href);
    const { link } = resolved;
    const linkKind = kindFromLink(link);
    if (linkKind && linkKind !== kind) {
      console.warn(`[master] ${origin}: ${linkKind} listing in the ${kind} master list, skipped`);
      return;
    }

    const externalId = pick(row, "externalId") ?? listingIdFor(resolved);

    observations.push({
      draft: {
        kind,
        externalId,
        title: pick(row, "title"),
        rawAddress: pick(row, "address"),
        price: normalizeAmount(pick(row, "price"), parsePrice),
        size: normalizeAmount(pick(row, "size"), parseArea),
        link,
      },
      source: "master_list",
      origin,
      observedAt,
    });
  });

  console.log(`[master] ${kind}: ${observations.length} of ${rows.length} rows read from ${filePath}`);
  return observations;
}
