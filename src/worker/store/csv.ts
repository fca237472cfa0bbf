import * as fs from "fs";
import * as path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

export type CsvRow = Record<string, string>;

export interface CsvTable {
  columns: string[];
  rows: CsvRow[];
}

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

/**
 * Pick "," or ";" by counting them in the header line.
 */
export function detectDelimiter(text: string): "," | ";" {
  const header = text.split(/\r?\n/, 1)[0] ?? "";
  const semicolons = header.split(";").length - 1;
  const commas = header.split(",").length - 1;
  return semicolons > commas ? ";" : ",";
}

/**
 * Parse CSV text with a header row. Values stay strings; the caller owns
 * type conversion.
 */
export function parseCsv(text: string, delimiter?: "," | ";"): CsvTable {
  const body = text.replace(/^\ufeff/, "");
  if (body.trim().length === 0) return { columns: [], rows: [] };

  let columns: string[] = [];
  const parsed: unknown = parse(body, {
    delimiter: delimiter ?? detectDelimiter(body),
    columns: (header: string[]) => {
      columns = header.map((h) => h.trim());
      return columns;
    },
    skip_empty_lines: true,
    relax_column_count: true,
    trim: false,
  });

  if (!Array.isArray(parsed)) return { columns, rows: [] };
  return { columns, rows: parsed.filter(isCsvRow) };
}

export function readCsvFile(filePath: string): CsvTable {
  return parseCsv(fs.readFileSync(filePath, "utf-8"));
}

export function formatCsv(columns: string[], rows: CsvRow[]): string {
  return stringify(rows, { header: true, columns });
}

/**
 * Write to a sibling temp file, then rename over the target so a crash
 * never leaves a half-written file.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, content, "utf-8");
  fs.renameSync(tmp, filePath);
}

export function writeCsvFileAtomic(
  filePath: string,
  columns: string[],
  rows: CsvRow[]
): void {
  writeFileAtomic(filePath, formatCsv(columns, rows));
}
