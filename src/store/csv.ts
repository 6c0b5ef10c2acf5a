import { Readable } from "node:stream";
import csv from "csv-parser";
import type { CsvRow } from "./types";

const isCsvRow = (value: unknown): value is CsvRow =>
  typeof value === "object" &&
  value !== null &&
  Object.values(value).every((cell) => typeof cell === "string");

/**
 * Parses CSV text with a header line into rows keyed by the trimmed headers.
 */
export async function parseCsv(text: string): Promise<CsvRow[]> {
  const rows: CsvRow[] = [];
  const parser = Readable.from([text.replace(/^\uFEFF/, "")]).pipe(
    csv({ mapHeaders: ({ header }) => header.trim() }),
  );
  for await (const chunk of parser) {
    const row: unknown = chunk;
    if (isCsvRow(row)) {
      rows.push(row);
    }
  }
  return rows;
}

const escapeCell = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

/**
 * Renders one CSV line, quoting cells that need it. No line terminator.
 */
export function formatCsvLine(values: readonly string[]): string {
  return values.map(escapeCell).join(",");
}
