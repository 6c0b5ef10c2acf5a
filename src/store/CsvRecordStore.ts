import fs from "node:fs/promises";
import path from "node:path";
import { Classification, type OutcomeRecord } from "../types";
import type { Logger } from "../utils/logger";
import { formatCsvLine, parseCsv } from "./csv";
import { StoreError } from "./errors";
import { type CsvRow, RECORD_COLUMNS, type RecordCollection, type RecordStore } from "./types";

const CLASSIFICATIONS = new Set<string>(Object.values(Classification));

const isClassification = (value: string): value is Classification => CLASSIFICATIONS.has(value);

function recordToCells(record: OutcomeRecord): string[] {
  return [
    record.id,
    record.url,
    record.displayName,
    record.statusCode === null ? "" : String(record.statusCode),
    record.artifactPath ?? "",
    record.error,
    record.classification,
  ];
}

function rowToRecord(row: CsvRow): OutcomeRecord | null {
  const classification = row.classification ?? "";
  if (!row.id || !row.url || !isClassification(classification)) {
    return null;
  }
  const statusCode = row.status_code ? Number.parseInt(row.status_code, 10) : Number.NaN;
  return Object.freeze({
    id: row.id,
    url: row.url,
    displayName: row.display_name ?? "",
    statusCode: Number.isNaN(statusCode) ? null : statusCode,
    artifactPath: row.artifact_path || null,
    error: row.error ?? "",
    classification,
  });
}

/**
 * Keeps each collection as a CSV file under `<outputDir>/csv/`.
 */
export class CsvRecordStore implements RecordStore {
  readonly directory: string;

  constructor(
    outputDir: string,
    private readonly logger: Logger,
  ) {
    this.directory = path.join(outputDir, "csv");
  }

  pathFor(collection: RecordCollection): string {
    return path.join(this.directory, `${collection}.csv`);
  }

  async append(
    collection: RecordCollection,
    records: readonly OutcomeRecord[],
  ): Promise<string | null> {
    if (records.length === 0) {
      this.logger.debug(`No ${collection} records to save`);
      return null;
    }

    const file = this.pathFor(collection);
    const exists = await this.exists(file);
    if (exists) {
      this.logger.warn(`⚠️ ${file} already exists, appending ${records.length} record(s)`);
    }

    const lines = records.map((record) => formatCsvLine(recordToCells(record)));
    if (!exists) {
      lines.unshift(formatCsvLine(RECORD_COLUMNS));
    }

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.appendFile(file, `${lines.join("\n")}\n`, "utf-8");
    } catch (error) {
      throw new StoreError(`Failed to save ${collection} records to ${file}`, error);
    }
    this.logger.info(`💾 Saved ${records.length} record(s) to ${file}`);
    return file;
  }

  async load(collection: RecordCollection): Promise<OutcomeRecord[]> {
    const file = this.pathFor(collection);
    if (!(await this.exists(file))) {
      return [];
    }

    let text: string;
    try {
      text = await fs.readFile(file, "utf-8");
    } catch (error) {
      throw new StoreError(`Failed to read ${file}`, error);
    }

    const records: OutcomeRecord[] = [];
    const rows = await parseCsv(text);
    rows.forEach((row, i) => {
      const record = rowToRecord(row);
      if (record) {
        records.push(record);
      } else {
        // Header is line 1
        this.logger.warn(`⚠️ Ignoring malformed row ${i + 2} in ${file}`);
      }
    });
    return records;
  }

  async recordedIds(collections: readonly RecordCollection[]): Promise<Set<string>> {
    const ids = new Set<string>();
    for (const collection of collections) {
      for (const record of await this.load(collection)) {
        ids.add(record.id);
      }
    }
    return ids;
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  }
}
