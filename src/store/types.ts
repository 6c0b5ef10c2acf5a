import type { OutcomeRecord } from "../types";

/**
 * The four output collections, by the file name they are stored under.
 */
export enum RecordCollection {
  /** Probed UP */
  GoodResponses = "good_response_urls",
  /** Probed DOWN */
  BadResponses = "bad_response_urls",
  /** Captured */
  Captured = "output_urls",
  /** Capture failed */
  CaptureFailed = "screenshot_failed_urls",
}

/** Column order of every collection file */
export const RECORD_COLUMNS = [
  "id",
  "url",
  "display_name",
  "status_code",
  "artifact_path",
  "error",
  "classification",
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

/** A parsed CSV row, keyed by header */
export type CsvRow = Record<string, string>;

/**
 * Persistence of outcome records. Appending never rewrites earlier records.
 */
export interface RecordStore {
  /**
   * Appends `records` to `collection`. Returns where they were written, or
   * `null` when there was nothing to write.
   */
  append(collection: RecordCollection, records: readonly OutcomeRecord[]): Promise<string | null>;
  load(collection: RecordCollection): Promise<OutcomeRecord[]>;
  /** Ids present in any of `collections` */
  recordedIds(collections: readonly RecordCollection[]): Promise<Set<string>>;
}
