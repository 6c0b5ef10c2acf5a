import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { Target } from "../types";
import { makeTargetId } from "../utils/fingerprint";
import type { Logger } from "../utils/logger";
import { parseCsv } from "./csv";
import { InputFormatError } from "./errors";
import type { CsvRow } from "./types";

const hostOf = (url: string): string => {
  try {
    return new URL(url).host || url;
  } catch {
    return url;
  }
};

/**
 * Turns the rows of one input file into targets.
 * Rows need a `url`; `display_name` defaults to the URL's host and `id` to the
 * fingerprint of url and display name.
 */
export function rowsToTargets(rows: readonly CsvRow[], source: string, logger: Logger): Target[] {
  if (rows.length > 0 && !rows.some((row) => "url" in row)) {
    throw new InputFormatError(source, 'missing required column "url"');
  }

  const targets: Target[] = [];
  rows.forEach((row, i) => {
    const url = row.url?.trim() ?? "";
    if (!url) {
      logger.warn(`⚠️ Skipping row ${i + 2} of ${source}: no URL`);
      return;
    }
    const displayName = row.display_name?.trim() || hostOf(url);
    const id = row.id?.trim() || makeTargetId(url, displayName);
    targets.push(Object.freeze({ id, url, displayName }));
  });
  return targets;
}

async function inputFiles(inputPath: string): Promise<string[]> {
  let stats: Stats;
  try {
    stats = await fs.stat(inputPath);
  } catch (error) {
    throw new InputFormatError(inputPath, `not found (${error})`);
  }
  if (!stats.isDirectory()) {
    return [inputPath];
  }
  const entries = await fs.readdir(inputPath);
  return entries
    .filter((entry) => entry.toLowerCase().endsWith(".csv"))
    .sort()
    .map((entry) => path.join(inputPath, entry));
}

/**
 * Loads targets from a CSV file, or from every `.csv` file in a directory in
 * name order. Targets with an id seen before are dropped.
 * @throws {InputFormatError} If the input does not exist or lacks a `url` column
 */
export async function loadTargets(inputPath: string, logger: Logger): Promise<Target[]> {
  const files = await inputFiles(inputPath);
  if (files.length === 0) {
    logger.warn(`⚠️ No CSV files found in ${inputPath}`);
    return [];
  }

  const seen = new Set<string>();
  const targets: Target[] = [];
  for (const file of files) {
    const rows = await parseCsv(await fs.readFile(file, "utf-8"));
    for (const target of rowsToTargets(rows, file, logger)) {
      if (seen.has(target.id)) {
        logger.debug(`Dropping duplicate target ${target.id} (${target.url})`);
        continue;
      }
      seen.add(target.id);
      targets.push(target);
    }
  }
  logger.info(`📋 Loaded ${targets.length} target(s) from ${files.length} file(s)`);
  return targets;
}
