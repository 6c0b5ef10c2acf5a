import path from "node:path";
import { SCREENSHOT_PREFIX } from "../config";
import { Classification, type OutcomeRecord, type Target, createOutcomeRecord } from "../types";
import { sanitizeFilename } from "../utils/string";
import { siteDirectoryName } from "../utils/url";
import type { CaptureStrategy } from "./types";

const URL_LIKE = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Coerces a screenshot file name to a `.jpeg` name carrying `prefix`.
 *
 * - `shot.jpeg` is kept as is
 * - a URL becomes its last path segment: `https://a.test/x/home` -> `home.jpeg`
 * - any other extension is replaced: `shot.png` -> `shot.jpeg`
 */
export function normalizeScreenshotFilename(filename: string, prefix = SCREENSHOT_PREFIX): string {
  let name = filename;
  if (!name.toLowerCase().endsWith(".jpeg")) {
    if (URL_LIKE.test(name)) {
      const segment = new URL(name).pathname.split("/").at(-1) ?? "";
      name = `${sanitizeFilename(segment)}.jpeg`;
    } else {
      const extension = path.extname(name);
      name = `${extension ? name.slice(0, -extension.length) : name}.jpeg`;
    }
  }
  return prefix ? `${prefix}_${name}` : name;
}

/**
 * Full-page screenshot of a site's front page, filed under the site's host.
 */
export class FrontPageStrategy implements CaptureStrategy {
  readonly name = "front-page";

  constructor(
    private readonly screenshotDir: string,
    private readonly prefix = SCREENSHOT_PREFIX,
  ) {}

  artifactPath(target: Target): string {
    const filename = `${sanitizeFilename(`${target.displayName}_${target.id}`)}.jpeg`;
    return path.join(
      this.screenshotDir,
      siteDirectoryName(target.url),
      normalizeScreenshotFilename(filename, this.prefix),
    );
  }

  success(target: Target, artifactPath: string, statusCode: number | null): OutcomeRecord {
    return createOutcomeRecord(target, Classification.Success, { artifactPath, statusCode });
  }

  failure(target: Target, error: string, statusCode: number | null = null): OutcomeRecord {
    return createOutcomeRecord(target, Classification.Failure, { error, statusCode });
  }
}
