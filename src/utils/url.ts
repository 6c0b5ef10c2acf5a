import { InvalidUrlError } from "./errors";
import { sanitizeFilename } from "./string";

/**
 * Validates if a string is a valid URL
 * @throws {InvalidUrlError} If the URL is invalid
 */
export function validateUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (error) {
    throw new InvalidUrlError(url, error instanceof Error ? error : undefined);
  }
}

/**
 * Returns the origin (`scheme://host[:port]`) a URL belongs to.
 * @throws {InvalidUrlError} If the URL is invalid or has no network origin
 */
export function getSiteOrigin(url: string): string {
  const parsed = validateUrl(url);
  if (parsed.origin === "null") {
    throw new InvalidUrlError(url);
  }
  return parsed.origin;
}

/**
 * Location of the robots exclusion file for an origin.
 */
export function policyUrlFor(origin: string): string {
  return new URL("/robots.txt", origin).href;
}

/**
 * Filesystem-safe name for a site, used for its screenshot directory and policy cache file.
 * Example: `https://www.example.com:8443` -> `www.example.com_8443`
 */
export function siteDirectoryName(urlOrOrigin: string): string {
  return sanitizeFilename(validateUrl(urlOrOrigin).host);
}

