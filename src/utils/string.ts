/**
 * Thoroughly removes all types of whitespace characters from both ends of a string.
 * Handles spaces, tabs, line breaks, and carriage returns.
 */
export const fullTrim = (str: string): string => {
  return str.replace(/^[\s\r\n\t]+|[\s\r\n\t]+$/g, "");
};

const MAX_FILENAME_LENGTH = 200;

/**
 * Makes a string safe to use as a single path segment on any common filesystem.
 * Anything other than letters, digits, `.`, `_` and `-` becomes `_`, runs of `_`
 * collapse, and leading/trailing dots and underscores are dropped.
 */
export function sanitizeFilename(value: string): string {
  const sanitized = fullTrim(value)
    .replace(/[^A-Za-z0-9._-]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^[._]+|[._]+$/g, "")
    .slice(0, MAX_FILENAME_LENGTH);
  return sanitized || "untitled";
}
