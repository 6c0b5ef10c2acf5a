import { createHash } from "node:crypto";

/**
 * Stable identifier for a target, derived from its URL followed by its display name.
 * The same pair always yields the same id, which is what lets a later run skip
 * targets an earlier run already recorded.
 */
export function makeTargetId(url: string, displayName: string): string {
  return createHash("sha256").update(url).update(displayName).digest("hex");
}
