/**
 * One front page to probe and screenshot.
 */
export interface Target {
  /** Content-derived fingerprint, see `makeTargetId` */
  readonly id: string;
  readonly url: string;
  readonly displayName: string;
}

/**
 * Classification of a target after a phase.
 * UP/DOWN come from probing, SUCCESS/FAILURE from capturing.
 */
export enum Classification {
  Up = "UP",
  Down = "DOWN",
  Success = "SUCCESS",
  Failure = "FAILURE",
}

/** Error field value of a record that carries no error */
export const NO_ERROR = "NA";

/**
 * Result of one phase for one target. Created once, never mutated.
 */
export interface OutcomeRecord {
  readonly id: string;
  readonly url: string;
  readonly displayName: string;
  /** HTTP status obtained, if any */
  readonly statusCode: number | null;
  /** Path of the captured screenshot, set only on SUCCESS */
  readonly artifactPath: string | null;
  /** Description of what went wrong, or `NO_ERROR` */
  readonly error: string;
  readonly classification: Classification;
}

/**
 * Builds a record for a target, keeping its identifying fields.
 */
export function createOutcomeRecord(
  target: Target,
  classification: Classification,
  details: { statusCode?: number | null; artifactPath?: string | null; error?: string } = {},
): OutcomeRecord {
  return Object.freeze({
    id: target.id,
    url: target.url,
    displayName: target.displayName,
    statusCode: details.statusCode ?? null,
    artifactPath: details.artifactPath ?? null,
    error: details.error ?? NO_ERROR,
    classification,
  });
}

/**
 * Generic progress callback type
 */
export type ProgressCallback<T> = (progress: T) => void | Promise<void>;
