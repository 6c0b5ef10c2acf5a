import type { OutcomeRecord, Target } from "../types";

/**
 * What to capture for a target and how to record the outcome. The capturer
 * supplies the browsing capability; the strategy supplies everything specific
 * to the kind of capture.
 */
export interface CaptureStrategy {
  readonly name: string;
  /** Where the artifact for `target` is written */
  artifactPath(target: Target): string;
  success(target: Target, artifactPath: string, statusCode: number | null): OutcomeRecord;
  failure(target: Target, error: string, statusCode?: number | null): OutcomeRecord;
}

export interface ScreenshotCapturerOptions {
  /** Identity checked against robots.txt and sent as the user agent */
  userAgent: string;
  navigationTimeoutMs: number;
  maxNavigationAttempts: number;
}
