import type { LimiterProgress } from "../limiter/types";
import type { OutcomeRecord, ProgressCallback, Target } from "../types";

/**
 * How a pipeline run ended.
 */
export enum PipelineRunStatus {
  COMPLETED = "completed",
  /** Every target was already recorded, or none was live */
  NOTHING_TO_PROCESS = "nothing-to-process",
  CANCELLED = "cancelled",
}

export interface PipelineSummary {
  status: PipelineRunStatus;
  /** Targets dropped because an earlier run recorded them */
  skipped: number;
  up: OutcomeRecord[];
  down: OutcomeRecord[];
  success: OutcomeRecord[];
  failure: OutcomeRecord[];
  durationMs: number;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
  /** Progress of whichever phase is running */
  onProgress?: ProgressCallback<LimiterProgress>;
}

export interface PipelineConcurrency {
  probe: number;
  capture: number;
}

/** Classifies a target as UP or DOWN */
export interface TargetProber {
  probe(target: Target, signal?: AbortSignal): Promise<OutcomeRecord>;
}

/** Classifies a live target as SUCCESS or FAILURE */
export interface TargetCapturer {
  capture(target: Target, signal?: AbortSignal): Promise<OutcomeRecord>;
}

/** The browser lifecycle the coordinator drives around the capture phase */
export interface SessionLifecycle {
  start(): Promise<void>;
  closeOpenSessions(): Promise<void>;
  shutdown(): Promise<void>;
}
