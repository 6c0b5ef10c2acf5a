import type { ProgressCallback } from "../types";

/**
 * Work performed for one input. `index` is the input's 1-based position, for
 * logging and backoff only; it says nothing about execution order.
 */
export type UnitOfWork<I, R> = (index: number, input: I, signal?: AbortSignal) => Promise<R>;

/**
 * Snapshot reported after each unit of work settles.
 */
export interface LimiterProgress {
  label: string;
  completed: number;
  total: number;
  inFlight: number;
}

export interface TaskLimiterRunOptions {
  /** Called after every settlement; not awaited */
  onProgress?: ProgressCallback<LimiterProgress>;
  /** Once aborted, inputs that have not been dispatched yet are skipped */
  signal?: AbortSignal;
}
