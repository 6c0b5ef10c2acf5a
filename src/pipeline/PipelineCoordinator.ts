import { TaskLimiter } from "../limiter/TaskLimiter";
import { RecordCollection, type RecordStore } from "../store/types";
import { Classification, type OutcomeRecord, type Target } from "../types";
import { describeError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { formatDuration } from "../utils/timing";
import {
  type PipelineConcurrency,
  type PipelineRunOptions,
  PipelineRunStatus,
  type PipelineSummary,
  type SessionLifecycle,
  type TargetCapturer,
  type TargetProber,
} from "./types";

export interface PipelineDependencies {
  store: RecordStore;
  prober: TargetProber;
  capturer: TargetCapturer;
  sessions: SessionLifecycle;
}

/**
 * Splits records into those classified as `passing` and the rest.
 * Both arrays are new.
 */
export function partitionOutcomes(
  records: readonly OutcomeRecord[],
  passing: Classification,
): [OutcomeRecord[], OutcomeRecord[]] {
  const passed: OutcomeRecord[] = [];
  const failed: OutcomeRecord[] = [];
  for (const record of records) {
    (record.classification === passing ? passed : failed).push(record);
  }
  return [passed, failed];
}

const toTarget = (record: OutcomeRecord): Target => ({
  id: record.id,
  url: record.url,
  displayName: record.displayName,
});

/**
 * Runs the probe phase, then the capture phase over the live targets, and
 * persists the four resulting collections.
 */
export class PipelineCoordinator {
  private readonly probeLimiter: TaskLimiter;
  private readonly captureLimiter: TaskLimiter;

  constructor(
    private readonly deps: PipelineDependencies,
    concurrency: PipelineConcurrency,
    private readonly logger: Logger,
  ) {
    // Invalid caps fail here, before any work starts
    this.probeLimiter = new TaskLimiter(concurrency.probe, logger, "probe");
    this.captureLimiter = new TaskLimiter(concurrency.capture, logger, "capture");
  }

  async run(
    targets: readonly Target[],
    options: PipelineRunOptions = {},
  ): Promise<PipelineSummary> {
    const { signal, onProgress } = options;
    const startedAt = Date.now();
    const { store, prober } = this.deps;

    const recorded = await store.recordedIds([
      RecordCollection.Captured,
      RecordCollection.BadResponses,
    ]);
    const pending = targets.filter((target) => !recorded.has(target.id));
    const summary: PipelineSummary = {
      status: PipelineRunStatus.COMPLETED,
      skipped: targets.length - pending.length,
      up: [],
      down: [],
      success: [],
      failure: [],
      durationMs: 0,
    };
    const finish = (status: PipelineRunStatus): PipelineSummary => {
      summary.status = status;
      summary.durationMs = Date.now() - startedAt;
      return summary;
    };

    if (summary.skipped > 0) {
      this.logger.info(`⏭️ Skipping ${summary.skipped} target(s) recorded by an earlier run`);
    }
    if (pending.length === 0) {
      this.logger.info("✅ Nothing to process: every target already has a result");
      return finish(PipelineRunStatus.NOTHING_TO_PROCESS);
    }

    this.logger.info(`🔎 Probing ${pending.length} target(s)...`);
    const probed = await this.probeLimiter.run(
      pending,
      (_index, target, unitSignal) => prober.probe(target, unitSignal),
      { signal, onProgress },
    );
    [summary.up, summary.down] = partitionOutcomes(probed, Classification.Up);
    await store.append(RecordCollection.GoodResponses, summary.up);
    await store.append(RecordCollection.BadResponses, summary.down);
    this.logger.info(`📶 ${summary.up.length} up, ${summary.down.length} down`);

    if (signal?.aborted) {
      this.logger.warn("🚫 Run cancelled after the probe phase");
      return finish(PipelineRunStatus.CANCELLED);
    }
    if (summary.up.length === 0) {
      this.logger.info("✅ Nothing to capture: no target is up");
      return finish(PipelineRunStatus.NOTHING_TO_PROCESS);
    }

    await this.capturePhase(summary, options);
    this.logger.info(
      `🏁 Captured ${summary.success.length}, failed ${summary.failure.length} in ${formatDuration(Date.now() - startedAt)}`,
    );
    return finish(signal?.aborted ? PipelineRunStatus.CANCELLED : PipelineRunStatus.COMPLETED);
  }

  private async capturePhase(
    summary: PipelineSummary,
    { signal, onProgress }: PipelineRunOptions,
  ): Promise<void> {
    const { store, capturer, sessions } = this.deps;

    const onAbort = () => {
      this.logger.warn("🚫 Cancelling: closing open browser pages...");
      sessions.closeOpenSessions().catch((error) => {
        this.logger.warn(`⚠️ Failed to close open sessions: ${describeError(error)}`);
      });
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      await sessions.start();
      this.logger.info(`📸 Capturing ${summary.up.length} live target(s)...`);
      const captured = await this.captureLimiter.run(
        summary.up.map(toTarget),
        (_index, target, unitSignal) => capturer.capture(target, unitSignal),
        { signal, onProgress },
      );
      [summary.success, summary.failure] = partitionOutcomes(captured, Classification.Success);
      await store.append(RecordCollection.Captured, summary.success);
      await store.append(RecordCollection.CaptureFailed, summary.failure);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await sessions.shutdown();
    }
  }
}
