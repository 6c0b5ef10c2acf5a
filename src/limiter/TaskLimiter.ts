import { TaskExecutionError, type UnitOfWorkFailure } from "../pipeline/errors";
import { ConfigurationError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import type { LimiterProgress, TaskLimiterRunOptions, UnitOfWork } from "./types";

type QueueItem<I> = {
  index: number;
  input: I;
};

/**
 * Runs one unit of work per input with at most `maxConcurrency` of them in flight.
 * Inputs are offered to free slots in input order; results come back in input order.
 */
export class TaskLimiter {
  readonly maxConcurrency: number;
  private readonly label: string;
  private readonly logger: Logger;

  constructor(maxConcurrency: number, logger: Logger, label = "task") {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ConfigurationError(
        `Concurrency for ${label} must be a positive integer, got ${maxConcurrency}`,
      );
    }
    this.maxConcurrency = maxConcurrency;
    this.label = label;
    this.logger = logger;
  }

  /**
   * Applies `work` to every input and resolves with one result per dispatched input.
   *
   * A unit of work that throws does not stop its siblings; once everything
   * dispatched has settled, the run rejects with a `TaskExecutionError` listing
   * the failures. When `options.signal` aborts, inputs not yet dispatched are
   * skipped and the resolved array holds only the dispatched inputs' results.
   */
  run<I, R>(
    inputs: Iterable<I>,
    work: UnitOfWork<I, R>,
    options: TaskLimiterRunOptions = {},
  ): Promise<R[]> {
    const { onProgress, signal } = options;
    const queue: QueueItem<I>[] = Array.from(inputs, (input, i) => ({ index: i + 1, input }));
    const total = queue.length;
    const results = new Map<number, R>();
    const failures: UnitOfWorkFailure[] = [];
    let inFlight = 0;
    let completed = 0;

    if (total === 0) {
      return Promise.resolve([]);
    }

    this.logger.debug(
      `Running ${total} ${this.label} task(s) with concurrency ${this.maxConcurrency}`,
    );

    return new Promise<R[]>((resolve, reject) => {
      const finish = () => {
        if (signal?.aborted && queue.length > 0) {
          this.logger.warn(
            `🚫 ${this.label}: cancelled with ${queue.length} of ${total} task(s) not started`,
          );
        }
        if (failures.length > 0) {
          failures.sort((a, b) => a.index - b.index);
          reject(new TaskExecutionError(this.label, failures));
          return;
        }
        const ordered = Array.from(results.entries())
          .sort(([a], [b]) => a - b)
          .map(([, result]) => result);
        resolve(ordered);
      };

      const report = () => {
        if (!onProgress) return;
        const progress: LimiterProgress = { label: this.label, completed, total, inFlight };
        try {
          // Fire and forget; progress must never hold up dispatch
          Promise.resolve(onProgress(progress)).catch((error) => {
            this.logger.warn(`Progress callback failed for ${this.label}: ${error}`);
          });
        } catch (error) {
          this.logger.warn(`Progress callback failed for ${this.label}: ${error}`);
        }
      };

      const settle = () => {
        inFlight--;
        completed++;
        report();
        const drained = queue.length === 0 || signal?.aborted === true;
        if (drained && inFlight === 0) {
          finish();
          return;
        }
        dispatch();
      };

      const runOne = async (item: QueueItem<I>): Promise<void> => {
        try {
          results.set(item.index, await work(item.index, item.input, signal));
        } catch (error) {
          const failure = error instanceof Error ? error : new Error(String(error));
          this.logger.error(`❌ ${this.label} #${item.index} threw: ${failure.message}`);
          failures.push({ index: item.index, error: failure });
        } finally {
          settle();
        }
      };

      const dispatch = () => {
        while (inFlight < this.maxConcurrency && queue.length > 0 && !signal?.aborted) {
          const item = queue.shift();
          if (!item) break;
          inFlight++;
          // runOne never rejects: it records failures itself
          void runOne(item);
        }
        if (inFlight === 0) {
          // Aborted before anything was dispatched
          finish();
        }
      };

      dispatch();
    });
  }
}
