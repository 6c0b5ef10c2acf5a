import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TaskExecutionError } from "../pipeline/errors";
import { ConfigurationError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { TaskLimiter } from "./TaskLimiter";
import type { LimiterProgress } from "./types";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("TaskLimiter", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it.each([0, -1, 1.5, Number.NaN])(
    "should reject a max concurrency of %s at construction",
    (value) => {
      expect(() => new TaskLimiter(value, logger)).toThrow(ConfigurationError);
    },
  );

  it("should resolve with an empty array for empty input", async () => {
    const limiter = new TaskLimiter(2, logger);
    const work = vi.fn();

    await expect(limiter.run([], work)).resolves.toEqual([]);
    expect(work).not.toHaveBeenCalled();
  });

  it("should bound concurrency and finish in ceil(n / max) rounds", async () => {
    const limiter = new TaskLimiter(2, logger);
    let active = 0;
    let maxActive = 0;
    const work = async (_index: number, input: number) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await wait(100);
      active--;
      return input * 10;
    };

    const start = Date.now();
    const promise = limiter.run([1, 2, 3, 4, 5], work);
    await vi.runAllTimersAsync();
    const results = await promise;

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(maxActive).toBe(2);
    expect(Date.now() - start).toBe(300);
  });

  it("should dispatch in input order and tag inputs with 1-based positions", async () => {
    const limiter = new TaskLimiter(1, logger);
    const dispatched: Array<[number, string]> = [];

    const promise = limiter.run(["a", "b", "c"], async (index, input) => {
      dispatched.push([index, input]);
      await wait(10);
      return input;
    });
    await vi.runAllTimersAsync();
    await promise;

    expect(dispatched).toEqual([
      [1, "a"],
      [2, "b"],
      [3, "c"],
    ]);
  });

  it("should return results in input order when completion order differs", async () => {
    const limiter = new TaskLimiter(3, logger);
    const delays = [300, 100, 200];

    const promise = limiter.run(delays, async (_index, delay) => {
      await wait(delay);
      return delay;
    });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toEqual([300, 100, 200]);
  });

  it("should accept a Map and pass its entries as inputs", async () => {
    const limiter = new TaskLimiter(2, logger);
    const inputs = new Map([
      ["x", 1],
      ["y", 2],
    ]);

    const results = await limiter.run(inputs, async (_index, [key, value]) => `${key}=${value}`);

    expect(results).toEqual(["x=1", "y=2"]);
  });

  it("should keep running siblings when one unit throws, then reject with every failure", async () => {
    const limiter = new TaskLimiter(2, logger, "probe");
    const finished: number[] = [];

    const promise = limiter.run([1, 2, 3], async (index) => {
      await wait(10);
      if (index === 2) {
        throw new Error("boom");
      }
      finished.push(index);
      return index;
    });
    const assertion = expect(promise).rejects.toBeInstanceOf(TaskExecutionError);
    await vi.runAllTimersAsync();
    await assertion;

    expect(finished).toEqual([1, 3]);
    await expect(promise).rejects.toMatchObject({
      label: "probe",
      failures: [{ index: 2, error: expect.objectContaining({ message: "boom" }) }],
    });
  });

  it("should report monotonic progress after each settlement", async () => {
    const limiter = new TaskLimiter(2, logger, "capture");
    const progress: LimiterProgress[] = [];

    const promise = limiter.run([30, 10, 20], async (_index, delay) => {
      await wait(delay);
      return delay;
    }, {
      onProgress: (update) => {
        progress.push(update);
      },
    });
    await vi.runAllTimersAsync();
    await promise;

    expect(progress.map((p) => p.completed)).toEqual([1, 2, 3]);
    expect(progress.every((p) => p.total === 3 && p.label === "capture")).toBe(true);
    expect(progress.at(-1)?.inFlight).toBe(0);
  });

  it("should not let a failing progress callback block dispatch", async () => {
    const limiter = new TaskLimiter(1, logger);

    const promise = limiter.run([1, 2], async (_index, input) => input, {
      onProgress: () => Promise.reject(new Error("display closed")),
    });

    await expect(promise).resolves.toEqual([1, 2]);
    await vi.runAllTimersAsync();
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining("Progress callback failed"),
    );
  });

  it("should skip undispatched inputs once the signal aborts", async () => {
    const limiter = new TaskLimiter(1, logger);
    const controller = new AbortController();
    const started: number[] = [];

    const promise = limiter.run(
      [1, 2, 3],
      async (index) => {
        started.push(index);
        await wait(100);
        return index;
      },
      { signal: controller.signal },
    );
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toEqual([1]);
    expect(started).toEqual([1]);
  });

  it("should resolve immediately when the signal is already aborted", async () => {
    const limiter = new TaskLimiter(2, logger);
    const controller = new AbortController();
    controller.abort();
    const work = vi.fn();

    await expect(limiter.run([1, 2], work, { signal: controller.signal })).resolves.toEqual([]);
    expect(work).not.toHaveBeenCalled();
  });
});
