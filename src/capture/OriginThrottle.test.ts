import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../utils/logger";
import { OriginThrottle } from "./OriginThrottle";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe("OriginThrottle", () => {
  let throttle: OriginThrottle;

  beforeEach(() => {
    vi.useFakeTimers();
    throttle = new OriginThrottle(createMockLogger());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should queue concurrent callers for one origin an interval apart", async () => {
    const start = Date.now();
    const turns: number[] = [];
    const take = async () => {
      await throttle.waitForTurn("https://a.test", 1000);
      turns.push(Date.now() - start);
    };

    const all = Promise.all([take(), take(), take()]);
    await vi.runAllTimersAsync();
    await all;

    expect(turns).toEqual([0, 1000, 2000]);
  });

  it("should not wait once the interval has already passed", async () => {
    await throttle.waitForTurn("https://a.test", 1000);
    await vi.advanceTimersByTimeAsync(5000);
    const before = Date.now();

    await throttle.waitForTurn("https://a.test", 1000);

    expect(Date.now()).toBe(before);
  });

  it("should keep origins independent", async () => {
    await throttle.waitForTurn("https://a.test", 1000);
    const before = Date.now();

    await throttle.waitForTurn("https://b.test", 1000);

    expect(Date.now()).toBe(before);
  });

  it("should stop waiting when the signal aborts", async () => {
    const controller = new AbortController();
    await throttle.waitForTurn("https://a.test", 10_000);

    const waiting = throttle.waitForTurn("https://a.test", 10_000, controller.signal);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await waiting;

    expect(vi.getTimerCount()).toBe(0);
  });
});
