import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PreconditionViolationError, SessionReleasedError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { ScraperSession } from "./ScraperSession";
import { FakeBrowser, respondWith, timeoutError } from "./testing";
import { type EngineBrowser, type SessionHost, type SessionOptions, SessionState } from "./types";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const OPTIONS: SessionOptions = {
  navigationTimeoutMs: 1000,
  maxNavigationAttempts: 3,
  userAgent: "*",
};

describe("ScraperSession", () => {
  let logger: Logger;
  let browser: FakeBrowser;
  let host: SessionHost;

  const createHost = (engine: EngineBrowser | null): SessionHost => ({
    getBrowser: () => engine,
    onSessionExit: vi.fn(),
  });

  const openSession = async (options: SessionOptions = OPTIONS) => {
    const session = new ScraperSession("https://example.com", host, options, logger);
    session.start();
    await session.openContext();
    await session.openPage();
    return session;
  };

  beforeEach(() => {
    logger = createMockLogger();
    browser = new FakeBrowser();
    host = createHost(browser);
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("lifecycle", () => {
    it("should walk through the states in order", async () => {
      const session = new ScraperSession("https://example.com", host, OPTIONS, logger);
      expect(session.state).toBe(SessionState.Uninitialized);

      session.start();
      expect(session.state).toBe(SessionState.BrowserReady);
      await session.openContext();
      expect(session.state).toBe(SessionState.ContextOpen);
      await session.openPage();
      expect(session.state).toBe(SessionState.PageOpen);
      await session.closeContextAndPage();
      expect(session.state).toBe(SessionState.BrowserReady);
      await session.exit();
      expect(session.state).toBe(SessionState.Closed);
    });

    it("should reject opening a page before a context and log the violation", async () => {
      const session = new ScraperSession("https://example.com", host, OPTIONS, logger);
      session.start();

      await expect(session.openPage()).rejects.toThrow(
        "Cannot open a page while session is 'browser-ready' (requires 'context-open')",
      );
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("should reject navigation without an open page", async () => {
      const session = new ScraperSession("https://example.com", host, OPTIONS, logger);

      await expect(session.navigate("https://example.com/")).rejects.toBeInstanceOf(
        PreconditionViolationError,
      );
      expect(browser.navigations).toEqual([]);
    });

    it("should refuse to start when the manager has no browser", () => {
      const session = new ScraperSession("https://example.com", createHost(null), OPTIONS, logger);

      expect(() => session.start()).toThrow(PreconditionViolationError);
    });

    it("should refuse to start twice", () => {
      const session = new ScraperSession("https://example.com", host, OPTIONS, logger);
      session.start();

      expect(() => session.start()).toThrow(PreconditionViolationError);
    });

    it("should close page and context once and notify the host once on exit", async () => {
      const session = await openSession();
      const [context] = browser.contexts;

      await session.exit();
      await session.exit();
      await session.closeContextAndPage();

      expect(context?.closed).toBe(true);
      expect(context?.pages[0]?.closed).toBe(true);
      expect(host.onSessionExit).toHaveBeenCalledTimes(1);
      expect(host.onSessionExit).toHaveBeenCalledWith(session);
    });

    it("should report a screenshot after release as released, not as a violation", async () => {
      const session = await openSession();
      await session.navigate("https://example.com/");

      await session.release();

      await expect(session.screenshot("/shots/a.jpeg")).rejects.toThrow(
        new SessionReleasedError("take a screenshot", "https://example.com"),
      );
      expect(browser.screenshots).toEqual([]);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("should refuse to open a context once released", async () => {
      const session = new ScraperSession("https://example.com", host, OPTIONS, logger);
      session.start();

      await session.release();

      await expect(session.openContext()).rejects.toBeInstanceOf(SessionReleasedError);
      expect(browser.contexts).toEqual([]);
    });

    it("should give every context the configured user agent", async () => {
      await openSession({ ...OPTIONS, userAgent: "PageBot/1.0" });
      await openSession();

      expect(browser.contexts.map((context) => context.userAgent)).toEqual([
        "PageBot/1.0",
        undefined,
      ]);
    });
  });

  describe("navigate", () => {
    it("should succeed on the first attempt", async () => {
      const session = await openSession();

      const result = await session.navigate("https://example.com/");

      expect(result).toEqual({ ok: true, value: { attempts: 1, status: 200 } });
    });

    it("should retry timeouts after 2s and then 4s before giving up", async () => {
      browser.behavior = async () => {
        throw timeoutError();
      };
      const session = await openSession();
      const start = Date.now();

      const promise = session.navigate("https://example.com/");
      await vi.runAllTimersAsync();
      const result = await promise;

      expect(browser.navigations.map((n) => n.at - start)).toEqual([0, 2000, 6000]);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("timeout-exhausted");
        expect(result.error.attempts).toBe(3);
        expect(result.error.message).toContain("timed out after 3 attempt(s)");
      }
    });

    it("should report the attempt that finally succeeded", async () => {
      let calls = 0;
      browser.behavior = async () => {
        calls++;
        if (calls === 1) throw timeoutError();
        return { status: () => 201 };
      };
      const session = await openSession();

      const promise = session.navigate("https://example.com/");
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toEqual({ ok: true, value: { attempts: 2, status: 201 } });
    });

    it("should stop at once on an engine error", async () => {
      browser.behavior = async () => {
        throw new Error("net::ERR_NAME_NOT_RESOLVED");
      };
      const session = await openSession();

      const result = await session.navigate("https://example.com/");

      expect(result).toEqual({
        ok: false,
        error: { kind: "engine-error", message: "Error: net::ERR_NAME_NOT_RESOLVED", attempts: 1 },
      });
      expect(browser.navigations).toHaveLength(1);
    });

    it("should never make more than three attempts", async () => {
      browser.behavior = async () => {
        throw timeoutError();
      };
      const session = await openSession({ ...OPTIONS, maxNavigationAttempts: 10 });

      const promise = session.navigate("https://example.com/", { maxAttempts: 10 });
      await vi.runAllTimersAsync();
      await promise;

      expect(browser.navigations).toHaveLength(3);
    });

    it("should pass the per-attempt timeout to the engine", async () => {
      const timeouts: number[] = [];
      browser.behavior = async (_url, timeout) => {
        timeouts.push(timeout);
        return { status: () => 200 };
      };
      const session = await openSession();

      await session.navigate("https://example.com/", { timeoutMs: 250 });

      expect(timeouts).toEqual([250]);
    });

    it("should return cancelled when aborted during backoff", async () => {
      browser.behavior = async () => {
        throw timeoutError();
      };
      const controller = new AbortController();
      const session = await openSession();

      const promise = session.navigate("https://example.com/", { signal: controller.signal });
      await vi.advanceTimersByTimeAsync(500);
      controller.abort();
      const result = await promise;

      expect(result).toEqual({
        ok: false,
        error: { kind: "cancelled", message: "Navigation to https://example.com/ cancelled", attempts: 1 },
      });
      expect(browser.navigations).toHaveLength(1);
    });

    it("should return the status reported by the engine", async () => {
      browser.behavior = respondWith(404);
      const session = await openSession();

      await expect(session.navigate("https://example.com/")).resolves.toEqual({
        ok: true,
        value: { attempts: 1, status: 404 },
      });
    });
  });

  it("should write a full-page screenshot to the given path", async () => {
    const session = await openSession();

    await session.screenshot("/out/shot.jpeg");

    expect(browser.screenshots).toEqual(["/out/shot.jpeg"]);
  });
});
