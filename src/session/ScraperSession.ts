import { MAX_NAVIGATION_ATTEMPTS } from "../config";
import {
  PreconditionViolationError,
  SessionReleasedError,
  describeError,
} from "../utils/errors";
import type { Logger } from "../utils/logger";
import { err, ok } from "../utils/result";
import { sleep } from "../utils/timing";
import { type BackoffStrategy, ExponentialBackoff } from "./backoff";
import {
  type BrowsingSession,
  type EngineBrowser,
  type EngineContext,
  type EnginePage,
  type NavigateOptions,
  type NavigationResult,
  type SessionHost,
  type SessionOptions,
  SessionState,
} from "./types";

const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error && error.name === "TimeoutError";

/**
 * One capture's view of the shared browser: its own context and page, driven
 * through a strict lifecycle.
 *
 * `uninitialized -> browser-ready -> context-open -> page-open -> browser-ready ... -> closed`
 *
 * Calling a method from the wrong state is a bug in the caller and throws a
 * `PreconditionViolationError`, unless the session was released by its manager,
 * in which case it throws `SessionReleasedError`. Navigation problems are
 * returned, not thrown.
 */
export class ScraperSession implements BrowsingSession {
  readonly origin: string;
  private currentState = SessionState.Uninitialized;
  private browser: EngineBrowser | null = null;
  private context: EngineContext | null = null;
  private page: EnginePage | null = null;
  private released = false;

  constructor(
    origin: string,
    private readonly host: SessionHost,
    private readonly options: SessionOptions,
    private readonly logger: Logger,
    private readonly backoff: BackoffStrategy = new ExponentialBackoff(),
  ) {
    this.origin = origin;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Attaches to the manager's browser.
   */
  start(): void {
    this.requireState("start", SessionState.Uninitialized);
    const browser = this.host.getBrowser();
    if (!browser) {
      this.violation("start", "manager not started", SessionState.Uninitialized);
    }
    this.browser = browser;
    this.currentState = SessionState.BrowserReady;
  }

  async openContext(): Promise<void> {
    const browser = this.requireBrowser("open a context", SessionState.BrowserReady);
    const userAgent = this.options.userAgent === "*" ? undefined : this.options.userAgent;
    this.context = await browser.newContext({ userAgent });
    this.currentState = SessionState.ContextOpen;
    this.logger.debug(`🪟 Opened browser context for ${this.origin}`);
  }

  async openPage(): Promise<void> {
    const context = this.requireContext("open a page");
    this.page = await context.newPage();
    this.currentState = SessionState.PageOpen;
  }

  /**
   * Navigates the page to `url` and waits for the network to go idle.
   *
   * Timeouts are retried up to `maxAttempts` (never more than three), waiting
   * for the backoff strategy in between. Any other engine error ends the
   * sequence at once.
   */
  async navigate(url: string, options: NavigateOptions = {}): Promise<NavigationResult> {
    const page = this.requirePage("navigate");
    const timeout = options.timeoutMs ?? this.options.navigationTimeoutMs;
    const maxAttempts = Math.min(
      Math.max(1, options.maxAttempts ?? this.options.maxNavigationAttempts),
      MAX_NAVIGATION_ATTEMPTS,
    );
    const { signal } = options;
    let lastTimeout = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = this.backoff.delayBeforeRetry(attempt - 1);
        this.logger.warn(
          `⏳ Navigation to ${url} timed out (attempt ${attempt - 1}/${maxAttempts}). Retrying in ${delay}ms...`,
        );
        await sleep(delay, signal);
      }
      if (signal?.aborted) {
        return err({
          kind: "cancelled",
          message: `Navigation to ${url} cancelled`,
          attempts: attempt - 1,
        });
      }

      try {
        const response = await page.goto(url, { timeout, waitUntil: "networkidle" });
        return ok({ attempts: attempt, status: response?.status() ?? null });
      } catch (error) {
        if (signal?.aborted) {
          return err({
            kind: "cancelled",
            message: `Navigation to ${url} cancelled`,
            attempts: attempt,
          });
        }
        if (!isTimeoutError(error)) {
          return err({ kind: "engine-error", message: describeError(error), attempts: attempt });
        }
        lastTimeout = describeError(error);
      }
    }

    return err({
      kind: "timeout-exhausted",
      message: `Navigation to ${url} timed out after ${maxAttempts} attempt(s): ${lastTimeout}`,
      attempts: maxAttempts,
    });
  }

  /**
   * Writes a full-page JPEG of the current page to `path`.
   */
  async screenshot(path: string): Promise<void> {
    const page = this.requirePage("take a screenshot");
    await page.screenshot({ path, fullPage: true, type: "jpeg" });
  }

  /**
   * Closes the page, then the context. Safe to call in any state.
   */
  async closeContextAndPage(): Promise<void> {
    const { page, context } = this;
    this.page = null;
    this.context = null;
    if (
      this.currentState === SessionState.ContextOpen ||
      this.currentState === SessionState.PageOpen
    ) {
      this.currentState = SessionState.BrowserReady;
    }

    if (page) {
      await this.closeHandle("page", () => page.close());
    }
    if (context) {
      await this.closeHandle("context", () => context.close());
    }
  }

  /**
   * Closes the page and context on behalf of the manager when a run is
   * cancelled. Later calls that need them throw `SessionReleasedError`.
   */
  async release(): Promise<void> {
    this.released = true;
    await this.closeContextAndPage();
  }

  /**
   * Releases everything the session holds. Safe to call more than once.
   */
  async exit(): Promise<void> {
    if (this.currentState === SessionState.Closed) {
      return;
    }
    await this.closeContextAndPage();
    this.browser = null;
    this.currentState = SessionState.Closed;
    this.host.onSessionExit(this);
  }

  private async closeHandle(kind: string, close: () => Promise<void>): Promise<void> {
    try {
      await close();
    } catch (error) {
      // Already gone with the browser, most likely
      this.logger.warn(`⚠️ Failed to close ${kind} for ${this.origin}: ${describeError(error)}`);
    }
  }

  private requireState(operation: string, expected: SessionState): void {
    if (this.released) {
      throw new SessionReleasedError(operation, this.origin);
    }
    if (this.currentState !== expected) {
      this.violation(operation, this.currentState, expected);
    }
  }

  private requireBrowser(operation: string, expected: SessionState): EngineBrowser {
    this.requireState(operation, expected);
    if (!this.browser) {
      this.violation(operation, this.currentState, expected);
    }
    return this.browser;
  }

  private requireContext(operation: string): EngineContext {
    this.requireState(operation, SessionState.ContextOpen);
    if (!this.context) {
      this.violation(operation, this.currentState, SessionState.ContextOpen);
    }
    return this.context;
  }

  private requirePage(operation: string): EnginePage {
    this.requireState(operation, SessionState.PageOpen);
    if (!this.page) {
      this.violation(operation, this.currentState, SessionState.PageOpen);
    }
    return this.page;
  }

  private violation(operation: string, actual: string, expected: string): never {
    const error = new PreconditionViolationError(operation, actual, expected);
    this.logger.error(`❌ ${error.message}`);
    throw error;
  }
}
