import { sleep } from "../utils/timing";
import type { EngineBrowser, EngineContext, EnginePage, EngineResponse } from "./types";

/**
 * In-process stand-ins for the browser engine, shared by the session and
 * capture tests.
 */

export type GotoBehavior = (url: string, timeout: number) => Promise<EngineResponse | null>;

export const respondWith =
  (status: number): GotoBehavior =>
  async () => ({ status: () => status });

export const timeoutError = (message = "page.goto: Timeout exceeded"): Error =>
  Object.assign(new Error(message), { name: "TimeoutError" });

export interface RecordedNavigation {
  url: string;
  at: number;
}

export class FakePage implements EnginePage {
  readonly screenshots: string[] = [];
  closed = false;

  constructor(private readonly browser: FakeBrowser) {}

  async goto(url: string, options: { timeout: number }): Promise<EngineResponse | null> {
    this.browser.navigations.push({ url, at: Date.now() });
    return this.browser.behavior(url, options.timeout);
  }

  async screenshot(options: { path: string }): Promise<unknown> {
    this.screenshots.push(options.path);
    this.browser.screenshots.push(options.path);
    return undefined;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeContext implements EngineContext {
  readonly pages: FakePage[] = [];
  closed = false;

  constructor(
    private readonly browser: FakeBrowser,
    readonly userAgent: string | undefined,
  ) {}

  async newPage(): Promise<FakePage> {
    const page = new FakePage(this.browser);
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeBrowser implements EngineBrowser {
  readonly contexts: FakeContext[] = [];
  readonly navigations: RecordedNavigation[] = [];
  readonly screenshots: string[] = [];
  /** Time each successive `newContext` call takes; missing entries are instant */
  readonly contextDelaysMs: number[] = [];
  private connected = true;

  constructor(public behavior: GotoBehavior = respondWith(200)) {}

  async newContext(options: { userAgent?: string }): Promise<FakeContext> {
    await sleep(this.contextDelaysMs.shift() ?? 0);
    const context = new FakeContext(this, options.userAgent);
    this.contexts.push(context);
    return context;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }
}
