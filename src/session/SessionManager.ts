import { EngineLaunchError, describeError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import type { BackoffStrategy } from "./backoff";
import { launchChromium } from "./launcher";
import { ScraperSession } from "./ScraperSession";
import type {
  BrowserLauncher,
  BrowserSettings,
  BrowsingSession,
  EngineBrowser,
  SessionHost,
  SessionOptions,
  SessionProvider,
} from "./types";

export interface SessionManagerOptions {
  browser: BrowserSettings;
  session: SessionOptions;
}

/**
 * Owns the run's single browser instance and the sessions that borrow it.
 */
export class SessionManager implements SessionProvider, SessionHost {
  private browser: EngineBrowser | null = null;
  private readonly sessions = new Set<BrowsingSession>();

  constructor(
    private readonly options: SessionManagerOptions,
    private readonly logger: Logger,
    private readonly launcher: BrowserLauncher = launchChromium,
    private readonly backoff?: BackoffStrategy,
  ) {}

  /**
   * Launches the browser. Does nothing if one is already connected.
   * @throws {EngineLaunchError} If the browser cannot be started
   */
  async start(): Promise<void> {
    if (this.browser?.isConnected()) {
      return;
    }
    const { launchArgs } = this.options.browser;
    this.logger.debug(
      `🚀 Launching Chromium with args: ${launchArgs.join(" ") || "none"}...`,
    );
    try {
      this.browser = await this.launcher(this.options.browser);
    } catch (error) {
      throw new EngineLaunchError(
        describeError(error),
        error instanceof Error ? error : undefined,
      );
    }
  }

  getBrowser(): EngineBrowser | null {
    return this.browser;
  }

  /**
   * Creates an unstarted session for `origin`. The caller must `exit()` it.
   */
  createSession(origin: string): ScraperSession {
    const session = new ScraperSession(
      origin,
      this,
      this.options.session,
      this.logger,
      this.backoff,
    );
    this.sessions.add(session);
    return session;
  }

  async withSession<T>(
    origin: string,
    fn: (session: BrowsingSession) => Promise<T>,
  ): Promise<T> {
    const session = this.createSession(origin);
    try {
      return await fn(session);
    } finally {
      await session.exit();
    }
  }

  onSessionExit(session: BrowsingSession): void {
    this.sessions.delete(session);
  }

  /** Number of sessions that have not exited yet */
  get openSessions(): number {
    return this.sessions.size;
  }

  /**
   * Releases every live session, closing its context and page so navigations
   * in progress end promptly. The sessions themselves still exit through their owners.
   */
  async closeOpenSessions(): Promise<void> {
    if (this.sessions.size === 0) return;
    this.logger.debug(`Closing ${this.sessions.size} open browser session(s)...`);
    await Promise.all(Array.from(this.sessions, (session) => session.release()));
  }

  async closeBrowser(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser?.isConnected()) {
      this.logger.debug("Closing browser instance...");
      await browser.close();
    }
  }

  /**
   * Exits every remaining session, then closes the browser.
   */
  async shutdown(): Promise<void> {
    await Promise.all(Array.from(this.sessions, (session) => session.exit()));
    await this.closeBrowser();
  }
}
