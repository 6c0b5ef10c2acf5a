import type { Result } from "../utils/result";

/**
 * The parts of a browser engine a session drives. Playwright's `Browser`,
 * `BrowserContext`, `Page` and `Response` satisfy these structurally.
 */
export interface EngineResponse {
  status(): number;
}

export interface EnginePage {
  goto(
    url: string,
    options: { timeout: number; waitUntil: "networkidle" },
  ): Promise<EngineResponse | null>;
  screenshot(options: { path: string; fullPage: boolean; type: "jpeg" }): Promise<unknown>;
  close(): Promise<void>;
}

export interface EngineContext {
  newPage(): Promise<EnginePage>;
  close(): Promise<void>;
}

export interface EngineBrowser {
  newContext(options: { userAgent?: string }): Promise<EngineContext>;
  close(): Promise<void>;
  isConnected(): boolean;
}

/**
 * Browser launch settings, see the `browser` configuration section.
 */
export interface BrowserSettings {
  headless: boolean;
  slowMo: number;
  launchArgs: string[];
  executablePath?: string;
}

export type BrowserLauncher = (settings: BrowserSettings) => Promise<EngineBrowser>;

/**
 * Lifecycle of a session. Context and page only ever exist in the open states.
 */
export enum SessionState {
  Uninitialized = "uninitialized",
  BrowserReady = "browser-ready",
  ContextOpen = "context-open",
  PageOpen = "page-open",
  Closed = "closed",
}

export interface SessionOptions {
  navigationTimeoutMs: number;
  /** Capped at `MAX_NAVIGATION_ATTEMPTS` */
  maxNavigationAttempts: number;
  /** Applied to every new context unless it is the wildcard `*` */
  userAgent: string;
}

export interface NavigateOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
}

export interface NavigationSuccess {
  attempts: number;
  /** Status of the main document response, if the engine reported one */
  status: number | null;
}

export type NavigationFailureKind = "timeout-exhausted" | "engine-error" | "cancelled";

export interface NavigationFailure {
  kind: NavigationFailureKind;
  message: string;
  attempts: number;
}

export type NavigationResult = Result<NavigationSuccess, NavigationFailure>;

/**
 * What a capture strategy needs from a browser session.
 */
export interface BrowsingSession {
  readonly origin: string;
  readonly state: SessionState;
  start(): void;
  openContext(): Promise<void>;
  openPage(): Promise<void>;
  navigate(url: string, options?: NavigateOptions): Promise<NavigationResult>;
  screenshot(path: string): Promise<void>;
  closeContextAndPage(): Promise<void>;
  release(): Promise<void>;
  exit(): Promise<void>;
}

/**
 * Scoped access to sessions: `exit()` runs on every path out of `fn`.
 */
export interface SessionProvider {
  withSession<T>(origin: string, fn: (session: BrowsingSession) => Promise<T>): Promise<T>;
}

/**
 * The manager as seen by the sessions it hands out.
 */
export interface SessionHost {
  getBrowser(): EngineBrowser | null;
  onSessionExit(session: BrowsingSession): void;
}
