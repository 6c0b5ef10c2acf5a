/**
 * `Request-rate: <requests>/<seconds>` directive of a robots.txt stanza.
 */
export interface RequestRate {
  requests: number;
  seconds: number;
}

/**
 * Where a policy came from. `unavailable` means the robots file could not be
 * obtained and the allow-all fallback is in effect.
 */
export type PolicySource = "cache" | "network" | "unavailable";

/**
 * Crawl rules a site declares for a client identity. Frozen once created.
 */
export interface CrawlPolicy {
  readonly origin: string;
  readonly source: PolicySource;
  /** Requests allowed per time window, if the site declares one */
  readonly requestRate: RequestRate | null;
  /** Whole seconds to wait between requests, if the site declares one */
  readonly crawlDelaySeconds: number | null;
  /** Whether `identity` may fetch `url`. Paths no rule matches are allowed. */
  isAllowed(identity: string, url: string): boolean;
}

export interface PolicyResolverOptions {
  /** Directory holding `<site>_robots.txt` copies of fetched policies */
  cacheDir: string;
  /** Timeout for fetching a robots file */
  timeoutMs: number;
}

/**
 * Anything that can hand out crawl policies, `PolicyResolver` in a run.
 */
export interface CrawlPolicyProvider {
  resolve(origin: string, identity: string): Promise<CrawlPolicy>;
}
