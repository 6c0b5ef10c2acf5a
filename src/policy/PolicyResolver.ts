import fs from "node:fs/promises";
import path from "node:path";
import axios, { type AxiosRequestConfig } from "axios";
import type { Logger } from "../utils/logger";
import { deadlineSignal } from "../utils/timing";
import { policyUrlFor, siteDirectoryName } from "../utils/url";
import { createAllowAllPolicy, createCrawlPolicy } from "./CrawlPolicy";
import type { CrawlPolicy, CrawlPolicyProvider, PolicyResolverOptions } from "./types";

/**
 * Obtains the crawl policy of an origin for a client identity.
 *
 * Lookups go memory, then the on-disk cache, then the network. A robots file
 * fetched with status 200 is written to the cache; any other outcome falls back
 * to the allow-all policy for the rest of the run.
 */
export class PolicyResolver implements CrawlPolicyProvider {
  private readonly policies = new Map<string, Promise<CrawlPolicy>>();
  private readonly options: PolicyResolverOptions;
  private readonly logger: Logger;

  constructor(options: PolicyResolverOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
  }

  /**
   * Resolves the policy for `origin`. Concurrent calls for the same origin and
   * identity share one lookup. Never rejects.
   */
  resolve(origin: string, identity: string): Promise<CrawlPolicy> {
    const key = `${origin}|${identity}`;
    let policy = this.policies.get(key);
    if (!policy) {
      policy = this.lookup(origin, identity);
      this.policies.set(key, policy);
    }
    return policy;
  }

  /**
   * Path of the cached robots file for an origin.
   */
  cachePath(origin: string): string {
    return path.join(this.options.cacheDir, `${siteDirectoryName(origin)}_robots.txt`);
  }

  private async lookup(origin: string, identity: string): Promise<CrawlPolicy> {
    const robotsUrl = policyUrlFor(origin);

    const cached = await this.readCache(origin);
    if (cached !== null) {
      this.logger.debug(`📄 Using cached robots.txt for ${origin}`);
      return createCrawlPolicy(origin, robotsUrl, cached, identity, "cache");
    }

    const fetched = await this.fetchPolicy(robotsUrl, identity);
    if (fetched === null) {
      return createAllowAllPolicy(origin);
    }

    await this.writeCache(origin, fetched);
    return createCrawlPolicy(origin, robotsUrl, fetched, identity, "network");
  }

  private async readCache(origin: string): Promise<string | null> {
    const file = this.cachePath(origin);
    try {
      return await fs.readFile(file, "utf-8");
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        this.logger.warn(`⚠️ Could not read cached robots.txt ${file}: ${error}`);
      }
      return null;
    }
  }

  private async writeCache(origin: string, content: string): Promise<void> {
    const file = this.cachePath(origin);
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, content, "utf-8");
    } catch (error) {
      // The policy still applies for this run
      this.logger.warn(`⚠️ Could not cache robots.txt at ${file}: ${error}`);
    }
  }

  private async fetchPolicy(robotsUrl: string, identity: string): Promise<string | null> {
    const deadline = deadlineSignal(this.options.timeoutMs);
    const config: AxiosRequestConfig = {
      responseType: "text",
      timeout: this.options.timeoutMs,
      signal: deadline.signal,
      validateStatus: () => true,
      headers: identity === "*" ? undefined : { "User-Agent": identity },
    };

    try {
      const response = await axios.get<string>(robotsUrl, config);
      if (response.status !== 200) {
        this.logger.info(
          `🤖 ${robotsUrl} returned ${response.status}, treating the site as unrestricted`,
        );
        return null;
      }
      return typeof response.data === "string" ? response.data : String(response.data);
    } catch (error) {
      const reason = deadline.expired()
        ? `no complete response within ${this.options.timeoutMs}ms`
        : String(error);
      this.logger.warn(
        `⚠️ Could not fetch ${robotsUrl}, treating the site as unrestricted: ${reason}`,
      );
      return null;
    }
  }
}
