import robotsParser from "robots-parser";
import type { CrawlPolicy, PolicySource, RequestRate } from "./types";

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600 };

/**
 * Reduces a user agent to the token robots.txt stanzas are matched against:
 * `MyBot/2.1 (+https://example.com)` -> `mybot`.
 */
export function productToken(identity: string): string {
  const slash = identity.indexOf("/");
  const token = (slash === -1 ? identity : identity.slice(0, slash)).trim().toLowerCase();
  return token || "*";
}

/**
 * Extracts the `Request-rate` directive that applies to `identity`.
 *
 * Stanzas are grouped the usual way: consecutive `User-agent` lines share the
 * rules that follow them. The stanza naming the identity's product token wins,
 * otherwise the `*` stanza applies.
 */
export function parseRequestRate(content: string, identity: string): RequestRate | null {
  const token = productToken(identity);
  const rates = new Map<string, RequestRate>();
  let agents: string[] = [];
  let collectingAgents = false;

  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    const separator = line.indexOf(":");
    if (separator === -1) continue;

    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (field === "user-agent") {
      if (!collectingAgents) {
        agents = [];
        collectingAgents = true;
      }
      agents.push(value.toLowerCase());
      continue;
    }

    collectingAgents = false;
    if (field !== "request-rate") continue;

    const match = /^(\d+)\s*\/\s*(\d+)\s*([smh]?)$/i.exec(value);
    if (!match) continue;
    const requests = Number(match[1]);
    const seconds = Number(match[2]) * (UNIT_SECONDS[(match[3] || "s").toLowerCase()] ?? 1);
    if (requests <= 0 || seconds <= 0) continue;

    for (const agent of agents) {
      if (!rates.has(agent)) {
        rates.set(agent, { requests, seconds });
      }
    }
  }

  return rates.get(token) ?? rates.get("*") ?? null;
}

/**
 * Builds the policy for an origin from the text of its robots file.
 */
export function createCrawlPolicy(
  origin: string,
  robotsUrl: string,
  content: string,
  identity: string,
  source: Exclude<PolicySource, "unavailable">,
): CrawlPolicy {
  const robots = robotsParser(robotsUrl, content);
  const crawlDelay = robots.getCrawlDelay(identity);

  return Object.freeze({
    origin,
    source,
    requestRate: parseRequestRate(content, identity),
    crawlDelaySeconds:
      crawlDelay !== undefined && Number.isFinite(crawlDelay) && crawlDelay > 0
        ? Math.trunc(crawlDelay)
        : null,
    // Foreign-origin URLs come back undefined; nothing forbids them here
    isAllowed: (agent: string, url: string) => robots.isAllowed(url, agent) ?? true,
  });
}

/**
 * Policy used when a site's robots file cannot be obtained: everything is allowed,
 * at default pace.
 */
export function createAllowAllPolicy(origin: string): CrawlPolicy {
  return Object.freeze({
    origin,
    source: "unavailable",
    requestRate: null,
    crawlDelaySeconds: null,
    isAllowed: () => true,
  });
}

/**
 * Minimum gap between two navigations to the policy's origin, in milliseconds.
 * The stricter of `Crawl-delay` and `Request-rate` applies.
 */
export function minimumIntervalMs(policy: CrawlPolicy): number {
  const delayMs = (policy.crawlDelaySeconds ?? 0) * 1000;
  const rateMs = policy.requestRate
    ? (policy.requestRate.seconds / policy.requestRate.requests) * 1000
    : 0;
  return Math.max(delayMs, rateMs);
}
