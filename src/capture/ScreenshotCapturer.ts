import fs from "node:fs/promises";
import path from "node:path";
import { minimumIntervalMs } from "../policy/CrawlPolicy";
import type { CrawlPolicyProvider } from "../policy/types";
import type { SessionProvider } from "../session/types";
import type { OutcomeRecord, Target } from "../types";
import {
  EngineLaunchError,
  PreconditionViolationError,
  SessionReleasedError,
  describeError,
} from "../utils/errors";
import type { Logger } from "../utils/logger";
import { getSiteOrigin } from "../utils/url";
import type { OriginThrottle } from "./OriginThrottle";
import type { CaptureStrategy, ScreenshotCapturerOptions } from "./types";

/**
 * Captures a screenshot of one live target, honouring the site's crawl policy.
 *
 * Every target yields exactly one SUCCESS or FAILURE record, including when
 * the run is cancelled mid-capture. Only programming defects and a browser
 * that cannot start are thrown.
 */
export class ScreenshotCapturer {
  constructor(
    private readonly sessions: SessionProvider,
    private readonly policies: CrawlPolicyProvider,
    private readonly throttle: OriginThrottle,
    private readonly strategy: CaptureStrategy,
    private readonly options: ScreenshotCapturerOptions,
    private readonly logger: Logger,
  ) {}

  async capture(target: Target, signal?: AbortSignal): Promise<OutcomeRecord> {
    const { userAgent } = this.options;

    let origin: string;
    try {
      origin = getSiteOrigin(target.url);
    } catch (error) {
      return this.strategy.failure(target, describeError(error));
    }

    const policy = await this.policies.resolve(origin, userAgent);
    if (!policy.isAllowed(userAgent, target.url)) {
      this.logger.warn(`🤖 ${target.url} is disallowed by robots.txt, skipping`);
      return this.strategy.failure(
        target,
        `Disallowed by robots.txt for user agent '${userAgent}': ${target.url}`,
      );
    }

    try {
      return await this.sessions.withSession(origin, async (session) => {
        session.start();
        await session.openContext();
        await session.openPage();

        // The politeness interval is measured between navigation starts
        await this.throttle.waitForTurn(origin, minimumIntervalMs(policy), signal);
        if (signal?.aborted) {
          return this.cancelled(target);
        }

        this.logger.info(`🌐 Going to ${target.url}...`);
        const navigation = await session.navigate(target.url, {
          timeoutMs: this.options.navigationTimeoutMs,
          maxAttempts: this.options.maxNavigationAttempts,
          signal,
        });
        if (!navigation.ok) {
          this.logger.error(`❌ Could not load ${target.url}: ${navigation.error.message}`);
          return this.strategy.failure(target, navigation.error.message);
        }
        if (signal?.aborted) {
          return this.cancelled(target);
        }

        const artifactPath = this.strategy.artifactPath(target);
        await fs.mkdir(path.dirname(artifactPath), { recursive: true });
        await session.screenshot(artifactPath);
        this.logger.info(`📸 Screenshot of ${target.url} saved to ${artifactPath}`);
        return this.strategy.success(target, artifactPath, navigation.value.status);
      });
    } catch (error) {
      if (error instanceof SessionReleasedError) {
        return this.cancelled(target);
      }
      if (error instanceof PreconditionViolationError || error instanceof EngineLaunchError) {
        throw error;
      }
      this.logger.error(`❌ Could not take screenshot of ${target.url}: ${describeError(error)}`);
      return this.strategy.failure(target, describeError(error));
    }
  }

  private cancelled(target: Target): OutcomeRecord {
    this.logger.warn(`🚫 Capture of ${target.url} cancelled`);
    return this.strategy.failure(target, `Capture of ${target.url} cancelled`);
  }
}
