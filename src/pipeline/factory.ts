import path from "node:path";
import { FrontPageStrategy } from "../capture/FrontPageStrategy";
import { OriginThrottle } from "../capture/OriginThrottle";
import { ScreenshotCapturer } from "../capture/ScreenshotCapturer";
import type { AppConfig } from "../config";
import { PolicyResolver } from "../policy/PolicyResolver";
import { LivenessProber } from "../probe/LivenessProber";
import { SessionManager } from "../session/SessionManager";
import type { BrowserLauncher } from "../session/types";
import { CsvRecordStore } from "../store/CsvRecordStore";
import type { Logger } from "../utils/logger";
import { PipelineCoordinator } from "./PipelineCoordinator";

/**
 * Wires a coordinator for one run from its configuration.
 */
export function createPipeline(
  config: AppConfig,
  logger: Logger,
  launcher?: BrowserLauncher,
): PipelineCoordinator {
  const { crawler, paths } = config;

  const store = new CsvRecordStore(paths.output, logger);
  const policies = new PolicyResolver(
    { cacheDir: paths.policyCache, timeoutMs: crawler.policyTimeoutMs },
    logger,
  );
  const sessions = new SessionManager(
    {
      browser: config.browser,
      session: {
        navigationTimeoutMs: crawler.navigationTimeoutMs,
        maxNavigationAttempts: crawler.maxNavigationAttempts,
        userAgent: crawler.userAgent,
      },
    },
    logger,
    launcher,
  );
  const prober = new LivenessProber(
    { timeoutMs: crawler.probeTimeoutMs, userAgent: crawler.userAgent },
    logger,
  );
  const capturer = new ScreenshotCapturer(
    sessions,
    policies,
    new OriginThrottle(logger),
    new FrontPageStrategy(path.join(paths.output, "screenshots")),
    {
      userAgent: crawler.userAgent,
      navigationTimeoutMs: crawler.navigationTimeoutMs,
      maxNavigationAttempts: crawler.maxNavigationAttempts,
    },
    logger,
  );

  return new PipelineCoordinator(
    { store, prober, capturer, sessions },
    { probe: config.concurrency.probe, capture: config.concurrency.capture },
    logger,
  );
}
