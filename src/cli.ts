#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import packageJson from "../package.json";
import { type ConfigLayer, resolveConfig } from "./config";
import { TaskLimiter } from "./limiter/TaskLimiter";
import type { LimiterProgress } from "./limiter/types";
import { createPipeline } from "./pipeline/factory";
import { PipelineRunStatus } from "./pipeline/types";
import { minimumIntervalMs } from "./policy/CrawlPolicy";
import { PolicyResolver } from "./policy/PolicyResolver";
import { LivenessProber } from "./probe/LivenessProber";
import { loadTargets } from "./store/TargetLoader";
import type { Target } from "./types";
import { describeError } from "./utils/errors";
import { makeTargetId } from "./utils/fingerprint";
import { type Logger, createLogger, logLevelFromFlags } from "./utils/logger";
import { formatDuration } from "./utils/timing";
import { getSiteOrigin } from "./utils/url";

interface GlobalOptions {
  verbose: boolean;
  silent: boolean;
  config?: string;
}

interface RunOptions {
  input?: string;
  output?: string;
  probeConcurrency?: string;
  captureConcurrency?: string;
  userAgent?: string;
  headed?: boolean;
}

/** Exit code of a run stopped by Ctrl+C */
const EXIT_INTERRUPTED = 130;

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

async function main(): Promise<number> {
  const controller = new AbortController();
  let logger: Logger = createLogger();
  let exitCode = 0;

  // First Ctrl+C lets in-flight work settle; the second one exits
  process.on("SIGINT", () => {
    if (controller.signal.aborted) {
      console.error("🛑 Interrupted again, exiting now");
      process.exit(EXIT_INTERRUPTED);
    }
    console.warn("🛑 Interrupt received, finishing in-flight work. Press Ctrl+C again to exit now.");
    controller.abort();
  });

  const program = new Command();

  program
    .name("frontpage-capture")
    .description("Probe a list of front pages and screenshot the live ones, politely")
    .version(packageJson.version)
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false)
    .option("-c, --config <file>", "YAML configuration file");

  const loadConfig = (overrides?: ConfigLayer) =>
    resolveConfig({ configFile: program.opts<GlobalOptions>().config, overrides });

  const reportProgress = (progress: LimiterProgress) => {
    logger.debug(
      `${progress.label}: ${progress.completed}/${progress.total} done, ${progress.inFlight} in flight`,
    );
  };

  program
    .command("run")
    .description("Probe every target, then screenshot the ones that are up")
    .option("-i, --input <path>", "CSV file, or directory of CSV files, listing the targets")
    .option("-o, --output <dir>", "Directory for the CSV collections and screenshots")
    .option("--probe-concurrency <number>", "Maximum concurrent liveness probes")
    .option("--capture-concurrency <number>", "Maximum concurrent browser captures")
    .option("--user-agent <string>", "Identity matched against robots.txt ('*' for none)")
    .option("--headed", "Show the browser window")
    .action(async (options: RunOptions) => {
      const config = await loadConfig({
        paths: { input: options.input, output: options.output },
        concurrency: { probe: options.probeConcurrency, capture: options.captureConcurrency },
        crawler: { userAgent: options.userAgent },
        browser: { headless: options.headed ? false : undefined },
      });
      // Fails on a bad concurrency before any input is read
      const pipeline = createPipeline(config, logger);

      const targets = await loadTargets(config.paths.input, logger);
      if (targets.length === 0) {
        logger.info(`✅ Nothing to process: no targets in ${config.paths.input}`);
        return;
      }

      const summary = await pipeline.run(targets, {
        signal: controller.signal,
        onProgress: reportProgress,
      });
      console.log(
        formatOutput({
          status: summary.status,
          skipped: summary.skipped,
          up: summary.up.length,
          down: summary.down.length,
          captured: summary.success.length,
          failed: summary.failure.length,
          duration: formatDuration(summary.durationMs),
        }),
      );
      if (summary.status === PipelineRunStatus.CANCELLED) {
        exitCode = EXIT_INTERRUPTED;
      }
    });

  program
    .command("probe <urls...>")
    .description("Probe URLs and print the records, without saving anything")
    .action(async (urls: string[]) => {
      const config = await loadConfig();
      const prober = new LivenessProber(
        { timeoutMs: config.crawler.probeTimeoutMs, userAgent: config.crawler.userAgent },
        logger,
      );
      const limiter = new TaskLimiter(config.concurrency.probe, logger, "probe");
      const targets: Target[] = urls.map((url) => ({
        id: makeTargetId(url, url),
        url,
        displayName: url,
      }));

      const records = await limiter.run(
        targets,
        (_index, target, signal) => prober.probe(target, signal),
        { signal: controller.signal, onProgress: reportProgress },
      );
      console.log(formatOutput(records));
    });

  program
    .command("policy <url>")
    .description("Show the crawl policy that applies to a URL")
    .action(async (url: string) => {
      const config = await loadConfig();
      const { userAgent } = config.crawler;
      const origin = getSiteOrigin(url);
      const resolver = new PolicyResolver(
        { cacheDir: config.paths.policyCache, timeoutMs: config.crawler.policyTimeoutMs },
        logger,
      );

      const policy = await resolver.resolve(origin, userAgent);
      console.log(
        formatOutput({
          origin,
          userAgent,
          source: policy.source,
          allowed: policy.isAllowed(userAgent, url),
          crawlDelaySeconds: policy.crawlDelaySeconds,
          requestRate: policy.requestRate,
          minimumIntervalMs: minimumIntervalMs(policy),
        }),
      );
    });

  // Hook to set log level after parsing global options but before executing command action
  program.hook("preAction", (thisCommand) => {
    logger = createLogger(logLevelFromFlags(thisCommand.opts<GlobalOptions>()));
  });

  try {
    await program.parseAsync();
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    return 1;
  }
  return exitCode;
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
