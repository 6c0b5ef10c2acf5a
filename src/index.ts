// Library entry point; the command line lives in cli.ts
export * from "./types";
export {
  type AppConfig,
  type ConfigLayer,
  defaultConfig,
  mergeLayers,
  resolveConfig,
  validateConfig,
} from "./config";
export { createPipeline } from "./pipeline/factory";
export { PipelineCoordinator, partitionOutcomes } from "./pipeline/PipelineCoordinator";
export { PipelineRunStatus, type PipelineSummary, type PipelineRunOptions } from "./pipeline/types";
export { TaskExecutionError } from "./pipeline/errors";
export { TaskLimiter } from "./limiter/TaskLimiter";
export { LivenessProber } from "./probe/LivenessProber";
export { PolicyResolver } from "./policy/PolicyResolver";
export { createCrawlPolicy, minimumIntervalMs } from "./policy/CrawlPolicy";
export type { CrawlPolicy, RequestRate } from "./policy/types";
export { SessionManager } from "./session/SessionManager";
export { ScraperSession } from "./session/ScraperSession";
export { SessionState } from "./session/types";
export { ScreenshotCapturer } from "./capture/ScreenshotCapturer";
export { FrontPageStrategy, normalizeScreenshotFilename } from "./capture/FrontPageStrategy";
export { CsvRecordStore } from "./store/CsvRecordStore";
export { loadTargets } from "./store/TargetLoader";
export { RecordCollection } from "./store/types";
export { InputFormatError, StoreError } from "./store/errors";
export {
  ConfigurationError,
  EngineLaunchError,
  InvalidUrlError,
  PreconditionViolationError,
  SessionReleasedError,
} from "./utils/errors";
export { type Logger, LogLevel, createLogger } from "./utils/logger";
