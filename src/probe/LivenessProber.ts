import axios, { type AxiosRequestConfig } from "axios";
import { Classification, type OutcomeRecord, type Target, createOutcomeRecord } from "../types";
import { describeError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { deadlineSignal } from "../utils/timing";
import { validateUrl } from "../utils/url";

export interface LivenessProberOptions {
  timeoutMs: number;
  /** Sent as the User-Agent header unless it is the wildcard `*` */
  userAgent: string;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

/**
 * Classifies a target as UP or DOWN with a single HTTP GET.
 *
 * Only status 200 counts as UP. Transport failures become DOWN records whose
 * error names the failure kind; nothing is retried and nothing is thrown.
 */
export class LivenessProber {
  private readonly options: LivenessProberOptions;
  private readonly logger: Logger;

  constructor(options: LivenessProberOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
  }

  async probe(target: Target, signal?: AbortSignal): Promise<OutcomeRecord> {
    try {
      validateUrl(target.url);
    } catch (error) {
      this.logger.warn(`⚠️ Skipping probe: ${describeError(error)}`);
      return createOutcomeRecord(target, Classification.Down, { error: describeError(error) });
    }

    // axios' own timeout only covers idle sockets; the deadline covers the whole exchange
    const deadline = deadlineSignal(this.options.timeoutMs, signal);
    const config: AxiosRequestConfig = {
      timeout: this.options.timeoutMs,
      signal: deadline.signal,
      maxRedirects: 5,
      // Every status is an answer; only transport failures should throw
      validateStatus: () => true,
      headers:
        this.options.userAgent === "*" ? undefined : { "User-Agent": this.options.userAgent },
    };

    try {
      const response = await axios.get(target.url, config);
      const classification =
        response.status === 200 ? Classification.Up : Classification.Down;
      this.logger.debug(`🔎 ${target.url} -> ${response.status} (${classification})`);
      return createOutcomeRecord(target, classification, { statusCode: response.status });
    } catch (error) {
      const description = deadline.expired()
        ? `TimeoutError for ${target.url}: no complete response within ${this.options.timeoutMs}ms`
        : this.describeFailure(target.url, error);
      this.logger.warn(`⚠️ Probe failed: ${description}`);
      return createOutcomeRecord(target, Classification.Down, { error: description });
    }
  }

  private describeFailure(url: string, error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
      if (TIMEOUT_CODES.has(error.code)) {
        return `TimeoutError for ${url}: ${message}`;
      }
      return `ClientError for ${url}: ${message}`;
    }
    return `Unknown error for ${url}: ${message}`;
  }
}
