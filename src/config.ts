import fs from "node:fs/promises";
import path from "node:path";
import envPaths from "env-paths";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "./utils/errors";

/**
 * Default configuration values for a capture run
 */

/** Concurrent liveness probes */
export const DEFAULT_PROBE_CONCURRENCY = 5;

/** Concurrent browser captures */
export const DEFAULT_CAPTURE_CONCURRENCY = 10;

/** Timeout of the liveness GET */
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

/** Timeout of a robots.txt fetch */
export const DEFAULT_POLICY_TIMEOUT_MS = 10_000;

/** Timeout of a single navigation attempt, including the wait for network idle */
export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;

/** Hard upper bound on navigation attempts per capture */
export const MAX_NAVIGATION_ATTEMPTS = 3;

export const DEFAULT_MAX_NAVIGATION_ATTEMPTS = MAX_NAVIGATION_ATTEMPTS;

/** Client identity matched against robots.txt; `*` sends no User-Agent override */
export const DEFAULT_USER_AGENT = "*";

/** Prefix of every screenshot file name */
export const SCREENSHOT_PREFIX = "front_page";

export const APP_NAME = "frontpage-capture";

const positiveInt = () => z.coerce.number().int().min(1);

const configSchema = z.object({
  concurrency: z.object({
    probe: positiveInt(),
    capture: positiveInt(),
  }),
  browser: z.object({
    headless: z.boolean(),
    slowMo: z.coerce.number().int().min(0),
    launchArgs: z.array(z.string()),
    executablePath: z.string().min(1).optional(),
  }),
  paths: z.object({
    input: z.string().min(1),
    output: z.string().min(1),
    policyCache: z.string().min(1),
  }),
  crawler: z.object({
    userAgent: z.string().trim().min(1),
    probeTimeoutMs: positiveInt(),
    policyTimeoutMs: positiveInt(),
    navigationTimeoutMs: positiveInt(),
    maxNavigationAttempts: positiveInt().max(MAX_NAVIGATION_ATTEMPTS),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * A partial configuration from one source. Later layers win; `undefined`
 * values never override.
 */
export type ConfigLayer = Record<string, unknown>;

export interface ResolveConfigOptions {
  /** YAML file to read; it must exist when given */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Values from CLI flags */
  overrides?: ConfigLayer;
  /** Base for relative paths */
  cwd?: string;
}

export function defaultConfig(cwd: string = process.cwd()): AppConfig {
  return {
    concurrency: {
      probe: DEFAULT_PROBE_CONCURRENCY,
      capture: DEFAULT_CAPTURE_CONCURRENCY,
    },
    browser: {
      headless: true,
      slowMo: 0,
      launchArgs: [],
    },
    paths: {
      input: path.join(cwd, "input"),
      output: path.join(cwd, "output"),
      policyCache: path.join(envPaths(APP_NAME, { suffix: "" }).cache, "robots"),
    },
    crawler: {
      userAgent: DEFAULT_USER_AGENT,
      probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
      policyTimeoutMs: DEFAULT_POLICY_TIMEOUT_MS,
      navigationTimeoutMs: DEFAULT_NAVIGATION_TIMEOUT_MS,
      maxNavigationAttempts: DEFAULT_MAX_NAVIGATION_ATTEMPTS,
    },
  };
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Deep-merges `layers` into a copy of `base`, left to right.
 */
export function mergeLayers(base: ConfigLayer, ...layers: ConfigLayer[]): ConfigLayer {
  const result: ConfigLayer = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = result[key];
      result[key] =
        isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
    }
  }
  return result;
}

/**
 * Reads a YAML configuration file.
 * @throws {ConfigurationError} If the file is missing, unparsable or not a mapping
 */
export async function readConfigFile(file: string): Promise<ConfigLayer> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${file}: ${error}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${file}: ${error}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Configuration file ${file} must contain a mapping`);
  }
  return parsed;
}

const envBoolean = (value: string | undefined): boolean | string | undefined => {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  // Left as a string so validation reports it
  return value;
};

const envList = (value: string | undefined): string[] | undefined =>
  value === undefined ? undefined : value.split(" ").filter((arg) => arg.length > 0);

/**
 * Maps environment variables onto the configuration sections.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  return {
    concurrency: {
      probe: env.FRONTPAGE_PROBE_CONCURRENCY,
      capture: env.FRONTPAGE_CAPTURE_CONCURRENCY,
    },
    browser: {
      headless: envBoolean(env.FRONTPAGE_HEADLESS),
      slowMo: env.FRONTPAGE_SLOW_MO,
      launchArgs: envList(env.PLAYWRIGHT_LAUNCH_ARGS),
      executablePath: env.PLAYWRIGHT_EXECUTABLE_PATH,
    },
    paths: {
      input: env.FRONTPAGE_INPUT_DIR,
      output: env.FRONTPAGE_OUTPUT_DIR,
      policyCache: env.FRONTPAGE_POLICY_CACHE_DIR,
    },
    crawler: {
      userAgent: env.FRONTPAGE_USER_AGENT,
      probeTimeoutMs: env.FRONTPAGE_PROBE_TIMEOUT_MS,
      policyTimeoutMs: env.FRONTPAGE_POLICY_TIMEOUT_MS,
      navigationTimeoutMs: env.FRONTPAGE_NAVIGATION_TIMEOUT_MS,
    },
  };
}

/**
 * Validates a merged configuration and resolves its paths against `cwd`.
 * @throws {ConfigurationError} Listing every invalid key
 */
export function validateConfig(raw: ConfigLayer, cwd: string = process.cwd()): AppConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const config = parsed.data;
  return {
    ...config,
    paths: {
      input: path.resolve(cwd, config.paths.input),
      output: path.resolve(cwd, config.paths.output),
      policyCache: path.resolve(cwd, config.paths.policyCache),
    },
  };
}

/**
 * Builds the run configuration: defaults, then the YAML file, then the
 * environment, then CLI flags.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd();
  const fileLayer = options.configFile ? await readConfigFile(options.configFile) : {};
  const merged = mergeLayers(
    defaultConfig(cwd),
    fileLayer,
    configFromEnv(options.env ?? process.env),
    options.overrides ?? {},
  );
  return validateConfig(merged, cwd);
}
