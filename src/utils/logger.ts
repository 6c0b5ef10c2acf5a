/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

/**
 * Levelled logger handed to every component of a run.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Creates a logger that writes to the console, dropping messages above `level`.
 * Each run creates its own logger; there is no process-wide log level.
 */
export function createLogger(level: LogLevel = LogLevel.INFO): Logger {
  return {
    debug: (message: string) => {
      if (level >= LogLevel.DEBUG) {
        console.debug(message);
      }
    },
    info: (message: string) => {
      if (level >= LogLevel.INFO) {
        console.log(message); // Using console.log for INFO
      }
    },
    warn: (message: string) => {
      if (level >= LogLevel.WARN) {
        console.warn(message);
      }
    },
    // ERROR is the lowest level, so errors are always written
    error: (message: string) => {
      console.error(message);
    },
  };
}

/**
 * Maps the CLI's global flags to a log level. `silent` wins over `verbose`.
 */
export function logLevelFromFlags(flags: { verbose?: boolean; silent?: boolean }): LogLevel {
  if (flags.silent) {
    return LogLevel.ERROR;
  }
  if (flags.verbose) {
    return LogLevel.DEBUG;
  }
  return LogLevel.INFO;
}
