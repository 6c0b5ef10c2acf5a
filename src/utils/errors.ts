class ScraperError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

class InvalidUrlError extends ScraperError {
  constructor(url: string, cause?: Error) {
    super(`Invalid URL: ${url}`, cause);
  }
}

/**
 * A session method was called in a state that does not allow it.
 * This is a bug in the caller, not a condition of the site being scraped.
 */
class PreconditionViolationError extends ScraperError {
  constructor(
    public readonly operation: string,
    public readonly actualState: string,
    public readonly expectedState: string,
  ) {
    super(`Cannot ${operation} while session is '${actualState}' (requires '${expectedState}')`);
  }
}

/**
 * The session's page was closed from outside, by a cancelled run, while its
 * capture was still using it.
 */
class SessionReleasedError extends ScraperError {
  constructor(
    public readonly operation: string,
    origin: string,
  ) {
    super(`Cannot ${operation}: session for ${origin} was released`);
  }
}

class EngineLaunchError extends ScraperError {
  constructor(message: string, cause?: Error) {
    super(`Failed to launch browser: ${message}`, cause);
  }
}

class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = this.constructor.name;
  }
}

/**
 * Renders any thrown value as a one-line description for an outcome record.
 */
function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export {
  ScraperError,
  InvalidUrlError,
  PreconditionViolationError,
  SessionReleasedError,
  EngineLaunchError,
  ConfigurationError,
  describeError,
};
