class StoreError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(cause ? `${message} caused by ${cause}` : message);
    this.name = this.constructor.name;

    const causeError =
      cause instanceof Error ? cause : cause ? new Error(String(cause)) : undefined;
    if (causeError?.stack) {
      this.stack = causeError.stack;
    }
  }
}

/**
 * The target input is missing or does not have the expected columns.
 */
class InputFormatError extends StoreError {
  constructor(
    public readonly source: string,
    reason: string,
  ) {
    super(`Cannot load targets from ${source}: ${reason}`);
  }
}

export { StoreError, InputFormatError };
