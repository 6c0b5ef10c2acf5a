export class PipelineError extends Error {
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

/**
 * A unit of work that was dispatched by the task limiter threw instead of
 * returning a classified record.
 */
export interface UnitOfWorkFailure {
  /** 1-based position of the input */
  index: number;
  error: Error;
}

/**
 * Raised by the task limiter after every dispatched unit settled, when at least one threw.
 * The first failure becomes the cause.
 */
export class TaskExecutionError extends PipelineError {
  constructor(
    public readonly label: string,
    public readonly failures: UnitOfWorkFailure[],
  ) {
    const first = failures[0];
    super(
      `${failures.length} ${label} task(s) failed; first at #${first?.index}: ${first?.error.message}`,
      first?.error,
    );
  }
}

