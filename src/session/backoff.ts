/**
 * Decides how long to wait before a retry. `retry` is 1 for the wait before
 * the second attempt, 2 before the third, and so on.
 */
export interface BackoffStrategy {
  delayBeforeRetry(retry: number): number;
}

/**
 * `initialDelayMs * factor ^ (retry - 1)`: 2 s, 4 s, 8 s... with the defaults.
 */
export class ExponentialBackoff implements BackoffStrategy {
  constructor(
    private readonly initialDelayMs = 2000,
    private readonly factor = 2,
  ) {}

  delayBeforeRetry(retry: number): number {
    return this.initialDelayMs * this.factor ** Math.max(0, retry - 1);
  }
}
