/**
 * Resolves after `ms` milliseconds, or as soon as `signal` aborts.
 * Callers check `signal.aborted` afterwards to tell the two apart.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

/**
 * Aborts once `ms` have passed since the call, or as soon as `signal` aborts.
 * `expired` tells a deadline apart from the caller's own cancellation.
 */
export function deadlineSignal(ms: number, signal?: AbortSignal) {
  const deadline = AbortSignal.timeout(ms);
  return {
    signal: signal ? AbortSignal.any([deadline, signal]) : deadline,
    expired: () => deadline.aborted && !signal?.aborted,
  };
}
