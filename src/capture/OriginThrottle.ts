import type { Logger } from "../utils/logger";
import { sleep } from "../utils/timing";

/**
 * Spaces out navigations to the same origin.
 *
 * Each call reserves the next free slot for its origin before waiting, so
 * concurrent callers for one origin queue up `intervalMs` apart. The first
 * call for an origin never waits.
 */
export class OriginThrottle {
  private readonly nextSlot = new Map<string, number>();

  constructor(private readonly logger: Logger) {}

  async waitForTurn(origin: string, intervalMs: number, signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot.get(origin) ?? now);
    this.nextSlot.set(origin, slot + intervalMs);

    const wait = slot - now;
    if (wait > 0) {
      this.logger.debug(`🐢 Waiting ${wait}ms before the next request to ${origin}`);
      await sleep(wait, signal);
    }
  }
}
