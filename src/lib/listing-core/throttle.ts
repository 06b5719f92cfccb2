/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - REQUEST THROTTLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Global minimum spacing between requests sent to the origin. Every request
 * must `await throttle.acquire()` first and call `throttle.release()` once it
 * has completed, failed or not. The pause runs from the later of the last
 * grant and the last release. Grants are chained on one promise, so any
 * number of concurrent callers share a single rate limit.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

export interface ThrottleClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class ThrottleAbortedError extends Error {
  constructor() {
    super('Throttle wait aborted');
    this.name = 'ThrottleAbortedError';
  }
}

/**
 * Abortable sleep
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ThrottleAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new ThrottleAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const SYSTEM_CLOCK: ThrottleClock = {
  now: () => Date.now(),
  sleep,
};

export class RequestThrottle {
  private lastGrantAt: number | null = null;
  private lastReleaseAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: ThrottleClock = SYSTEM_CLOCK
  ) {}

  /**
   * Resolve once at least `minIntervalMs` has elapsed since the last grant
   * and since the last release.
   * Rejects with ThrottleAbortedError when the signal fires while waiting.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const grant = this.queue.then(() => this.waitTurn(signal));
    // A rejected wait must not poison the chain for later callers
    this.queue = grant.catch(() => undefined);
    return grant;
  }

  /**
   * Mark the granted request as finished
   */
  release(): void {
    this.lastReleaseAt = this.clock.now();
  }

  private async waitTurn(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ThrottleAbortedError();
    }

    const since = Math.max(this.lastGrantAt ?? -Infinity, this.lastReleaseAt ?? -Infinity);
    if (Number.isFinite(since)) {
      const elapsed = this.clock.now() - since;
      const remaining = this.minIntervalMs - elapsed;
      if (remaining > 0) {
        await this.clock.sleep(remaining, signal);
      }
    }

    this.lastGrantAt = this.clock.now();
  }
}
