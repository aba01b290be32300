/**
 * Simple FIFO throttler to space out provider calls.
 * Ensures deterministic ordering and a minimum interval between task starts.
 */
export class RequestThrottler {
  private lastStart = 0;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(private readonly minIntervalMs: number = 0) {}

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(async () => {
      const now = Date.now();
      const waitMs = Math.max(0, this.minIntervalMs - (now - this.lastStart));
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStart = Date.now();
      return fn();
    });
    // Keep chain alive; the caller of `schedule` still sees the rejection
    this.chain = run.catch(() => undefined);
    return run;
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
