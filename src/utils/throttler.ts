/**
 * FIFO throttler to space out provider calls, plus a bounded worker pool.
 */

export class RequestThrottler {
  private lastStart = 0;
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly minIntervalMs: number = 0) {}

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    if (this.minIntervalMs <= 0) {
      return fn();
    }

    // Only the start gate is chained; calls themselves may overlap
    const gate = this.chain.then(async () => {
      const waitMs = Math.max(0, this.minIntervalMs - (Date.now() - this.lastStart));
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStart = Date.now();
    });
    this.chain = gate;
    await gate;
    return fn();
  }
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Items are
 * taken in order; once `signal` aborts no further items start.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  concurrency: number,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  const lanes = Math.max(1, Math.min(concurrency, items.length));
  const workers = Array.from({ length: lanes }, async () => {
    while (next < items.length && !signal?.aborted) {
      const index = next;
      next += 1;
      await worker(items[index], index);
    }
  });

  await Promise.all(workers);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
