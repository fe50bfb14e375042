export type RequestLimiterOptions = {
  maxConcurrent: number;
  minDelayMs: number;
};

/**
 * Caps in-flight operations and spaces their start times. Used in front of
 * rate-limited upstream APIs.
 */
export class RequestLimiter {
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private lastDispatched = 0;

  constructor(private readonly options: RequestLimiterOptions) {}

  async schedule<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    while (true) {
      if (this.active < this.options.maxConcurrent) {
        const elapsed = Date.now() - this.lastDispatched;
        if (elapsed < this.options.minDelayMs) {
          await delay(this.options.minDelayMs - elapsed);
          continue;
        }

        this.active += 1;
        this.lastDispatched = Date.now();
        return;
      }

      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  private release(): void {
    this.active = Math.max(0, this.active - 1);
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

/**
 * Runs operations one at a time per key. Operations on different keys run
 * independently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      releaseLock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}

/**
 * Maps items through `worker` with at most `limit` workers in flight.
 * Results keep input order. The first rejection rejects the whole call.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const poolSize = Math.min(Math.max(1, Math.trunc(limit)), Math.max(items.length, 1));
  let nextIndex = 0;

  const runWorker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: poolSize }, () => runWorker()));
  return results;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
