/**
 * Concurrency primitives for the ingestion worker pool.
 */

/**
 * One async critical section per key. Callers with the same key run one
 * after another in arrival order; different keys run in parallel.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether a critical section for the key is running or queued */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Map over items with at most `limit` calls in flight. Results keep input
 * order. When the signal fires, no new item starts and unstarted slots stay
 * undefined. The first error is rethrown once in-flight calls settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  // Shared iterator: each worker pulls the next unclaimed item
  const queue = items.entries();
  let failed = false;

  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      if (failed || signal?.aborted) {
        return;
      }
      try {
        results[index] = await fn(item, index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  const settled = await Promise.allSettled(workers);
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }
  return results;
}
