/**
 * Serialises async work per key: tasks for the same key run one after the
 * other, tasks for different keys run freely.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string | number, task: () => Promise<T>): Promise<T> {
    const k = String(key);
    const previous = this.tails.get(k) ?? Promise.resolve();
    const current = previous.then(() => task());
    // The queue continues whether the task succeeds or fails.
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(k, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(k) === tail) {
        this.tails.delete(k);
      }
    }
  }

  /**
   * Number of keys with queued or running work.
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}

/**
 * Runs `worker` over `items` with at most `limit` running at once.
 * A failing item never stops the others; every outcome is returned in input order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const runner = async () => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: "fulfilled", value: await worker(items[index]) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  const runners = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    () => runner(),
  );
  await Promise.all(runners);
  return results;
}
