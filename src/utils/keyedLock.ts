/**
 * Async mutex keyed by an id (one queue per user).
 *
 * Calls to run() with the same key execute one at a time, in the order they
 * were made; calls with different keys never wait on each other. Keys with
 * nothing queued are dropped so idle users hold no memory.
 *
 * @example
 * ```typescript
 * const locks = new KeyedLock();
 * await locks.run(userId, async () => {
 *   const record = await load(userId);
 *   await save(userId, { ...record, visits: record.visits + 1 });
 * });
 * ```
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
