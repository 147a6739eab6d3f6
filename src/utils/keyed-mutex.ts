/**
 * Per-key mutual exclusion for async work.
 *
 * Tasks sharing a key run one at a time in call order; tasks on different keys
 * run independently. Used by the index store to serialize writes per source.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier task for `key` has settled.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // The chain must never reject, or later waiters would skip their turn
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
