/**
 * Per-key mutual exclusion.
 *
 * Callers holding different keys run in parallel; callers on the same key run
 * one at a time in arrival order. Keys with no waiters are dropped from the
 * map.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` exclusively for `key`. The lock is released when `fn` settles,
   * whether it resolves or throws.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
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

  /** Whether any caller holds or waits on `key` */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a holder or waiters */
  get size(): number {
    return this.tails.size;
  }
}
