/**
 * KeyedLock - Async mutual exclusion per string key
 *
 * Waiters for the same key are served in FIFO order. Locks for several keys
 * are always taken in ascending key order, so two callers that need
 * overlapping key sets cannot deadlock.
 */

/** Releases a held lock. Calling it more than once has no effect. */
export type Release = () => void;

export class KeyedLock {
  /** Tail of the wait queue per key */
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Wait until the lock for `key` is free and take it
   */
  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      // Last holder in line cleans up so idle keys do not accumulate
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /**
   * Take the locks for every key, in ascending order
   */
  async acquireMany(keys: Iterable<string>): Promise<Release> {
    const ordered = sortKeys(keys);
    const releases: Release[] = [];

    for (const key of ordered) {
      releases.push(await this.acquire(key));
    }

    return () => {
      for (let i = releases.length - 1; i >= 0; i--) {
        releases[i]?.();
      }
    };
  }

  /**
   * Run `fn` while holding the lock for `key`
   */
  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run `fn` while holding the locks for every key
   */
  async runExclusiveMany<T>(keys: Iterable<string>, fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireMany(keys);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Check if some caller holds or waits for `key` */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys currently held or awaited */
  get size(): number {
    return this.tails.size;
  }
}

/**
 * De-duplicate and sort keys by code unit order (locale independent)
 */
export function sortKeys(keys: Iterable<string>): string[] {
  return [...new Set(keys)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
