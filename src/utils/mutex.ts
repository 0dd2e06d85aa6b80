/**
 * Async Mutex
 *
 * Serializes async critical sections on a single process. Callers run in
 * FIFO order; a rejected section releases the lock like a resolved one.
 *
 * @module utils/mutex
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `fn` once every previously queued section has finished
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Whether a section is running or queued */
  isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * One mutex per key, created on first use
 *
 * Entries are dropped once no section holds or waits on them.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked()) {
        this.locks.delete(key);
      }
    }
  }
}
