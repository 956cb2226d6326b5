/**
 * AsyncMutex - A mutual exclusion lock for async operations
 *
 * Ensures only one async operation holds the lock at a time. Waiters are
 * served in arrival order.
 *
 * Example:
 * ```typescript
 * const mutex = new AsyncMutex();
 * await mutex.withLock(async () => {
 *   // Critical section - only one execution at a time
 * });
 * ```
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of operations holding or waiting for the lock. */
  get size(): number {
    return this.pending;
  }

  async withLock<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });

    // Claim our slot before awaiting so concurrent callers queue behind us
    this.tail = current;
    this.pending++;

    try {
      await previous;
      return await operation();
    } finally {
      this.pending--;
      release();
    }
  }
}
