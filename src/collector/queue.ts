/**
 * Entry Queue
 *
 * Unbounded FIFO shared between the collector loop (single producer)
 * and any number of readers. All operations are synchronous, so each one
 * runs to completion before another task touches the queue.
 */

interface Waiter<T> {
  resolve: (item: T) => void;
}

export class EntryQueue<T> {
  private readonly items: T[] = [];
  /** Pending blocking reads, served in arrival order */
  private readonly waiters: Waiter<T>[] = [];

  /** Number of queued items (waiting readers are not counted) */
  get size(): number {
    return this.items.length;
  }

  /**
   * Appends an item. A waiting reader receives it directly.
   */
  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Removes and returns the oldest item, or undefined when empty.
   */
  poll(): T | undefined {
    return this.items.shift();
  }

  /**
   * Resolves with the oldest item, waiting for one if the queue is empty.
   * Rejects with the signal's reason if it aborts first.
   */
  take(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) return Promise.resolve(item);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Removes and returns every queued item, oldest first.
   */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  /** Number of readers blocked in take() */
  get pendingReads(): number {
    return this.waiters.length;
  }
}
