/**
 * Runs async work one call at a time per key. Calls on different keys do not
 * wait for each other.
 */
export class KeyedMutex {
  // A key is present while a call holds it; the array holds the waiters
  private queues = new Map<string, Array<() => void>>();

  async lock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  private async acquire(key: string): Promise<void> {
    const waiting = this.queues.get(key);
    if (!waiting) {
      this.queues.set(key, []);
      return;
    }

    return new Promise<void>((resolve) => {
      waiting.push(resolve);
    });
  }

  private release(key: string): void {
    const next = this.queues.get(key)?.shift();
    if (next) {
      next();
    } else {
      this.queues.delete(key);
    }
  }
}

// Singleton instance
export const sessionLocks = new KeyedMutex();
