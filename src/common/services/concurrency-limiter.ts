/**
 * Bounded concurrency for upstream model calls
 *
 * ConcurrencyLimiter caps how many embedding or generation calls are in
 * flight; calls over the limit queue in FIFO order instead of failing.
 * KeyedLock serializes work on one key (a tenant's document) while other
 * keys proceed freely.
 */

export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /**
   * Run fn once a slot is free; the slot is released however fn settles
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getActive(): number {
    return this.active;
  }

  getQueued(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    // The slot is handed over directly by release(), so active stays counted
    return new Promise(resolve => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}

/**
 * Per-key mutual exclusion
 *
 * Calls for the same key run one after another in arrival order.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      releaseLock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
