type ReleaseFn = () => void;

/**
 * FIFO single-permit lock for async critical sections.
 * Synchronous code on the event loop is already atomic; this is for sections that await.
 */
export class Mutex {
  private locked = false;
  private queue: Array<(release: ReleaseFn) => void> = [];

  constructor(private readonly name: string) {}

  stats(): { name: string; locked: boolean; queued: number } {
    return { name: this.name, locked: this.locked, queued: this.queue.length };
  }

  acquire(): Promise<ReleaseFn> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.makeRelease());
    }
    return new Promise<ReleaseFn>(resolve => {
      this.queue.push(resolve);
    });
  }

  /** Runs `fn` while holding the lock; the lock is released however `fn` settles. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private makeRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (!next) {
        this.locked = false;
        return;
      }

      // Hand the lock straight to the next waiter; it stays locked.
      next(this.makeRelease());
    };
  }
}
