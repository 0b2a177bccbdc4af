/**
 * A FIFO mutual-exclusion lock for async code.
 *
 * Waiters are queued and granted the lock one at a time in arrival order.
 */

/** Call once to give the lock back. */
export type Release = () => void;

export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  /** Whether someone currently holds the lock. */
  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.waiters.length;
  }

  /** Wait for the lock. The returned function releases it. */
  acquire(): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve) => {
      this.waiters.push(() => resolve(this.createRelease()));
    });
  }

  /** Run `fn` while holding the lock, releasing it even if `fn` throws. */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  /** Pass the lock straight to the next waiter, or unlock. */
  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
