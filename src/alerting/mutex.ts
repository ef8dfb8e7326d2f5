/**
 * Minimal async mutex.
 *
 * Waiters are served in FIFO order. The holder releases the lock in a
 * `finally`, so a throwing critical section cannot leave it locked.
 *
 * @module alerting/mutex
 */

export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `locked` stays true.
      next();
      return;
    }
    this.locked = false;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
