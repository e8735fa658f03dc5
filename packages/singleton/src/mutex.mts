/**
 * Promise-based mutex for code that awaits while holding a lock.
 *
 * Waiters are granted the lock in arrival order. A release function only
 * works once; calling it again is a no-op.
 */

export type ReleaseLock = () => void;

export class Mutex {
  private locked = false;
  private readonly queue: ((release: ReleaseLock) => void)[] = [];

  /**
   * Acquire the mutex lock
   */
  acquire(): Promise<ReleaseLock> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    // wait for lock to be available
    return new Promise<ReleaseLock>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Execute a function with mutex protection. The lock is released on every
   * exit path, including when `fn` throws or rejects.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Check if mutex is currently locked
   */
  isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.queue.length;
  }

  private createRelease(): ReleaseLock {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // lock stays held; ownership moves to the next waiter
      next(this.createRelease());
      return;
    }
    this.locked = false;
  }
}
