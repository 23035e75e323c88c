/**
 * Async mutual exclusion. Cooperative scheduling still lets two tasks interleave
 * between an `await`ed check and the update that depends on it, so shared windows
 * and credentials are mutated only inside `runExclusive`.
 *
 * Waiters are served in FIFO order; the lock is handed directly to the next
 * waiter on release so a newcomer cannot barge in between.
 */
export class Mutex {
  private locked = false;
  private waiters: (() => void)[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve) => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
