/**
 * Read/write lock for async critical sections
 *
 * Readers share the lock; a writer runs alone once active readers drain.
 * Waiters are granted in arrival order, so a queued writer holds back
 * readers that arrive after it.
 */

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  /**
   * Run `fn` while holding a shared read lock
   */
  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  /**
   * Run `fn` while holding the exclusive write lock
   */
  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.queue.length;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.queue.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private canGrant(mode: LockMode): boolean {
    if (mode === 'read') {
      return !this.writing;
    }
    return !this.writing && this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'read') {
      this.readers++;
    } else {
      this.writing = true;
    }
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.readers--;
    } else {
      this.writing = false;
    }

    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.mode)) break;
      this.queue.shift();
      next.grant();
    }
  }
}
