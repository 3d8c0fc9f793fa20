/**
 * In-process reader/writer lock.
 *
 * Readers share the lock, writers hold it alone. Waiters are granted in
 * arrival order, so a queued writer is not starved by a stream of readers.
 */

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private waiters: Waiter[] = [];

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writing) return false;
    return mode === 'read' || this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'read') {
      this.readers++;
    } else {
      this.writing = true;
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.readers--;
    } else {
      this.writing = false;
    }

    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.canGrant(next.mode)) break;
      this.waiters.shift();
      this.take(next.mode);
      next.grant();
    }
  }
}
