/**
 * backend/src/shared/concurrency/rw-lock.ts
 *
 * WHY:
 * - In-memory stores are shared by every in-flight request.
 * - Handlers interleave at every `await`, so a check-then-act sequence that
 *   spans an await point is only safe inside an exclusive section.
 *
 * SEMANTICS:
 * - Any number of readers may hold the lock together.
 * - A writer holds it alone.
 * - Waiters are served FIFO. Once a writer is queued, readers arriving after it
 *   wait behind it (no writer starvation).
 *
 * HOW TO USE:
 * - const rows = await lock.withRead(() => snapshot())
 * - await lock.withWrite(async () => { check(); insert(); })
 */

type Waiter = {
  mode: 'read' | 'write';
  grant: () => void;
};

export type RwLockState = {
  activeReaders: number;
  writerActive: boolean;
  queued: number;
};

export class RwLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waiters: Waiter[] = [];

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.activeReaders -= 1;
      this.drain();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writerActive = false;
      this.drain();
    }
  }

  state(): RwLockState {
    return {
      activeReaders: this.activeReaders,
      writerActive: this.writerActive,
      queued: this.waiters.length,
    };
  }

  private acquire(mode: Waiter['mode']): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  private canGrant(mode: Waiter['mode']): boolean {
    if (this.writerActive) return false;
    return mode === 'read' || this.activeReaders === 0;
  }

  private take(mode: Waiter['mode']): void {
    if (mode === 'write') {
      this.writerActive = true;
    } else {
      this.activeReaders += 1;
    }
  }

  // Grants the head of the queue; consecutive readers are admitted together.
  private drain(): void {
    for (;;) {
      const next = this.waiters[0];
      if (!next || !this.canGrant(next.mode)) return;

      this.waiters.shift();
      this.take(next.mode);
      next.grant();

      if (next.mode === 'write') return;
    }
  }
}
