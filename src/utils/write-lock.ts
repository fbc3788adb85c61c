import { AsyncLocalStorage } from 'node:async_hooks';
import pLimit from 'p-limit';

/**
 * Store-wide mutual exclusion. Every mutation of links, filters and batches
 * runs through one instance, one task at a time.
 *
 * Re-entrant within a single async call chain: a locked operation may call
 * another locked operation without deadlocking. Work that must not inherit
 * the lock (listeners, spawned workers) is started through `outside`.
 */
export class WriteLock {
  private readonly limit = pLimit(1);
  private readonly context = new AsyncLocalStorage<WriteLock>();

  get isHeld(): boolean {
    return this.context.getStore() === this;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.isHeld) {
      return task();
    }
    return this.limit(() => this.context.run(this, task));
  }

  outside<T>(task: () => T): T {
    return this.context.exit(task);
  }
}
