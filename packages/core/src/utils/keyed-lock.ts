import { Mutex } from "async-mutex";

interface LockEntry {
  mutex: Mutex;
  users: number;
}

/**
 * Async mutual exclusion per key. Callers on the same key run one at a time
 * in arrival order; callers on different keys never wait on each other.
 * A key's mutex is dropped once nobody holds or waits on it.
 */
export class KeyedLock {
  private locks = new Map<string, LockEntry>();

  async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.locks.set(key, entry);
    }
    entry.users++;

    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys with a holder or waiters. */
  get activeKeys(): number {
    return this.locks.size;
  }
}
