interface LockEntry {
  tail: Promise<void>;
  holders: number;
}

/**
 * One FIFO lock per key, created on first use and dropped once nobody holds or awaits it.
 */
export class KeyedMutex {
  private locks: Map<string, LockEntry> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { tail: Promise.resolve(), holders: 0 };
      this.locks.set(key, entry);
    }

    entry.holders++;
    const previous = entry.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    entry.tail = previous.then(() => current);

    try {
      await previous;
      return await task();
    } finally {
      release();
      entry.holders--;
      if (entry.holders === 0) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  get size(): number {
    return this.locks.size;
  }
}
