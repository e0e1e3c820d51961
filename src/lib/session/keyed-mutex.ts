type LockState = {
  waiters: Array<() => void>;
};

/**
 * One lock per key, created on first use and dropped once nobody holds or waits
 * for it. Waiters on a key are served in arrival order; different keys never
 * contend.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LockState>();

  async runExclusive<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    const state = await this.acquire(key);

    try {
      return await operation();
    } finally {
      this.release(key, state);
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  /** Keys currently held or awaited. */
  get size(): number {
    return this.locks.size;
  }

  /**
   * Forgets every lock. Queued waiters are woken; their later releases no longer
   * affect locks taken after the clear.
   */
  clear(): void {
    const states = Array.from(this.locks.values());
    this.locks.clear();

    for (const state of states) {
      for (const wake of state.waiters.splice(0)) {
        wake();
      }
    }
  }

  private acquire(key: string): Promise<LockState> {
    const state = this.locks.get(key);

    if (!state) {
      const created: LockState = { waiters: [] };
      this.locks.set(key, created);
      return Promise.resolve(created);
    }

    return new Promise<LockState>((resolve) => {
      state.waiters.push(() => resolve(state));
    });
  }

  private release(key: string, state: LockState): void {
    if (this.locks.get(key) !== state) {
      return;
    }

    const next = state.waiters.shift();

    if (next) {
      next();
      return;
    }

    this.locks.delete(key);
  }
}
