/**
 * Promise-chain mutex: callers run one at a time in arrival order
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: (() => void) | undefined;
    const prev = this.tail;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.pending++;
    await prev;
    try {
      return await fn();
    } finally {
      this.pending--;
      release?.();
    }
  }

  /**
   * Callers holding or waiting for the lock
   */
  get waiting(): number {
    return this.pending;
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
