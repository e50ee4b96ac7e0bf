/**
 * FIFO lock per key. Tasks for the same key run one after another in the order
 * they were scheduled; tasks for different keys do not wait on each other.
 */
export class KeyedMutex {
  private readonly chains = new Map<string, Promise<unknown>>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // The next task for this key waits on completion, not on success
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.chains.has(key);
  }
}
