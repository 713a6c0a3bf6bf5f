/**
 * Serializes async work per key. Callers on the same key run one after
 * another in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();
  private holders = new Map<string, number>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.holders.set(key, (this.holders.get(key) ?? 0) + 1);

    await previous;
    try {
      return await task();
    } finally {
      release();
      const remaining = (this.holders.get(key) ?? 1) - 1;
      if (remaining === 0) {
        this.holders.delete(key);
      } else {
        this.holders.set(key, remaining);
      }
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  // True while a task for the key is running or queued.
  isLocked(key: string): boolean {
    return this.holders.has(key);
  }
}
