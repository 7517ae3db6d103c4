/**
 * Per-key async mutex built from promise chains. Callers on the same key
 * run one at a time in arrival order; different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const current = previous.then(() => next);
    this.tails.set(key, current);
    try {
      await previous;
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === current) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a holder or waiters. */
  get pending(): number {
    return this.tails.size;
  }
}
