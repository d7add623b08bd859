/**
 * One exclusive section per key. Callers on the same key run strictly one
 * after another in arrival order; callers on different keys never wait on
 * each other.
 */
export class KeyedMutex {
  /** Tail of the wait chain per key; removed once the chain drains. */
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` while holding `key`. `onReleased` runs synchronously right after
   * the section is released and before any queued caller resumes, so work it
   * does keeps the same order as the sections themselves.
   */
  async runExclusive<T>(
    key: string,
    fn: () => T | Promise<T>,
    onReleased?: (value: T) => void
  ): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let value: T;
    try {
      value = await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }

    onReleased?.(value);
    return value;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
