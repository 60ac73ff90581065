/**
 * In-process keyed mutex
 *
 * Work for the same key runs strictly one after another; different keys never
 * wait on each other. A failed task releases the key for the next one.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      // Drop the entry once nothing is queued behind this task
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
