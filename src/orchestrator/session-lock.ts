/**
 * Per-session mutual exclusion.
 *
 * Turns for the same key run strictly one after another, in the order they
 * called `run`. Different keys never wait on each other.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // Last in line cleans up
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a running or queued turn */
  get activeKeys(): number {
    return this.tails.size;
  }
}
