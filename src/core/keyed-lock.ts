/**
 * Keyed Lock — serializes async critical sections per key.
 *
 * Sections for the same key run one after another in arrival order; sections
 * for different keys never wait on each other. Idle keys are dropped so the
 * map only holds keys with work queued.
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, section: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = () => resolve();
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with a section running or queued. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
