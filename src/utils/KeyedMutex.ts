/**
 * Per-key critical sections. Holders for the same key run one at a time in
 * arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // last holder out clears the key
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
