/**
 * In-process keyed mutex.
 *
 * Calls sharing a key run one after another; calls with different keys run
 * concurrently. Used to make the sample store's "does this blob exist? then
 * write it" sequence atomic per digest within one process. Across processes
 * the atomic rename in the blob store keeps a single file per digest.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  get size(): number {
    return this.tails.size;
  }
}
