/**
 * Serializes async critical sections per key (one chain per job id).
 *
 * Record mutations are read-modify-write over the job file; running them through the same
 * chain keeps an `abort` from being overwritten by a step update that loaded the record earlier.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    this.tails.set(key, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Number of keys with a pending or running section. */
  get size(): number {
    return this.tails.size;
  }
}
