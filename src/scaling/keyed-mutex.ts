/**
 * Keyed Mutex — per-key serialization of async critical sections
 *
 * Work submitted under the same key runs strictly one at a time in submission
 * order; work under different keys never waits on each other. Keys with no
 * queued work hold no memory.
 *
 * Usage:
 *   const locks = new KeyedMutex();
 *   await locks.runExclusive(registrationId, () => store.update(...));
 */

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // The tail never rejects, so a failed section does not poison the key
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
