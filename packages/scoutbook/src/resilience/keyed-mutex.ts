/**
 * Keyed Mutex
 *
 * Serializes async work per key while letting different keys run in
 * parallel. Used for the per-player write boundary in the repository and for
 * the single-connection transaction lock in the SQLite adapter.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex();
 * await locks.runExclusive('player:42', async () => ingest(report));
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has settled.
   * A rejection is returned to this caller only; later holders still run.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
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

  /**
   * Whether work is running or queued for `key`
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
