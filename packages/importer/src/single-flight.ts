/**
 * Promise memo keyed by string. Concurrent callers of the same key share one
 * load; a rejected load is evicted so the next caller tries again.
 */
export class SingleFlightMap<T> {
  private readonly entries = new Map<string, Promise<T>>();
  private loads = 0;

  get(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    this.loads += 1;
    const pending = load();
    this.entries.set(key, pending);
    void pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });

    return pending;
  }

  /** Number of loads issued, i.e. cache misses. */
  get loadCount(): number {
    return this.loads;
  }
}
