/**
 * Keyed TTL cache with an injectable clock
 */

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

interface CacheEntry<V> {
  value: V;
  fetchedAt: number;
}

export class TtlCache<K, V> {
  private entries = new Map<K, CacheEntry<V>>();
  private inFlight = new Map<K, Promise<V>>();

  constructor(
    private ttlMs: number,
    private clock: Clock = systemClock
  ) {}

  /** Fresh value or undefined */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.clock() - entry.fetchedAt >= this.ttlMs) return undefined;
    return entry.value;
  }

  /** Last stored value regardless of age */
  getStale(key: K): V | undefined {
    return this.entries.get(key)?.value;
  }

  set(key: K, value: V): void {
    this.entries.set(key, { value, fetchedAt: this.clock() });
  }

  /**
   * Return the fresh value or load it; concurrent callers for the same key
   * share one load. A rejected load stores nothing.
   */
  async getOrLoad(key: K, loader: () => Promise<V>): Promise<V> {
    const fresh = this.get(key);
    if (fresh !== undefined) return fresh;

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const load = loader()
      .then(value => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, load);
    return load;
  }

  invalidate(key?: K): void {
    if (key === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
