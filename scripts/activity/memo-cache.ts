export const DEFAULT_MEMO_CAPACITY = 512;

/**
 * Bounded get-or-compute cache. Values are stored as promises so concurrent
 * callers for one key share a single computation; a rejected computation is
 * evicted so the next caller retries. Eviction is least-recently-used.
 */
export class MemoCache<K, V> {
  private readonly entries = new Map<K, Promise<V>>();

  constructor(private readonly capacity: number = DEFAULT_MEMO_CAPACITY) {
    if (capacity < 1) {
      throw new Error(`MemoCache capacity must be positive, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  getOrCompute(key: K, compute: (key: K) => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing) {
      this.entries.delete(key);
      this.entries.set(key, existing);
      return existing;
    }

    const pending = compute(key);
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }

    return pending;
  }
}
