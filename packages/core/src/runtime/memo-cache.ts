/**
 * Run-scoped compute-once cache
 */

export interface MemoCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

/**
 * Memoizes computations for the lifetime of one resolution run.
 *
 * The first request for a key stores its pending promise; concurrent
 * requests for the same key await that promise instead of recomputing.
 * A computation that fails is evicted so a later request can retry.
 */
export class MemoCache<T> {
  private cache: Map<string, Promise<T>> = new Map();
  private hits = 0;
  private misses = 0;

  getOrCompute(key: string, compute: () => T | Promise<T>): Promise<T> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const pending = Promise.resolve().then(compute);
    this.cache.set(key, pending);
    pending.catch(() => {
      if (this.cache.get(key) === pending) {
        this.cache.delete(key);
      }
    });
    return pending;
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): MemoCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
