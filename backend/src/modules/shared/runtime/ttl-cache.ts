/**
 * TTL CACHE
 * =========
 *
 * In-memory TTL cache. Backs the profile store when no MongoDB is
 * configured (profile lookups, 60s TTL by default).
 */

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export class TtlCache<T> {
  private map = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private defaultTtlMs: number,
    private now: () => number = Date.now,
  ) {}

  /**
   * Get entry if not expired. The entry wrapper lets callers cache `null`.
   */
  get(key: string): { value: T } | undefined {
    const e = this.map.get(key);
    if (!e) {
      this.misses++;
      return undefined;
    }
    if (this.now() > e.expiresAt) {
      this.map.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return { value: e.value };
  }

  set(key: string, value: T, ttlMs?: number) {
    this.map.set(key, {
      value,
      expiresAt: this.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  size(): number {
    return this.map.size;
  }

  stats() {
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  /**
   * Prune expired entries
   */
  prune(): number {
    const now = this.now();
    let pruned = 0;
    for (const [k, e] of Array.from(this.map.entries())) {
      if (now > e.expiresAt) {
        this.map.delete(k);
        pruned++;
      }
    }
    return pruned;
  }
}
