/**
 * In-memory profile store, used when no MongoDB is configured.
 */

import { TtlCache } from '../../shared/runtime/ttl-cache.js';
import type { CachedProfile, Profile, ProfileStore } from '../profile.types.js';

export class MemoryProfileStore implements ProfileStore {
  private cache: TtlCache<Profile | null>;

  constructor(defaultTtlMs: number, now: () => number = Date.now) {
    this.cache = new TtlCache<Profile | null>(defaultTtlMs, now);
  }

  async get(id: string): Promise<CachedProfile | undefined> {
    const entry = this.cache.get(id);
    return entry ? { profile: entry.value } : undefined;
  }

  async set(id: string, profile: Profile | null, ttlMs: number): Promise<void> {
    this.cache.set(id, profile, ttlMs);
  }

  async prune(): Promise<number> {
    return this.cache.prune();
  }

  stats() {
    return { backend: 'memory', ...this.cache.stats() };
  }
}
