/**
 * PROFILE SERVICE
 * ===============
 *
 * Cached, coalesced profile lookups.
 *
 * - A store hit (including a cached "not found") never reaches upstream
 * - Concurrent misses for one id share a single upstream request
 * - Every upstream fetch fires onRefresh (stale render purge) before it is stored
 */

import type { Logger } from '../../common/logger.js';
import { noopLogger } from '../../common/logger.js';
import { RequestCoalescer } from '../shared/runtime/request-coalescer.js';
import type { ProfileLookup, ProfileSource, ProfileStore } from './profile.types.js';

export const DEFAULT_PROFILE_TTL_MS = 60_000;

export interface ProfileServiceOptions {
  ttlMs?: number;
  logger?: Logger;
  /** Called after a fresh upstream fetch, before it is stored. A rejection fails the lookup. */
  onRefresh?: (id: string) => Promise<unknown>;
}

export class ProfileService {
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly onRefresh?: (id: string) => Promise<unknown>;
  private inflight = new RequestCoalescer<ProfileLookup>();

  constructor(
    private source: ProfileSource,
    private store: ProfileStore,
    options: ProfileServiceOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_PROFILE_TTL_MS;
    this.logger = options.logger ?? noopLogger;
    this.onRefresh = options.onRefresh;
  }

  async get(id: string): Promise<ProfileLookup> {
    const cached = await this.store.get(id);
    if (cached) {
      return { profile: cached.profile, cached: true };
    }
    return this.inflight.run(id, () => this.refresh(id));
  }

  private async refresh(id: string): Promise<ProfileLookup> {
    const profile = await this.source.fetchProfile(id);
    this.logger.info({ id, found: profile !== null }, '[ProfileService] Fetched profile');

    // Purge first: if it fails nothing is stored, and the next lookup retries both.
    if (this.onRefresh) {
      await this.onRefresh(id);
    }
    await this.store.set(id, profile, this.ttlMs);

    return { profile, cached: false };
  }

  prune(): Promise<number> {
    return this.store.prune();
  }

  stats() {
    return { ...this.store.stats(), inFlight: this.inflight.size() };
  }
}
