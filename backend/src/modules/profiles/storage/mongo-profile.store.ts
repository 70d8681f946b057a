/**
 * MongoDB-backed profile store. Survives restarts, so a redeploy does not
 * refetch every profile from upstream.
 */

import type { Logger } from '../../../common/logger.js';
import { noopLogger } from '../../../common/logger.js';
import { ProfileSchema, type CachedProfile, type Profile, type ProfileStore } from '../profile.types.js';
import { ProfileCacheModel } from './profile-cache.model.js';

export class MongoProfileStore implements ProfileStore {
  private hits = 0;
  private misses = 0;

  constructor(private logger: Logger = noopLogger) {}

  async get(id: string): Promise<CachedProfile | undefined> {
    const doc = await ProfileCacheModel
      .findOne({ subjectId: id, expiresAt: { $gt: new Date() } })
      .lean();

    if (!doc) {
      this.misses++;
      return undefined;
    }
    if (!doc.found) {
      this.hits++;
      return { profile: null };
    }

    const parsed = ProfileSchema.safeParse(doc.profile);
    if (!parsed.success) {
      this.logger.warn({ subjectId: id }, '[ProfileStore] Discarding malformed cached profile');
      this.misses++;
      return undefined;
    }
    this.hits++;
    return { profile: parsed.data };
  }

  async set(id: string, profile: Profile | null, ttlMs: number): Promise<void> {
    const now = new Date();
    await ProfileCacheModel.updateOne(
      { subjectId: id },
      {
        $set: {
          subjectId: id,
          found: profile !== null,
          profile,
          expiresAt: new Date(now.getTime() + ttlMs),
          updatedAt: now,
        },
      },
      { upsert: true },
    );
  }

  async prune(): Promise<number> {
    const result = await ProfileCacheModel.deleteMany({ expiresAt: { $lte: new Date() } });
    return result.deletedCount;
  }

  stats() {
    return { backend: 'mongo', hits: this.hits, misses: this.misses };
  }
}
