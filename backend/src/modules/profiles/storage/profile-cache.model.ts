/**
 * PROFILE CACHE — MongoDB Model
 */

import mongoose, { Schema } from 'mongoose';

export interface IProfileCacheEntry {
  subjectId: string;
  found: boolean;
  profile?: unknown;
  expiresAt: Date;
  updatedAt: Date;
}

const ProfileCacheSchema = new Schema<IProfileCacheEntry>({
  subjectId: { type: String, required: true, unique: true, index: true },
  found: { type: Boolean, required: true },
  profile: { type: Schema.Types.Mixed },
  expiresAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
}, {
  collection: 'profile_cache',
});

// TTL index for auto-expiration; reads also filter on expiresAt because
// the TTL monitor only runs once a minute.
ProfileCacheSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const ProfileCacheModel = mongoose.model<IProfileCacheEntry>('ProfileCache', ProfileCacheSchema);
