/**
 * Database Indexes
 * Run this on startup, after connectMongo()
 */

import { ProfileCacheModel } from '../modules/profiles/storage/profile-cache.model.js';
import { errorMessage } from '../common/errors.js';

export async function ensureIndexes(): Promise<void> {
  try {
    await ProfileCacheModel.createIndexes();
    console.log('[DB] profile_cache indexes created');
  } catch (err) {
    console.log('[DB] profile_cache indexes already exist or error:', errorMessage(err));
  }
}
