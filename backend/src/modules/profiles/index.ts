/**
 * Profiles Module
 */

export * from './profile.types.js';
export { ProfileService, DEFAULT_PROFILE_TTL_MS } from './profile.service.js';
export type { ProfileServiceOptions } from './profile.service.js';
export { MemoryProfileStore } from './storage/memory-profile.store.js';
export { MongoProfileStore } from './storage/mongo-profile.store.js';
export { ProfileCacheModel } from './storage/profile-cache.model.js';
