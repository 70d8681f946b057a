/**
 * PROFILES — Types
 * ================
 *
 * The slice of an upstream user profile the embed templates draw from.
 */

import { z } from 'zod';

export const ProfileSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  username: z.string(),
  pronouns: z.string(),
  state: z.string(),                 // online | active | offline
  status: z.string(),                // join me | active | ask me | busy | offline
  statusDescription: z.string(),
  lastActivity: z.string(),          // ISO timestamp, '' when hidden
  profilePicOverrideThumbnail: z.string(),
  currentAvatarThumbnailImageUrl: z.string(),
  userIcon: z.string(),
  userIconThumbnail: z.string(),
});

export type Profile = z.infer<typeof ProfileSchema>;

/**
 * Anything that can produce a profile by id. Resolves null for unknown ids.
 */
export interface ProfileSource {
  fetchProfile(id: string): Promise<Profile | null>;
}

/** `null` profiles are cached too, so unknown ids do not hammer upstream. */
export interface CachedProfile {
  profile: Profile | null;
}

export interface ProfileStore {
  get(id: string): Promise<CachedProfile | undefined>;
  set(id: string, profile: Profile | null, ttlMs: number): Promise<void>;
  prune(): Promise<number>;
  stats(): Record<string, number | string>;
}

export interface ProfileLookup {
  profile: Profile | null;
  cached: boolean;
}
