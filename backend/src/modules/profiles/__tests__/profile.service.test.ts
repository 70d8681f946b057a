import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { ProfileService } from '../profile.service.js';
import { MemoryProfileStore } from '../storage/memory-profile.store.js';
import type { Profile, ProfileSource } from '../profile.types.js';
import { UpstreamError } from '../../../common/errors.js';

function profile(id: string, displayName = 'Test User'): Profile {
  return {
    id,
    displayName,
    username: displayName.toLowerCase().replace(/\s+/g, ''),
    pronouns: 'they/them',
    state: 'online',
    status: 'active',
    statusDescription: '',
    lastActivity: '',
    profilePicOverrideThumbnail: '',
    currentAvatarThumbnailImageUrl: 'https://img.test/avatar.png',
    userIcon: '',
    userIconThumbnail: '',
  };
}

describe('ProfileService', () => {
  let now: number;
  let store: MemoryProfileStore;
  let fetchProfile: Mock<[string], Promise<Profile | null>>;
  let source: ProfileSource;
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new MemoryProfileStore(60_000, () => now);
    fetchProfile = vi.fn<[string], Promise<Profile | null>>();
    source = { fetchProfile };
    vi.clearAllMocks();
  });

  it('fetches on a miss and serves the stored copy afterwards', async () => {
    fetchProfile.mockResolvedValue(profile('usr_a'));
    const service = new ProfileService(source, store, { ttlMs: 60_000, logger });

    const first = await service.get('usr_a');
    const second = await service.get('usr_a');

    expect(first).toEqual({ profile: profile('usr_a'), cached: false });
    expect(second).toEqual({ profile: profile('usr_a'), cached: true });
    expect(fetchProfile).toHaveBeenCalledTimes(1);
  });

  it('caches unknown ids as null', async () => {
    fetchProfile.mockResolvedValue(null);
    const service = new ProfileService(source, store, { logger });

    expect(await service.get('usr_missing')).toEqual({ profile: null, cached: false });
    expect(await service.get('usr_missing')).toEqual({ profile: null, cached: true });
    expect(fetchProfile).toHaveBeenCalledTimes(1);
  });

  it('refetches once the ttl has passed', async () => {
    fetchProfile
      .mockResolvedValueOnce(profile('usr_a', 'Old Name'))
      .mockResolvedValueOnce(profile('usr_a', 'New Name'));
    const service = new ProfileService(source, store, { ttlMs: 60_000, logger });

    await service.get('usr_a');
    now += 60_001;
    const lookup = await service.get('usr_a');

    expect(lookup.cached).toBe(false);
    expect(lookup.profile?.displayName).toBe('New Name');
    expect(fetchProfile).toHaveBeenCalledTimes(2);
  });

  it('shares one upstream request between concurrent misses', async () => {
    let release: (p: Profile) => void = () => {};
    fetchProfile.mockReturnValue(new Promise<Profile>((r) => { release = r; }));
    const service = new ProfileService(source, store, { logger });

    const a = service.get('usr_a');
    const b = service.get('usr_a');
    await Promise.resolve();
    release(profile('usr_a'));

    const [ra, rb] = await Promise.all([a, b]);
    expect(fetchProfile).toHaveBeenCalledTimes(1);
    expect(ra).toEqual(rb);
    expect(service.stats().inFlight).toBe(0);
  });

  it('runs onRefresh after every upstream fetch only', async () => {
    fetchProfile.mockResolvedValue(profile('usr_a'));
    const onRefresh = vi.fn(async () => 2);
    const service = new ProfileService(source, store, { logger, onRefresh });

    await service.get('usr_a');
    await service.get('usr_a');

    expect(onRefresh).toHaveBeenCalledTimes(1);
    expect(onRefresh).toHaveBeenCalledWith('usr_a');
  });

  it('stores nothing when onRefresh fails, so the next lookup refreshes again', async () => {
    fetchProfile
      .mockResolvedValueOnce(profile('usr_a'))
      .mockResolvedValueOnce(profile('usr_a', 'Renamed User'));
    const onRefresh = vi.fn<[string], Promise<unknown>>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValueOnce(0);
    const service = new ProfileService(source, store, { logger, onRefresh });

    await expect(service.get('usr_a')).rejects.toThrow('disk full');
    expect(await store.get('usr_a')).toBeUndefined();

    const second = await service.get('usr_a');
    expect(second).toEqual({ profile: profile('usr_a', 'Renamed User'), cached: false });
    expect(onRefresh).toHaveBeenCalledTimes(2);
    expect((await service.get('usr_a')).cached).toBe(true);
  });

  it('propagates upstream failures without caching them', async () => {
    fetchProfile
      .mockRejectedValueOnce(new UpstreamError('Profile request failed: timeout'))
      .mockResolvedValueOnce(profile('usr_a'));
    const service = new ProfileService(source, store, { logger });

    await expect(service.get('usr_a')).rejects.toBeInstanceOf(UpstreamError);
    expect((await service.get('usr_a')).profile?.id).toBe('usr_a');
  });

  it('prunes expired entries from the store', async () => {
    fetchProfile.mockResolvedValue(profile('usr_a'));
    const service = new ProfileService(source, store, { ttlMs: 1_000, logger });

    await service.get('usr_a');
    now += 1_001;

    expect(await service.prune()).toBe(1);
    expect(store.stats().size).toBe(0);
  });
});
