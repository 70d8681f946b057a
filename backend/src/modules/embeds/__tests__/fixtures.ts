import type { Profile } from '../../profiles/profile.types.js';

export function makeProfile(overrides: Partial<Profile> = {}): Profile {
  return {
    id: 'usr_a',
    displayName: 'Test User',
    username: 'testuser',
    pronouns: 'they/them',
    state: 'active',
    status: 'join me',
    statusDescription: 'building badges',
    lastActivity: '2024-05-01T10:00:00.000Z',
    profilePicOverrideThumbnail: '',
    currentAvatarThumbnailImageUrl: 'https://img.test/avatar.gif',
    userIcon: '',
    userIconThumbnail: '',
    ...overrides,
  };
}

/** Two hours after the fixture's last activity. */
export const NOW = new Date('2024-05-01T12:00:00.000Z');

export const GIF = Buffer.concat([Buffer.from('GIF89a'), Buffer.alloc(26)]);
