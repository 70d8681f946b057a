/**
 * Helpers shared by the badge templates.
 */

import type { Configuration } from '../../options/options.types.js';
import type { Profile } from '../../profiles/profile.types.js';

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Cut text to at most `max` characters, marking the cut with an ellipsis.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return `${chars.slice(0, Math.max(0, max - 1)).join('').trimEnd()}…`;
}

/** Rough advance width; good enough for sizing pills around short labels. */
export function estimateTextWidth(text: string, fontSize: number): number {
  return Math.ceil(Array.from(text).length * fontSize * 0.56);
}

// ═══════════════════════════════════════════════════════════════
// RELATIVE TIME
// ═══════════════════════════════════════════════════════════════

const UNITS: Array<[label: string, seconds: number]> = [
  ['year', 365 * 24 * 3600],
  ['month', 30 * 24 * 3600],
  ['week', 7 * 24 * 3600],
  ['day', 24 * 3600],
  ['hour', 3600],
  ['minute', 60],
];

export function formatTimeAgo(from: Date, now: Date): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - from.getTime()) / 1000));

  for (const [label, size] of UNITS) {
    const n = Math.floor(seconds / size);
    if (n >= 1) {
      return `${n} ${label}${n === 1 ? '' : 's'} ago`;
    }
  }
  return 'just now';
}

/**
 * "Last seen" line, or null when the activity timestamp is hidden or bogus.
 */
export function lastSeenLabel(profile: Profile, now: Date): string | null {
  if (profile.state === 'online') return 'Online now';
  if (!profile.lastActivity) return null;

  const at = new Date(profile.lastActivity);
  if (Number.isNaN(at.getTime())) return null;
  return `Last seen ${formatTimeAgo(at, now)}`;
}

// ═══════════════════════════════════════════════════════════════
// STATUS
// ═══════════════════════════════════════════════════════════════

const STATUS_COLORS: Record<string, string> = {
  'join me': '#42caff',
  'active': '#51e57e',
  'ask me': '#e88134',
  'busy': '#b3261e',
  'offline': '#808080',
};

/** Effective status: an offline user shows as offline whatever they set. */
export function effectiveStatus(profile: Profile): string {
  if (profile.state === 'offline' || !profile.status) return 'offline';
  return profile.status;
}

export function statusColor(status: string): string {
  return STATUS_COLORS[status] ?? STATUS_COLORS['offline'] ?? '#808080';
}

export function statusLabel(status: string): string {
  return status
    .split(' ')
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1) : w))
    .join(' ');
}

// ═══════════════════════════════════════════════════════════════
// AVATAR
// ═══════════════════════════════════════════════════════════════

export const AVATAR_CHOICES = ['profile', 'avatar', 'icon', 'none'] as const;

export function avatarUrl(profile: Profile, choice: string): string {
  const profilePic = profile.profilePicOverrideThumbnail || profile.currentAvatarThumbnailImageUrl;
  switch (choice) {
    case 'none':
      return '';
    case 'avatar':
      return profile.currentAvatarThumbnailImageUrl;
    case 'icon':
      return profile.userIconThumbnail || profilePic;
    default:
      return profilePic;
  }
}

// ═══════════════════════════════════════════════════════════════
// CONFIG ACCESS
// ═══════════════════════════════════════════════════════════════

export function optString(config: Configuration, name: string, fallback: string): string {
  const v = config[name];
  return typeof v === 'string' ? v : fallback;
}

export function optNumber(config: Configuration, name: string, fallback: number): number {
  const v = config[name];
  return typeof v === 'number' ? v : fallback;
}

export function optBool(config: Configuration, name: string, fallback: boolean): boolean {
  const v = config[name];
  return typeof v === 'boolean' ? v : fallback;
}

export function optList(config: Configuration, name: string): string[] {
  const v = config[name];
  if (!Array.isArray(v)) return [];
  return v.filter((item): item is string => typeof item === 'string');
}
