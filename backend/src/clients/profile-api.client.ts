/**
 * Profile API HTTP Client
 *
 * ═══════════════════════════════════════════════════════════════
 * Read-only access to the upstream social API the badges describe.
 * ═══════════════════════════════════════════════════════════════
 *
 * Authenticates with session cookies obtained out of band (the login and
 * two-factor flow is not part of this service).
 *
 * @example
 * const client = new ProfileApiClient({ baseUrl: 'https://api.example.test/api/1' });
 * const profile = await client.fetchProfile('usr_1234');
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { UpstreamError, errorMessage } from '../common/errors.js';
import { noopLogger, type Logger } from '../common/logger.js';
import type { Profile, ProfileSource } from '../modules/profiles/profile.types.js';

// ============================================
// UPSTREAM PAYLOAD
// ============================================

const optionalString = z.string().nullish().transform((v) => v ?? '');

const UpstreamUserSchema = z.object({
  id: z.string(),
  displayName: optionalString,
  username: optionalString,
  pronouns: optionalString,
  state: optionalString,
  status: optionalString,
  statusDescription: optionalString,
  last_activity: optionalString,
  profilePicOverrideThumbnail: optionalString,
  currentAvatarThumbnailImageUrl: optionalString,
  userIcon: optionalString,
});

type UpstreamUser = z.infer<typeof UpstreamUserSchema>;

/**
 * File URLs point at the original upload; the image endpoint serves a
 * resized variant. `.../api/1/file/file_x/1` -> `.../api/1/image/file_x/1/128`
 */
export function iconThumbnailUrl(userIcon: string): string {
  if (!userIcon) return '';
  return `${userIcon.replace('/api/1/file', '/api/1/image').replace(/\/+$/, '')}/128`;
}

export function toProfile(user: UpstreamUser): Profile {
  return {
    id: user.id,
    displayName: user.displayName,
    username: user.username,
    pronouns: user.pronouns,
    state: user.state,
    status: user.status,
    statusDescription: user.statusDescription,
    lastActivity: user.last_activity,
    profilePicOverrideThumbnail: user.profilePicOverrideThumbnail,
    currentAvatarThumbnailImageUrl: user.currentAvatarThumbnailImageUrl,
    userIcon: user.userIcon,
    userIconThumbnail: iconThumbnailUrl(user.userIcon),
  };
}

// ============================================
// CLIENT CONFIGURATION
// ============================================

export interface ProfileApiClientConfig {
  baseUrl: string;
  timeout: number;
  userAgent: string;
  authCookie?: string;
  twoFactorCookie?: string;
  /** Transport override; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

const DEFAULT_CONFIG = {
  timeout: 10000,
  userAgent: 'badge-embed/1.0',
};

// ============================================
// PROFILE API CLIENT
// ============================================

export class ProfileApiClient implements ProfileSource {
  private client: AxiosInstance;
  private config: ProfileApiClientConfig;
  private logger: Logger;

  constructor(config: Partial<ProfileApiClientConfig> & { baseUrl: string }) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = config.logger ?? noopLogger;

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': this.config.userAgent,
    };
    const cookie = this.cookieHeader();
    if (cookie) headers['Cookie'] = cookie;

    this.client = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      headers,
      adapter: this.config.adapter,
    });

    this.logger.info({ baseUrl: this.config.baseUrl }, '[ProfileApiClient] Initialized');
  }

  private cookieHeader(): string {
    const parts: string[] = [];
    if (this.config.authCookie) parts.push(`auth=${this.config.authCookie}`);
    if (this.config.twoFactorCookie) parts.push(`twoFactorAuth=${this.config.twoFactorCookie}`);
    return parts.join('; ');
  }

  /**
   * Fetch a user profile. Resolves null when upstream does not know the id.
   */
  async fetchProfile(id: string): Promise<Profile | null> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(`/users/${encodeURIComponent(id)}`);
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      this.logger.warn({ id, err: errorMessage(error) }, '[ProfileApiClient] Profile request failed');
      throw new UpstreamError(`Profile request failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = UpstreamUserSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(`Unexpected profile payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return toProfile(parsed.data);
  }
}
