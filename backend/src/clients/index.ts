/**
 * External Service Clients
 *
 * HTTP clients for the upstream services the badges draw from.
 */

export {
  ProfileApiClient,
  iconThumbnailUrl,
  toProfile,
} from './profile-api.client.js';

export type { ProfileApiClientConfig } from './profile-api.client.js';
