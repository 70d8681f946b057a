/**
 * Fetch Cache Module Index
 * ========================
 */

export { FetchCache, DEFAULT_IDLE_MS, DEFAULT_FETCH_TIMEOUT_MS } from './fetch-cache.service.js';
export type { FetchCacheOptions, FetchCacheStats } from './fetch-cache.service.js';
export { inlineRemoteImages, isRemoteHref, resolveRemoteHref, toDataUri } from './svg-inline.service.js';
export type { ImageSource } from './svg-inline.service.js';
