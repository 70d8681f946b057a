/**
 * Render Cache Module Index
 * =========================
 */

export { RenderCache, computeFingerprint, renderFilename } from './render-cache.service.js';
export type { RenderCacheOptions } from './render-cache.service.js';
