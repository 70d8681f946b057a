/**
 * Embeds Module
 */

export * from './embeds.types.js';
export { EMBED_VARIANTS, getVariant, isFiletype } from './embeds.variants.js';
export { EmbedService, SUBJECT_ID_PATTERN } from './embeds.service.js';
export type { EmbedServiceDeps, ResolvedEmbed } from './embeds.service.js';
export { registerEmbedRoutes, BADGE_CACHE_CONTROL } from './embeds.routes.js';
