/**
 * Raster Module
 */

export { FontRegistry, DEFAULT_FONTS, DEFAULT_FONT_FAMILY } from './font.registry.js';
export type { ResolvedFonts } from './font.registry.js';
export { Rasterizer } from './rasterizer.js';
