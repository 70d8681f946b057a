/**
 * Tiny badge (200x32): status dot and name.
 */

import type { TemplateContext } from '../embeds.types.js';
import {
  effectiveStatus,
  escapeXml,
  optBool,
  optNumber,
  optString,
  statusColor,
  truncate,
} from './svg.utils.js';

export const TINY_WIDTH = 200;
export const TINY_HEIGHT = 32;

export function renderTiny({ profile, config }: TemplateContext): string {
  const w = TINY_WIDTH;
  const h = TINY_HEIGHT;
  const bg = optString(config, 'background_color', '#181b1f');
  const fg = optString(config, 'foreground_color', '#f8f9fa');
  const radius = optNumber(config, 'border_radius', 8);
  const showStatus = optBool(config, 'show_status', true);

  const textX = showStatus ? 28 : 12;
  const dot = showStatus
    ? `\n  <circle cx="16" cy="16" r="5" fill="${statusColor(effectiveStatus(profile))}"/>`
    : '';

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg width="${w}" height="${h}" viewBox="0 0 ${w} ${h}" xmlns="http://www.w3.org/2000/svg">
  <rect x="0" y="0" width="${w}" height="${h}" rx="${radius}" ry="${radius}" fill="${bg}"/>${dot}
  <text x="${textX}" y="21" font-family="Noto Sans, sans-serif" font-size="13" font-weight="700" fill="${fg}">${escapeXml(truncate(profile.displayName, 22))}</text>
</svg>
`;
}
