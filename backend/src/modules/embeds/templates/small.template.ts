/**
 * Small badge (355x100): icon on the left, name and status on the right.
 */

import type { TemplateContext } from '../embeds.types.js';
import {
  avatarUrl,
  effectiveStatus,
  escapeXml,
  lastSeenLabel,
  optList,
  optNumber,
  optString,
  statusColor,
  statusLabel,
  truncate,
} from './svg.utils.js';

export const SMALL_WIDTH = 355;
export const SMALL_HEIGHT = 100;
const FONT = 'Noto Sans, sans-serif';

export function renderSmall({ profile, config, now }: TemplateContext): string {
  const w = SMALL_WIDTH;
  const h = SMALL_HEIGHT;
  const bg = optString(config, 'background_color', '#181b1f');
  const fg = optString(config, 'foreground_color', '#f8f9fa');
  const radius = optNumber(config, 'border_radius', 8);
  const show = new Set(optList(config, 'show'));
  const picture = avatarUrl(profile, optString(config, 'avatar', 'icon'));

  const textX = picture ? 104 : 16;
  const parts: string[] = [
    `<rect x="0" y="0" width="${w}" height="${h}" rx="${radius}" ry="${radius}" fill="${bg}"/>`,
  ];

  if (picture) {
    parts.push(
      `<image x="8" y="8" width="84" height="84" preserveAspectRatio="xMidYMid slice" clip-path="url(#icon)" href="${escapeXml(picture)}"/>`,
    );
  }

  parts.push(
    `<text x="${textX}" y="36" font-family="${FONT}" font-size="18" font-weight="700" fill="${fg}">${escapeXml(truncate(profile.displayName, 22))}</text>`,
  );

  const status = effectiveStatus(profile);
  if (show.has('status')) {
    parts.push(
      `<circle cx="${textX + 6}" cy="57" r="5" fill="${statusColor(status)}"/>`,
      `<text x="${textX + 18}" y="62" font-family="${FONT}" font-size="13" fill="${fg}">${escapeXml(truncate(profile.statusDescription || statusLabel(status), 28))}</text>`,
    );
  }

  const seen = show.has('last_seen') ? lastSeenLabel(profile, now) : null;
  if (seen) {
    parts.push(
      `<text x="${textX}" y="84" font-family="${FONT}" font-size="11" fill="${fg}" fill-opacity="0.7">${escapeXml(seen)}</text>`,
    );
  }

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg width="${w}" height="${h}" viewBox="0 0 ${w} ${h}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <clipPath id="icon">
      <rect x="8" y="8" width="84" height="84" rx="${Math.min(radius, 42)}" ry="${Math.min(radius, 42)}"/>
    </clipPath>
  </defs>
  ${parts.join('\n  ')}
</svg>
`;
}
