/**
 * Large badge (355x340): picture on top, name, pronouns and status below.
 */

import type { TemplateContext } from '../embeds.types.js';
import {
  avatarUrl,
  effectiveStatus,
  escapeXml,
  estimateTextWidth,
  lastSeenLabel,
  optList,
  optNumber,
  optString,
  statusColor,
  statusLabel,
  truncate,
} from './svg.utils.js';

export const LARGE_WIDTH = 355;
export const LARGE_HEIGHT = 340;
const PICTURE_HEIGHT = 200;
const FONT = 'Noto Sans, sans-serif';

export function renderLarge({ profile, config, now }: TemplateContext): string {
  const w = LARGE_WIDTH;
  const h = LARGE_HEIGHT;
  const bg = optString(config, 'background_color', '#181b1f');
  const fg = optString(config, 'foreground_color', '#f8f9fa');
  const radius = optNumber(config, 'border_radius', 8);
  const show = new Set(optList(config, 'show'));
  const picture = avatarUrl(profile, optString(config, 'avatar', 'profile'));
  const name = optString(config, 'title', '') || profile.displayName;

  const parts: string[] = [];

  parts.push(`<rect x="0" y="0" width="${w}" height="${h}" rx="${radius}" ry="${radius}" fill="${bg}"/>`);

  if (picture) {
    parts.push(
      `<image x="0" y="0" width="${w}" height="${PICTURE_HEIGHT}" preserveAspectRatio="xMidYMid slice" clip-path="url(#picture)" href="${escapeXml(picture)}"/>`,
    );
  }

  const seen = show.has('last_seen') ? lastSeenLabel(profile, now) : null;
  if (seen) {
    const pillWidth = estimateTextWidth(seen, 11) + 16;
    const x = w - 8 - pillWidth;
    parts.push(
      `<rect x="${x}" y="8" width="${pillWidth}" height="22" rx="11" ry="11" fill="#111111" fill-opacity="0.8"/>`,
      `<text x="${x + 8}" y="23" font-family="${FONT}" font-size="11" fill="${fg}">${escapeXml(seen)}</text>`,
    );
  }

  let y = PICTURE_HEIGHT + 36;
  parts.push(
    `<text x="16" y="${y}" font-family="${FONT}" font-size="22" font-weight="700" fill="${fg}">${escapeXml(truncate(name, 24))}</text>`,
  );

  if (show.has('pronouns') && profile.pronouns) {
    y += 22;
    parts.push(
      `<text x="16" y="${y}" font-family="${FONT}" font-size="13" fill="${fg}" fill-opacity="0.7">${escapeXml(truncate(profile.pronouns, 40))}</text>`,
    );
  }

  const status = effectiveStatus(profile);
  if (show.has('status')) {
    y += 30;
    parts.push(
      `<circle cx="22" cy="${y - 5}" r="6" fill="${statusColor(status)}"/>`,
      `<text x="36" y="${y}" font-family="${FONT}" font-size="14" fill="${fg}">${escapeXml(statusLabel(status))}</text>`,
    );
  }

  if (show.has('status_description') && profile.statusDescription) {
    y += 24;
    parts.push(
      `<text x="16" y="${y}" font-family="${FONT}" font-size="13" fill="${fg}" fill-opacity="0.85">${escapeXml(truncate(profile.statusDescription, 44))}</text>`,
    );
  }

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg width="${w}" height="${h}" viewBox="0 0 ${w} ${h}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <clipPath id="picture">
      <rect x="0" y="0" width="${w}" height="${PICTURE_HEIGHT + radius}" rx="${radius}" ry="${radius}"/>
    </clipPath>
  </defs>
  ${parts.join('\n  ')}
</svg>
`;
}
