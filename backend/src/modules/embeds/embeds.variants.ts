/**
 * EMBED VARIANTS
 * ==============
 *
 * Registry of badge layouts. Option schemas are built when this module
 * loads; a bad definition aborts startup with a SchemaError.
 */

import { buildSchema, type OptionDefinitions } from '../options/index.js';
import type { EmbedVariant, Filetype } from './embeds.types.js';
import { AVATAR_CHOICES } from './templates/svg.utils.js';
import { LARGE_HEIGHT, LARGE_WIDTH, renderLarge } from './templates/large.template.js';
import { SMALL_HEIGHT, SMALL_WIDTH, renderSmall } from './templates/small.template.js';
import { TINY_HEIGHT, TINY_WIDTH, renderTiny } from './templates/tiny.template.js';

const FILETYPES: readonly Filetype[] = ['svg', 'png'];

// ═══════════════════════════════════════════════════════════════
// OPTION DEFINITIONS
// ═══════════════════════════════════════════════════════════════

const COMMON_OPTIONS: OptionDefinitions = {
  background_color: {
    type: { type: 'color' },
    default: '181b1f',
    description: 'Card background, hex without "#"',
  },
  foreground_color: {
    type: { type: 'color' },
    default: 'f8f9fa',
    description: 'Text color, hex without "#"',
  },
  border_radius: {
    type: { type: 'int', min: 0, max: 64 },
    default: '8',
    description: 'Corner radius in pixels',
  },
};

const LARGE_OPTIONS: OptionDefinitions = {
  ...COMMON_OPTIONS,
  show: {
    type: { type: 'list', of: { type: 'enum', values: ['pronouns', 'status', 'status_description', 'last_seen'] } },
    default: 'pronouns,status,status_description,last_seen',
    description: 'Comma-separated fields to display',
  },
  avatar: {
    type: { type: 'enum', values: AVATAR_CHOICES },
    default: 'profile',
    description: 'Which picture to show',
  },
  title: {
    type: { type: 'string' },
    description: 'Replaces the display name',
  },
};

const SMALL_OPTIONS: OptionDefinitions = {
  ...COMMON_OPTIONS,
  show: {
    type: { type: 'list', of: { type: 'enum', values: ['status', 'last_seen'] } },
    default: 'status,last_seen',
    description: 'Comma-separated fields to display',
  },
  avatar: {
    type: { type: 'enum', values: AVATAR_CHOICES },
    default: 'icon',
    description: 'Which picture to show',
  },
};

const TINY_OPTIONS: OptionDefinitions = {
  ...COMMON_OPTIONS,
  show_status: {
    type: { type: 'bool' },
    default: 'true',
    description: 'Show the status dot',
  },
};

// ═══════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════

const VARIANTS: EmbedVariant[] = [
  {
    name: 'large',
    width: LARGE_WIDTH,
    height: LARGE_HEIGHT,
    filetypes: FILETYPES,
    schema: buildSchema(LARGE_OPTIONS),
    template: renderLarge,
  },
  {
    name: 'small',
    width: SMALL_WIDTH,
    height: SMALL_HEIGHT,
    filetypes: FILETYPES,
    schema: buildSchema(SMALL_OPTIONS),
    template: renderSmall,
  },
  {
    name: 'tiny',
    width: TINY_WIDTH,
    height: TINY_HEIGHT,
    filetypes: FILETYPES,
    schema: buildSchema(TINY_OPTIONS),
    template: renderTiny,
  },
];

export const EMBED_VARIANTS: ReadonlyMap<string, EmbedVariant> = new Map(
  VARIANTS.map((v) => [v.name, v]),
);

export function getVariant(name: string): EmbedVariant | undefined {
  return EMBED_VARIANTS.get(name);
}

export function isFiletype(value: string): value is Filetype {
  return FILETYPES.some((t) => t === value);
}
