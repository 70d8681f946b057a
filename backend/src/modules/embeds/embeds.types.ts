/**
 * EMBEDS — Types
 * ==============
 */

import type { OptionSchema } from '../options/options.schema.js';
import type { Configuration } from '../options/options.types.js';
import type { Profile } from '../profiles/profile.types.js';

export type Filetype = 'svg' | 'png';

export const CONTENT_TYPES: Readonly<Record<Filetype, string>> = {
  svg: 'image/svg+xml',
  png: 'image/png',
};

export interface TemplateContext {
  profile: Profile;
  config: Configuration;
  now: Date;
}

export type Template = (ctx: TemplateContext) => string;

export interface EmbedVariant {
  name: string;
  width: number;
  height: number;
  filetypes: readonly Filetype[];
  schema: OptionSchema;
  template: Template;
}

export interface EmbedResult {
  data: Buffer;
  contentType: string;
  filename: string;
  cached: boolean;
}
