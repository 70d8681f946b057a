/**
 * EMBEDS SERVICE
 * ==============
 *
 * Request → badge bytes:
 *   validate subject and embed name → parse options → profile lookup →
 *   fingerprint → render cache probe → on miss render, inline images and
 *   rasterize (png only) → publish.
 *
 * Renders with the same filename share one in-flight job, unless the
 * subject was purged in between. A render overtaken by a purge is returned
 * to its callers but not left in the cache.
 */

import { CacheIoError, NotFoundError, OptionValueError } from '../../common/errors.js';
import { noopLogger, systemClock, type Clock, type Logger } from '../../common/logger.js';
import { inlineRemoteImages, type ImageSource } from '../fetch-cache/svg-inline.service.js';
import type { RawParams } from '../options/options.types.js';
import type { ProfileLookup } from '../profiles/profile.types.js';
import type { RenderCache } from '../render-cache/render-cache.service.js';
import { RequestCoalescer } from '../shared/runtime/request-coalescer.js';
import { CONTENT_TYPES, type EmbedResult, type EmbedVariant, type Filetype, type TemplateContext } from './embeds.types.js';
import { EMBED_VARIANTS, isFiletype } from './embeds.variants.js';

export const SUBJECT_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export interface EmbedServiceDeps {
  profiles: { get(id: string): Promise<ProfileLookup> };
  renders: RenderCache;
  images: ImageSource;
  rasterizer: { toPng(svg: string | Buffer): Promise<Buffer> };
  variants?: ReadonlyMap<string, EmbedVariant>;
  clock?: Clock;
  logger?: Logger;
}

export interface ResolvedEmbed {
  variant: EmbedVariant;
  filetype: Filetype;
}

export class EmbedService {
  private readonly variants: ReadonlyMap<string, EmbedVariant>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private renders = new RequestCoalescer<Buffer>();

  constructor(private deps: EmbedServiceDeps) {
    this.variants = deps.variants ?? EMBED_VARIANTS;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? noopLogger;
  }

  listVariants(): EmbedVariant[] {
    return Array.from(this.variants.values());
  }

  getVariant(name: string): EmbedVariant {
    const variant = this.variants.get(name);
    if (!variant) {
      throw new NotFoundError(`Unknown embed variant ${name}`);
    }
    return variant;
  }

  /**
   * Split `large.png` into its variant and filetype.
   */
  resolveEmbed(embed: string): ResolvedEmbed {
    const dot = embed.lastIndexOf('.');
    const name = dot > 0 ? embed.slice(0, dot) : '';
    const filetype = dot > 0 ? embed.slice(dot + 1) : '';

    const variant = this.variants.get(name);
    if (!variant || !isFiletype(filetype) || !variant.filetypes.includes(filetype)) {
      throw new NotFoundError(`Unknown embed ${embed}`);
    }
    return { variant, filetype };
  }

  async render(subjectId: string, embed: string, params: RawParams): Promise<EmbedResult> {
    if (!SUBJECT_ID_PATTERN.test(subjectId)) {
      throw new NotFoundError(`Unknown subject ${subjectId}`);
    }

    const { variant, filetype } = this.resolveEmbed(embed);

    const parsed = variant.schema.parse(params);
    if (!parsed.ok) {
      throw new OptionValueError(parsed.error);
    }
    const config = parsed.config;

    // Before the cache probe: a fresh upstream fetch purges this subject's renders.
    const { profile } = await this.deps.profiles.get(subjectId);
    if (!profile) {
      throw new NotFoundError(`Unknown subject ${subjectId}`);
    }

    const { renders } = this.deps;
    const generation = renders.generation(subjectId);
    const fingerprint = renders.computeFingerprint(subjectId, variant.name, config);
    const filename = renders.filename(subjectId, variant.name, fingerprint, filetype);
    const contentType = CONTENT_TYPES[filetype];

    const cached = await this.readCached(filename);
    if (cached) {
      return { data: cached, contentType, filename, cached: true };
    }

    // Keyed by generation too: a request that follows a purge never joins a render of older data.
    const data = await this.renders.run(`${filename}#${generation}`, async () => {
      const ctx: TemplateContext = { profile, config, now: new Date(this.clock.now()) };
      const out = await this.produce(variant, filetype, ctx);

      if (renders.generation(subjectId) !== generation) {
        this.logger.info({ filename }, '[Embeds] Subject purged during render, not caching');
        return out;
      }
      await renders.save(filename, out);
      if (renders.generation(subjectId) !== generation) {
        await renders.remove(filename);
        this.logger.info({ filename }, '[Embeds] Subject purged during save, render dropped');
        return out;
      }

      this.logger.info({ filename, bytes: out.length }, '[Embeds] Rendered');
      return out;
    });

    return { data, contentType, filename, cached: false };
  }

  private async readCached(filename: string): Promise<Buffer | null> {
    const { renders } = this.deps;
    if (!(await renders.exists(filename))) {
      return null;
    }
    try {
      return await renders.read(filename);
    } catch (err) {
      // Purged between the probe and the read.
      if (err instanceof CacheIoError) {
        this.logger.warn({ filename, err: err.message }, '[Embeds] Cached render vanished, re-rendering');
        return null;
      }
      throw err;
    }
  }

  private async produce(variant: EmbedVariant, filetype: Filetype, ctx: TemplateContext): Promise<Buffer> {
    const svg = Buffer.from(variant.template(ctx), 'utf8');
    if (filetype === 'svg') {
      return svg;
    }

    const inlined = await inlineRemoteImages(svg, this.deps.images, this.logger);
    return this.deps.rasterizer.toPng(inlined);
  }

  inFlight(): number {
    return this.renders.size();
  }
}
