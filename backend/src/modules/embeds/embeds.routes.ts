/**
 * EMBEDS ROUTES
 * =============
 *
 * Badge images and the option catalogue behind them.
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { RawParams } from '../options/options.types.js';
import type { EmbedService } from './embeds.service.js';
import type { EmbedVariant } from './embeds.types.js';

export const BADGE_CACHE_CONTROL = 'public, max-age=60';

function describeVariant(variant: EmbedVariant) {
  const defaults = variant.schema.getDefaults();
  return {
    name: variant.name,
    width: variant.width,
    height: variant.height,
    filetypes: variant.filetypes,
    options: variant.schema.names.map((name) => {
      const def = variant.schema.definition(name);
      return {
        name,
        type: def?.type,
        description: def?.description ?? null,
        default: defaults[name] ?? null,
      };
    }),
  };
}

export async function registerEmbedRoutes(app: FastifyInstance, embeds: EmbedService): Promise<void> {

  // ═══════════════════════════════════════════════════════════════
  // GET /api/embeds
  // Variants, filetypes and the options each accepts
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/embeds', async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ ok: true, embeds: embeds.listVariants().map(describeVariant) });
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /api/embeds/:variant/defaults
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/embeds/:variant/defaults', async (req: FastifyRequest<{
    Params: { variant: string }
  }>, reply: FastifyReply) => {
    const variant = embeds.getVariant(req.params.variant);
    return reply.send({ ok: true, variant: variant.name, defaults: variant.schema.getDefaults() });
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /:subjectId/:embed   e.g. /usr_1234/large.png?border_radius=0
  // ═══════════════════════════════════════════════════════════════
  app.get('/:subjectId/:embed', async (req: FastifyRequest<{
    Params: { subjectId: string; embed: string },
    Querystring: RawParams
  }>, reply: FastifyReply) => {
    const result = await embeds.render(req.params.subjectId, req.params.embed, req.query);

    return reply
      .header('Content-Type', result.contentType)
      .header('Cache-Control', BADGE_CACHE_CONTROL)
      .header('X-Cache', result.cached ? 'HIT' : 'MISS')
      .send(result.data);
  });
}
