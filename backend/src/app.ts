import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import { registerEmbedRoutes } from './modules/embeds/embeds.routes.js';
import type { EmbedService } from './modules/embeds/embeds.service.js';

export interface AppDeps {
  embeds: EmbedService;
  /** Snapshot of every cache's counters for /api/cache/stats. */
  cacheStats: () => Record<string, unknown>;
}

export interface AppOptions {
  logLevel?: string;
  corsOrigins?: string;
  production?: boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: AppOptions = {}): FastifyInstance {
  const production = options.production ?? false;
  const corsOrigins = options.corsOrigins ?? '*';

  const app = Fastify({
    logger: {
      level: options.logLevel ?? 'info',
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: corsOrigins === '*' ? true : corsOrigins.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        app.log.error(err);
      } else {
        app.log.info({ code: err.code, message: err.message }, '[App] Request rejected');
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: production ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    ts: new Date().toISOString(),
  }));

  return app;
}

/**
 * Register the badge API. Separate from buildApp so services can log
 * through `app.log`.
 */
export function registerApiRoutes(app: FastifyInstance, deps: AppDeps): void {
  app.get('/api/cache/stats', async () => ({
    ok: true,
    ...deps.cacheStats(),
  }));

  app.register(async (fastify) => {
    await registerEmbedRoutes(fastify, deps.embeds);
  });
}
