/**
 * BADGE EMBED SERVER
 * ==================
 *
 * Wires caches, clients and routes from the environment, then listens.
 */

import { env } from './config/env.js';
import { ProfileApiClient } from './clients/index.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import { startCachePruneCron } from './jobs/cache-prune.job.js';
import { buildApp, registerApiRoutes } from './app.js';
import { EmbedService } from './modules/embeds/index.js';
import { FetchCache } from './modules/fetch-cache/index.js';
import {
  MemoryProfileStore,
  MongoProfileStore,
  ProfileService,
  type ProfileStore,
} from './modules/profiles/index.js';
import { FontRegistry, Rasterizer } from './modules/raster/index.js';
import { RenderCache } from './modules/render-cache/index.js';

async function main(): Promise<void> {
  const profileTtlMs = env.PROFILE_CACHE_TTL_SEC * 1000;

  const app = buildApp({
    logLevel: env.LOG_LEVEL,
    corsOrigins: env.CORS_ORIGINS,
    production: env.NODE_ENV === 'production',
  });
  const log = app.log;

  let store: ProfileStore;
  if (env.MONGO_URL) {
    await connectMongo(env.MONGO_URL);
    await ensureIndexes();
    store = new MongoProfileStore(log);
  } else {
    log.info('[Server] MONGO_URL not set, caching profiles in memory');
    store = new MemoryProfileStore(profileTtlMs);
  }

  const renders = new RenderCache({ directory: env.RENDERS_PATH, logger: log });
  await renders.init();

  const fetchCache = await FetchCache.create({
    idleMs: env.FETCH_CACHE_IDLE_HOURS * 60 * 60 * 1000,
    userAgent: env.USER_AGENT,
    logger: log,
  });

  const profiles = new ProfileService(
    new ProfileApiClient({
      baseUrl: env.UPSTREAM_API_URL,
      timeout: env.UPSTREAM_TIMEOUT_MS,
      userAgent: env.USER_AGENT,
      authCookie: env.UPSTREAM_AUTH_COOKIE,
      twoFactorCookie: env.UPSTREAM_2FA_COOKIE,
      logger: log,
    }),
    store,
    {
      ttlMs: profileTtlMs,
      logger: log,
      onRefresh: (id) => renders.purgeSubject(id),
    },
  );

  const embeds = new EmbedService({
    profiles,
    renders,
    images: fetchCache,
    rasterizer: new Rasterizer(new FontRegistry(env.FONTS_PATH, undefined, log)),
    logger: log,
  });

  registerApiRoutes(app, {
    embeds,
    cacheStats: () => ({
      fetch: fetchCache.stats(),
      renders: renders.stats(),
      profiles: profiles.stats(),
      rendersInFlight: embeds.inFlight(),
    }),
  });

  const pruneTask = startCachePruneCron({ fetchCache, profiles }, env.PRUNE_CRON, log);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info(`[Server] Received ${signal}, shutting down...`);
    pruneTask.stop();
    try {
      await app.close();
      await fetchCache.close();
      await disconnectMongo();
      log.info('[Server] Shutdown complete');
      process.exit(0);
    } catch (err) {
      log.error(err, '[Server] Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
  process.on('SIGINT', () => { void shutdown('SIGINT'); });

  await app.listen({ port: env.PORT, host: env.HOST });
  log.info(`[Server] Badge embeds listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err) => {
  console.error('[Server] Fatal startup error:', err);
  process.exit(1);
});
