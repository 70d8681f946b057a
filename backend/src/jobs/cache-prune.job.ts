/**
 * CACHE PRUNE JOB
 * ===============
 *
 * Hourly by default: drops fetch-cache images idle for longer than the
 * threshold and expired profile cache entries.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from '../common/errors.js';
import { noopLogger, type Logger } from '../common/logger.js';

export interface Prunable {
  prune(): Promise<number>;
}

export interface CachePruneTargets {
  fetchCache: Prunable;
  profiles: Prunable;
}

export interface CachePruneResult {
  images: number;
  profiles: number;
}

export async function runCachePrune(targets: CachePruneTargets, logger: Logger = noopLogger): Promise<CachePruneResult> {
  const [images, profiles] = await Promise.allSettled([
    targets.fetchCache.prune(),
    targets.profiles.prune(),
  ]);

  const result: CachePruneResult = { images: 0, profiles: 0 };
  if (images.status === 'fulfilled') {
    result.images = images.value;
  } else {
    logger.error({ err: errorMessage(images.reason) }, '[Prune Cron] Fetch cache prune failed');
  }
  if (profiles.status === 'fulfilled') {
    result.profiles = profiles.value;
  } else {
    logger.error({ err: errorMessage(profiles.reason) }, '[Prune Cron] Profile cache prune failed');
  }

  logger.info(result, '[Prune Cron] Done');
  return result;
}

export function startCachePruneCron(
  targets: CachePruneTargets,
  expression: string,
  logger: Logger = noopLogger,
): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`[Prune Cron] Invalid cron expression: ${expression}`);
  }

  const task = cron.schedule(expression, async () => {
    await runCachePrune(targets, logger);
  });

  logger.info({ expression }, '[Prune Cron] Started');
  return task;
}
