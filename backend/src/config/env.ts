/**
 * ENVIRONMENT
 * ===========
 *
 * Parsed once at import. An invalid environment aborts startup.
 */

import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  RENDERS_PATH: z.string().default(path.resolve('renders')),
  FONTS_PATH: z.string().default(path.resolve('fonts')),
  FETCH_CACHE_IDLE_HOURS: z.coerce.number().positive().default(12),
  PRUNE_CRON: z.string().default('0 * * * *'),

  UPSTREAM_API_URL: z.string().url().default('https://api.vrchat.cloud/api/1'),
  UPSTREAM_AUTH_COOKIE: z.string().optional(),
  UPSTREAM_2FA_COOKIE: z.string().optional(),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PROFILE_CACHE_TTL_SEC: z.coerce.number().int().positive().default(60),
  USER_AGENT: z.string().default('badge-embed/1.0'),

  MONGO_URL: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
