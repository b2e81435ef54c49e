/**
 * Process configuration.
 *
 * dotenv loads .env into process.env, then a zod schema validates and coerces
 * it once at startup. Every other module imports `config` instead of reading
 * process.env directly.
 */

import 'dotenv/config'
import { z } from 'zod'

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  CATALOG_OUT_DIR: z.string().min(1).default('./out'),
  CATALOG_COUNTRY: z.string().min(2).default('US'),
  CATALOG_LOCALE: z.string().min(2).default('en-US'),

  /** Minimum spacing between two requests to the same domain */
  RATE_LIMIT_INTERVAL_MS: z.coerce.number().int().min(0).default(2000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  /** 0 disables retries; the pipeline itself never retries */
  FETCH_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
  USER_AGENT: z
    .string()
    .default('Mozilla/5.0 (compatible; game-store-catalog/0.1; +https://example.invalid/bot)'),
})

const parsed = envSchema.safeParse(process.env)

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors)
  process.exit(1)
}

const env = parsed.data

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',

  log: {
    level: env.LOG_LEVEL,
  },

  catalog: {
    outDir: env.CATALOG_OUT_DIR,
    country: env.CATALOG_COUNTRY,
    locale: env.CATALOG_LOCALE,
  },

  http: {
    rateLimitIntervalMs: env.RATE_LIMIT_INTERVAL_MS,
    timeoutMs: env.FETCH_TIMEOUT_MS,
    maxRetries: env.FETCH_MAX_RETRIES,
    userAgent: env.USER_AGENT,
  },
} as const
