/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().optional(),

  // Fetching
  USER_AGENT: z.string().default('Mozilla/5.0 (compatible; TunisiaNewsSync/1.0)'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(30000),
  PASS_CALL_BUDGET: z.coerce.number().int().positive().default(200),

  // RSS
  RSS_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  RSS_CONCURRENCY: z.coerce.number().int().positive().default(5),

  // Facebook Graph API
  FACEBOOK_ACCESS_TOKEN: z.string().optional(),
  FACEBOOK_API_VERSION: z.string().default('v18.0'),
  FACEBOOK_HOURS_BACK: z.coerce.number().int().positive().default(336), // 14 days
  FACEBOOK_POSTS_LIMIT: z.coerce.number().int().positive().max(100).default(100),
  FACEBOOK_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(300),
  FACEBOOK_CONCURRENCY: z.coerce.number().int().positive().default(2),

  // Sources
  SOURCES_FILE: z.string().default('./config/sources.json'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().optional(),

  // Scheduling
  CRON_SCHEDULE: z.string().default('*/30 * * * *'),
  TZ: z.string().default('Africa/Tunis'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
