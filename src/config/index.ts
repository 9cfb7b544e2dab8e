/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'tunisia-news-sync',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  database: {
    url: env.DATABASE_URL,
  },

  sources: {
    file: env.SOURCES_FILE,
  },

  fetch: {
    userAgent: env.USER_AGENT,
    timeoutMs: env.FETCH_TIMEOUT_MS,
    callBudget: env.PASS_CALL_BUDGET,
  },

  retry: {
    maxAttempts: env.RETRY_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxDelayMs: env.RETRY_MAX_DELAY_MS,
    jitterMs: 250,
  },

  rateLimit: {
    rss: {
      minIntervalMs: env.RSS_MIN_INTERVAL_MS,
      concurrency: env.RSS_CONCURRENCY,
    },
    facebook: {
      minIntervalMs: env.FACEBOOK_MIN_INTERVAL_MS,
      concurrency: env.FACEBOOK_CONCURRENCY,
    },
  },

  facebook: {
    accessToken: env.FACEBOOK_ACCESS_TOKEN,
    apiVersion: env.FACEBOOK_API_VERSION,
    hoursBack: env.FACEBOOK_HOURS_BACK,
    postsLimit: env.FACEBOOK_POSTS_LIMIT,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
