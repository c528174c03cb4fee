/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'sight-review-harvester',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  api: {
    reviewUrl: env.REVIEW_API_URL,
    sightOrigin: env.SIGHT_ORIGIN,
    defaultSightUrl: env.DEFAULT_SIGHT_URL,
    userAgent: env.USER_AGENT,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    pageSize: env.PAGE_SIZE,
    // Session fields the review endpoint expects on every request
    head: {
      cid: '09031025312449459187',
      ctok: '',
      cver: '1.0',
      lang: '01',
      sid: '8888',
      syscode: '09',
      auth: '',
      xsid: '',
    },
  },

  retrieval: {
    minDelayMs: env.MIN_DELAY_MS,
    maxDelayMs: env.MAX_DELAY_MS,
    maxConsecutiveFailures: env.MAX_CONSECUTIVE_FAILURES,
    backoff: {
      httpErrorMs: 3000,
      connectionErrorMs: 10000,
      timeoutMs: 5000,
      requestErrorMs: 5000,
    },
  },

  output: {
    dir: env.OUTPUT_DIR,
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
