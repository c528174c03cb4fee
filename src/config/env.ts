/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  // Review API
  REVIEW_API_URL: z
    .string()
    .url()
    .default('https://m.ctrip.com/restapi/soa2/13444/json/getCommentCollapseList'),
  SIGHT_ORIGIN: z.string().url().default('https://you.ctrip.com'),
  DEFAULT_SIGHT_URL: z.string().url().default('https://you.ctrip.com/sight/shanghai2/25506.html'),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),

  // Retrieval
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  PAGE_SIZE: z.coerce.number().int().positive().default(10),
  MIN_DELAY_MS: z.coerce.number().nonnegative().default(1500),
  MAX_DELAY_MS: z.coerce.number().nonnegative().default(3000),
  MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().positive().default(3),

  // Output
  OUTPUT_DIR: z.string().default('.'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().default('./logs/harvester.log'), // empty string disables the file sink

  // Scheduling
  CRON_SCHEDULE: z.string().default('0 3 * * *'),
  TZ: z.string().default('Asia/Shanghai'),

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
