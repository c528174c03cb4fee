/**
 * Process-wide pino logger
 *
 * Writes to stdout and, when LOG_FILE is set, appends the same lines to a file.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { config } from '../config/index.js';

function createLogger(): Logger {
  const level = config.logging.level;
  const streamLevel: pino.Level = level === 'silent' ? 'fatal' : level;
  const streams: pino.StreamEntry[] = [{ level: streamLevel, stream: process.stdout }];

  if (config.logging.file && config.app.env !== 'test') {
    streams.push({
      level: streamLevel,
      stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: true }),
    });
  }

  return pino(
    {
      level,
      base: { app: config.app.name },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}

export const logger = createLogger();

/**
 * Flush buffered log lines, called once before the process exits
 */
export function flushLogger(): void {
  logger.flush();
}

export type { Logger };
