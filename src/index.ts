#!/usr/bin/env node
/**
 * Sight Review Harvester
 *
 * Collects every user review of one point of interest:
 * 1. Resolves the POI id from a sight page URL (or takes it from --poi-id)
 * 2. Walks the paginated review API until it runs dry
 * 3. Saves the reviews as CSV
 * 4. Logs summary statistics
 *
 * Usage:
 *   node dist/index.js --url https://you.ctrip.com/sight/city12/4383341.html
 *   node dist/index.js --poi-id 49958175 --max-pages 5
 *   node dist/index.js --poi-id 49958175 --service   - Run now, then on CRON_SCHEDULE
 */

import { config } from './config/index.js';
import { logger, flushLogger } from './utils/logger.js';
import { AppError } from './utils/errors.js';
import { parseCliArgs, USAGE } from './cli.js';
import { runReviewPipeline } from './pipeline.js';
import type { PipelineOptions } from './pipeline.js';
import { executeScheduledRun, startScheduler, stopScheduler } from './scheduler.js';

async function executeOnce(options: PipelineOptions): Promise<void> {
  const result = await runReviewPipeline(options);

  logger.info('');
  logger.info('Harvest Complete:');
  logger.info(`  ✓ POI:        ${result.poiId}`);
  logger.info(`  ✓ Collected:  ${result.collected} reviews`);
  logger.info(`  ✓ Stopped:    ${result.stopReason}`);
  if (result.outputFile) {
    logger.info(`  ✓ Saved to:   ${result.outputFile}`);
  }
  logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  logger.info('');
  logger.info('╔═══════════════════════════════════════════════════╗');
  logger.info('║       Sight Review Harvester                      ║');
  logger.info('╚═══════════════════════════════════════════════════╝');
  logger.info('');
  logger.info({ env: config.app.env, mode: cli.mode }, 'Starting application');

  const abort = new AbortController();

  // Graceful shutdown: the current run stops at its next checkpoint and keeps what it has
  const shutdown = (): void => {
    logger.info('Shutting down...');
    abort.abort();
    stopScheduler();
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const options: PipelineOptions = { ...cli.pipeline, signal: abort.signal };

  if (cli.mode === 'run-once') {
    await executeOnce(options);
    return;
  }

  // Service mode: run now, then on every cron trigger until a signal arrives
  await executeScheduledRun(options);
  if (!abort.signal.aborted) {
    startScheduler(options);
    logger.info('Scheduler running. Press Ctrl+C to stop.');
  }
}

main()
  .catch((error: unknown) => {
    if (error instanceof AppError) {
      logger.fatal({ code: error.code, error: error.message }, 'Harvest aborted');
    } else {
      logger.fatal({ error }, 'Application failed');
    }
    process.exitCode = 1;
  })
  .finally(() => {
    flushLogger();
  });
