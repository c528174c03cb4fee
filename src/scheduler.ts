/**
 * Scheduler
 *
 * Re-runs the harvest for one POI on a cron schedule. A trigger that fires
 * while the previous harvest is still in flight is skipped.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { runReviewPipeline } from './pipeline.js';
import type { PipelineOptions } from './pipeline.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import type { PipelineResult } from './types/index.js';

let task: ScheduledTask | null = null;
let activeHarvest: Promise<PipelineResult> | null = null;

/**
 * Run one harvest unless another is in flight
 *
 * @returns the run result, or null when the trigger was skipped
 */
export async function executeScheduledRun(options: PipelineOptions): Promise<PipelineResult | null> {
  if (activeHarvest) {
    logger.warn({ poiId: options.poiId, url: options.url }, 'Previous harvest still running, skipping trigger');
    return null;
  }

  activeHarvest = runReviewPipeline(options);
  try {
    const result = await activeHarvest;
    logger.info(
      { poiId: result.poiId, collected: result.collected, stopReason: result.stopReason },
      'Scheduled harvest finished'
    );
    return result;
  } finally {
    activeHarvest = null;
  }
}

/**
 * Schedule repeated harvests in the configured timezone
 *
 * @throws Error when the cron expression does not parse
 */
export function startScheduler(
  options: PipelineOptions,
  cronExpression: string = config.scheduler.cronExpression
): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  stopScheduler();

  const { timezone } = config.scheduler;
  task = cron.schedule(
    cronExpression,
    () => {
      executeScheduledRun(options).catch((error: unknown) => {
        logger.error({ error }, 'Scheduled harvest failed');
      });
    },
    { timezone }
  );

  logger.info({ cronExpression, timezone }, 'Harvest scheduled');
  return task;
}

/**
 * Cancel future triggers. A harvest already in flight is left to finish.
 *
 * @returns whether a schedule was active
 */
export function stopScheduler(): boolean {
  if (!task) {
    return false;
  }
  task.stop();
  task = null;
  logger.info('Harvest schedule cancelled');
  return true;
}
