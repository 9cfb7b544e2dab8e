/**
 * Scheduler
 *
 * Runs a sync pass on a cron schedule
 */

import cron from 'node-cron';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import type { PassSummary } from './types/index.js';

export type PassRunner = (signal: AbortSignal) => Promise<PassSummary>;

/**
 * Scheduler state
 */
let scheduledTask: cron.ScheduledTask | null = null;
let currentPass: Promise<PassSummary | null> | null = null;
let activeController: AbortController | null = null;

/**
 * Execute a pass with a lock to prevent overlapping runs.
 * Resolves to null when a previous pass is still running.
 */
export function executePass(runner: PassRunner): Promise<PassSummary | null> {
  if (currentPass) {
    logger.warn('Sync pass already running, skipping this execution');
    return Promise.resolve(null);
  }

  const controller = new AbortController();
  activeController = controller;
  currentPass = runLocked(runner, controller.signal).finally(() => {
    currentPass = null;
    activeController = null;
  });
  return currentPass;
}

async function runLocked(runner: PassRunner, signal: AbortSignal): Promise<PassSummary | null> {
  const startTime = new Date();

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled sync starting');

  try {
    const summary = await runner(signal);

    logger.info(
      {
        startTime: startTime.toISOString(),
        endTime: new Date().toISOString(),
        attempted: summary.sourcesAttempted,
        failed: summary.sourcesFailed,
        itemsInserted: summary.itemsInserted,
      },
      'Scheduled sync completed'
    );
    return summary;
  } catch (error) {
    logger.error({ error }, 'Scheduled sync failed');
    return null;
  }
}

/**
 * Start the scheduler
 */
export function startScheduler(runner: PassRunner): void {
  const cronExpression = config.scheduler.cronExpression;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info(
    {
      cronExpression,
      timezone: config.scheduler.timezone,
    },
    'Starting scheduler'
  );

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      void executePass(runner);
    },
    {
      timezone: config.scheduler.timezone,
    }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler, ask a running pass to stop dispatching sources, and
 * wait for its in-flight sources to finish
 */
export async function stopScheduler(): Promise<void> {
  activeController?.abort();

  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }

  if (currentPass) {
    await currentPass;
  }
}
