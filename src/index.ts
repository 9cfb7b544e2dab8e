/**
 * Tunisia News Source Synchronizer
 *
 * Pulls new items from Tunisian news RSS feeds and Facebook pages into
 * PostgreSQL, tracking a per-source cursor so each pass only stores what is new.
 *
 * Usage:
 *   node dist/src/index.js --service        - Run as service (cron-scheduled passes)
 *   node dist/src/index.js --run            - Run one sync pass and exit
 *   node dist/src/index.js --run --type=rss - Only sync one source type
 *   node dist/src/index.js --run --force    - Ignore cursors (fingerprints still dedupe)
 *   node dist/src/index.js --source=12      - Sync a single source and exit
 *   node dist/src/index.js --seed           - Load config/sources.json into the registry
 *   node dist/src/index.js --status         - Print the last run of every source
 *   node dist/src/index.js                  - Default: service mode
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { getStats } from './db/queries.js';
import { pgStorage } from './db/storage.js';
import { createOrchestrator } from './pipeline.js';
import { loadSourceDefinitions, seedSources } from './sources/index.js';
import { startScheduler, stopScheduler, executePass } from './scheduler.js';
import { parseArgs, type CliOptions } from './cli.js';
import type { PassSummary } from './types/index.js';

function logPassSummary(summary: PassSummary): void {
  logger.info('');
  logger.info('Sync Pass Complete:');
  logger.info(`  ✓ Succeeded:  ${summary.sourcesSucceeded} sources`);
  logger.info(`  ~ Partial:    ${summary.sourcesPartial} sources`);
  if (summary.sourcesFailed > 0) {
    logger.info(`  ⚠ Failed:     ${summary.sourcesFailed} sources`);
  }
  if (summary.sourcesSkipped > 0) {
    logger.info(`  - Skipped:    ${summary.sourcesSkipped} sources`);
  }
  logger.info(`  ✓ Inserted:   ${summary.itemsInserted} items`);
  logger.info(`  ✓ Calls:      ${summary.callsUsed}${summary.budgetExhausted ? ' (budget exhausted)' : ''}`);
  logger.info(`  ⏱ Duration:   ${(summary.durationMs / 1000).toFixed(1)}s`);
}

async function runCommand(options: CliOptions, signal: AbortSignal): Promise<boolean> {
  const orchestrator = createOrchestrator();

  switch (options.mode) {
    case 'seed': {
      const definitions = await loadSourceDefinitions(config.sources.file);
      await seedSources(pgStorage, definitions);
      return true;
    }

    case 'status': {
      const records = await orchestrator.getLastRunStatus();
      for (const record of records) {
        logger.info(
          {
            sourceId: record.sourceId,
            type: record.sourceType,
            status: record.status,
            inserted: record.itemsInserted,
            finishedAt: record.finishedAt.toISOString(),
            error: record.error ?? undefined,
          },
          'Last run'
        );
      }
      return true;
    }

    case 'source': {
      if (options.sourceId === undefined) {
        return false;
      }
      const result = await orchestrator.syncSource(options.sourceId, { signal, force: options.force });
      return result !== null && result.status !== 'failed';
    }

    default: {
      const summary = await orchestrator.runPass({ type: options.type, force: options.force, signal });
      logPassSummary(summary);
      return true;
    }
  }
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  logger.info('');
  logger.info('╔═══════════════════════════════════════════════════╗');
  logger.info('║       Tunisia News Source Synchronizer            ║');
  logger.info('╚═══════════════════════════════════════════════════╝');
  logger.info('');
  logger.info({ env: config.app.env, mode: options.mode }, 'Starting application');

  // Initialize database
  try {
    await initDatabase();
    const stats = await getStats();
    logger.info(
      {
        activeSources: stats.activeSources,
        totalItems: stats.totalItems,
        pendingEnrichment: stats.pendingEnrichment,
        failingSources: stats.failingSources,
        lastRun: stats.lastRunAt?.toISOString() ?? 'never',
      },
      'Database ready'
    );
  } catch (error) {
    logger.fatal({ error }, 'Failed to initialize database');
    process.exit(1);
  }

  const controller = new AbortController();

  if (options.mode === 'service') {
    let stopping = false;
    const shutdown = (): void => {
      if (stopping) return;
      stopping = true;
      logger.info('Shutting down...');
      stopScheduler()
        .then(() => closeDatabase())
        .catch((error: unknown) => {
          logger.error({ error }, 'Shutdown failed');
          process.exitCode = 1;
        });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    const orchestrator = createOrchestrator();
    const runner = (signal: AbortSignal): Promise<PassSummary> => orchestrator.runPass({ signal });

    logger.info('Running initial sync pass...');
    await executePass(runner);
    if (stopping) {
      return;
    }
    startScheduler(runner);
    logger.info('Scheduler running. Press Ctrl+C to stop.');
    return;
  }

  // One-shot commands: first signal stops dispatching new sources
  process.on('SIGINT', () => controller.abort());
  process.on('SIGTERM', () => controller.abort());

  let ok = false;
  try {
    ok = await runCommand(options, controller.signal);
  } finally {
    await closeDatabase();
  }

  if (!ok) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
