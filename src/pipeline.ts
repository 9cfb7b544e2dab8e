/**
 * Main Pipeline
 *
 * Wires storage, extractors and limits into a SyncOrchestrator.
 */

import { config } from './config/index.js';
import { pgStorage } from './db/storage.js';
import { createExtractorRegistry, type ExtractorRegistry } from './extractors/index.js';
import { SourceRegistry } from './sources/index.js';
import {
  FetchController,
  FingerprintIndex,
  ParsingStateStore,
  RunLogger,
  SyncOrchestrator,
} from './sync/index.js';
import { createRetryPolicy } from './utils/retry.js';
import type { SyncStorage } from './types/storage.js';

/**
 * Build an orchestrator over the given storage, using the configured limits
 */
export function createOrchestrator(
  storage: SyncStorage = pgStorage,
  extractors: ExtractorRegistry = createExtractorRegistry()
): SyncOrchestrator {
  const fetchController = new FetchController({
    rateLimits: config.rateLimit,
    callBudget: config.fetch.callBudget,
    timeoutMs: config.fetch.timeoutMs,
    retry: createRetryPolicy(config.retry),
  });

  return new SyncOrchestrator(
    {
      sources: new SourceRegistry(storage),
      extractors,
      parsingState: new ParsingStateStore(storage),
      fingerprints: new FingerprintIndex(storage),
      content: storage,
      runLogger: new RunLogger(storage),
      fetchController,
    },
    {
      concurrency: {
        rss: config.rateLimit.rss.concurrency,
        facebook: config.rateLimit.facebook.concurrency,
      },
    }
  );
}
