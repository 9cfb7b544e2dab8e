import type { SourceType } from '../../src/types/index.js';
import type { ExtractorAdapter } from '../../src/extractors/types.js';
import { ExtractorRegistry } from '../../src/extractors/registry.js';
import { SourceRegistry } from '../../src/sources/registry.js';
import { FetchController } from '../../src/sync/fetch-controller.js';
import { FingerprintIndex } from '../../src/sync/fingerprint.js';
import { ParsingStateStore } from '../../src/sync/parsing-state.js';
import { RunLogger } from '../../src/sync/run-logger.js';
import { SyncOrchestrator } from '../../src/sync/orchestrator.js';
import { createRetryPolicy } from '../../src/utils/retry.js';
import { TestClock } from './fakes.js';
import type { MemoryStorage } from './memory-storage.js';

export interface TestOrchestratorOptions {
  callBudget?: number;
  concurrency?: Partial<Record<SourceType, number>>;
  extractors?: ExtractorRegistry;
}

/**
 * Orchestrator over in-memory storage; no rate-limit spacing, no jitter, instant sleeps
 */
export function buildOrchestrator(
  storage: MemoryStorage,
  adapter: ExtractorAdapter,
  options: TestOrchestratorOptions = {}
): { orchestrator: SyncOrchestrator; clock: TestClock } {
  const clock = new TestClock();
  const extractors =
    options.extractors ?? new ExtractorRegistry().register('rss', adapter).register('facebook', adapter);

  const fetchController = new FetchController({
    rateLimits: { rss: { minIntervalMs: 0 }, facebook: { minIntervalMs: 0 } },
    callBudget: options.callBudget ?? 100,
    timeoutMs: 5000,
    retry: createRetryPolicy({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000, jitterMs: 0 }),
    clock,
    random: () => 0,
  });

  const orchestrator = new SyncOrchestrator(
    {
      sources: new SourceRegistry(storage),
      extractors,
      parsingState: new ParsingStateStore(storage, () => new Date('2024-05-01T14:00:00Z')),
      fingerprints: new FingerprintIndex(storage),
      content: storage,
      runLogger: new RunLogger(storage),
      fetchController,
    },
    {
      concurrency: { rss: options.concurrency?.rss ?? 5, facebook: options.concurrency?.facebook ?? 2 },
    }
  );

  return { orchestrator, clock };
}
