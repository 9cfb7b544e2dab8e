/**
 * Sync Orchestrator
 *
 * Drives one pass over the active sources. Each source runs through
 * PENDING → FETCHING → FILTERING → PERSISTING → ADVANCING_CURSOR → DONE,
 * or ends in ERROR from any step. Failures are contained per source.
 */

import pLimit from 'p-limit';
import type {
  ContentItem,
  ParsingState,
  PassSummary,
  RunCounts,
  RunRecord,
  Source,
  SourceRunSummary,
  SourceType,
} from '../types/index.js';
import type { ContentRepository } from '../types/storage.js';
import { BudgetExhaustedError, DuplicateKeyError, StorageError, describeError } from '../errors.js';
import { ACTIVITY_RANKED_TYPES, type SourceRegistry } from '../sources/registry.js';
import type { ExtractorRegistry } from '../extractors/registry.js';
import { collectItems } from '../extractors/normalize.js';
import type { CallBudget } from '../utils/rate-limiter.js';
import { logger, type Logger } from '../utils/logger.js';
import type { FetchController } from './fetch-controller.js';
import type { FingerprintIndex } from './fingerprint.js';
import { isAtOrBeforeCursor, orderForPersistence, type ParsingStateStore } from './parsing-state.js';
import type { RunHandle, RunLogger, RunOutcome } from './run-logger.js';

export type SyncState =
  | 'PENDING'
  | 'FETCHING'
  | 'FILTERING'
  | 'PERSISTING'
  | 'ADVANCING_CURSOR'
  | 'DONE'
  | 'ERROR';

export interface SyncOrchestratorDeps {
  sources: SourceRegistry;
  extractors: ExtractorRegistry;
  parsingState: ParsingStateStore;
  fingerprints: FingerprintIndex;
  content: Pick<ContentRepository, 'insertContentItem'>;
  runLogger: RunLogger;
  fetchController: FetchController;
}

export interface SyncOrchestratorOptions {
  /** Worker pool size per source type */
  concurrency: Record<SourceType, number>;
}

export interface SyncOptions {
  signal?: AbortSignal;
  /** Re-fetch from scratch, ignoring the cursor. Fingerprints still apply. */
  force?: boolean;
}

export interface PassOptions extends SyncOptions {
  type?: SourceType;
}

interface SourceOutcome extends RunOutcome {
  budgetExhausted: boolean;
}

interface PersistResult {
  /** Persisted (or already present) items up to the first failure */
  prefix: ContentItem[];
}

export class SyncOrchestrator {
  private readonly inFlight = new Set<number>();

  constructor(
    private readonly deps: SyncOrchestratorDeps,
    private readonly options: SyncOrchestratorOptions
  ) {}

  /**
   * One pass over every active source, optionally of a single type.
   * Only an unreadable source registry rejects; everything else lands in the summary.
   */
  async runPass(options: PassOptions = {}): Promise<PassSummary> {
    const startTime = Date.now();
    const sources = await this.deps.sources.listActiveSources(options.type);
    const budget = this.deps.fetchController.createBudget();

    logger.info(
      { sources: sources.length, type: options.type ?? 'all', callBudget: budget.limit, force: options.force ?? false },
      'Starting sync pass'
    );

    const pools = {
      rss: pLimit(this.options.concurrency.rss),
      facebook: pLimit(this.options.concurrency.facebook),
    };

    let budgetExhausted = false;
    const settled = await Promise.all(
      sources.map((source) =>
        pools[source.type](async () => {
          if (options.signal?.aborted) {
            return null;
          }
          const result = await this.runSource(source, budget, options);
          if (result?.budgetExhausted) {
            budgetExhausted = true;
          }
          return result?.summary ?? null;
        })
      )
    );

    const results = settled.filter((result): result is SourceRunSummary => result !== null);
    const summary: PassSummary = {
      sourcesAttempted: results.length,
      sourcesSucceeded: results.filter((r) => r.status === 'success').length,
      sourcesPartial: results.filter((r) => r.status === 'partial').length,
      sourcesFailed: results.filter((r) => r.status === 'failed').length,
      sourcesSkipped: sources.length - results.length,
      itemsInserted: results.reduce((sum, r) => sum + r.itemsInserted, 0),
      callsUsed: budget.consumed,
      budgetExhausted,
      cancelled: options.signal?.aborted ?? false,
      results,
      durationMs: Date.now() - startTime,
    };

    logger.info(
      {
        attempted: summary.sourcesAttempted,
        succeeded: summary.sourcesSucceeded,
        partial: summary.sourcesPartial,
        failed: summary.sourcesFailed,
        skipped: summary.sourcesSkipped,
        itemsInserted: summary.itemsInserted,
        callsUsed: summary.callsUsed,
        budgetExhausted: summary.budgetExhausted,
        cancelled: summary.cancelled,
        durationMs: summary.durationMs,
      },
      'Sync pass complete'
    );

    return summary;
  }

  /**
   * Sync a single source with its own call budget.
   * Resolves to null when the source is already being synced.
   */
  async syncSource(sourceId: number, options: SyncOptions = {}): Promise<SourceRunSummary | null> {
    const source = await this.deps.sources.getSource(sourceId);
    const result = await this.runSource(source, this.deps.fetchController.createBudget(), options);
    return result?.summary ?? null;
  }

  getLastRunStatus(): Promise<RunRecord[]> {
    return this.deps.runLogger.getLastRunStatuses();
  }

  private async runSource(
    source: Source,
    budget: CallBudget,
    options: SyncOptions
  ): Promise<{ summary: SourceRunSummary; budgetExhausted: boolean } | null> {
    if (this.inFlight.has(source.id)) {
      logger.warn({ sourceId: source.id, source: source.name }, 'Source already syncing, skipping');
      return null;
    }

    this.inFlight.add(source.id);
    const startTime = Date.now();
    let budgetExhausted = false;

    try {
      const record = await this.deps.runLogger.track(source, async (handle) => {
        const outcome = await this.processSource(source, budget, handle, options.force ?? false);
        budgetExhausted = outcome.budgetExhausted;
        return outcome;
      });

      await this.recordOutcome(source, record, budgetExhausted);

      const summary: SourceRunSummary = {
        sourceId: source.id,
        sourceName: source.name,
        sourceType: source.type,
        status: record.status,
        error: record.error,
        itemsFetched: record.itemsFetched,
        itemsInserted: record.itemsInserted,
        itemsDuplicate: record.itemsDuplicate,
        itemsFailed: record.itemsFailed,
        durationMs: Date.now() - startTime,
      };

      const logLevel = summary.status === 'failed' ? 'warn' : 'info';
      logger[logLevel](
        {
          source: source.name,
          status: summary.status,
          fetched: summary.itemsFetched,
          inserted: summary.itemsInserted,
          duplicate: summary.itemsDuplicate,
          failed: summary.itemsFailed,
          error: summary.error ?? undefined,
        },
        'Source sync finished'
      );

      return { summary, budgetExhausted };
    } finally {
      this.inFlight.delete(source.id);
    }
  }

  private async processSource(
    source: Source,
    budget: CallBudget,
    handle: RunHandle,
    force: boolean
  ): Promise<SourceOutcome> {
    const log = logger.child({ sourceId: source.id, source: source.name });
    let state: SyncState = 'PENDING';
    const transition = (next: SyncState): void => {
      log.debug({ from: state, to: next }, 'Sync state transition');
      state = next;
    };

    try {
      const adapter = this.deps.extractors.resolve(source);
      adapter.validate?.(source);
      const cursor = await this.deps.parsingState.load(source.id);

      transition('FETCHING');
      const items = await this.deps.fetchController.execute(
        source.type,
        budget,
        (signal) => collectItems(adapter.fetch(source, force ? null : cursor, { signal })),
        source.name
      );
      handle.counts.itemsFetched = items.length;

      transition('FILTERING');
      const fresh = await this.filterNew(source, items, force ? null : cursor, handle.counts);

      transition('PERSISTING');
      const { prefix } = await this.persist(fresh, handle.counts, log);

      if (handle.counts.itemsFailed > 0 && handle.counts.itemsInserted === 0) {
        transition('ERROR');
        return {
          status: 'failed',
          error: `All ${handle.counts.itemsFailed} new items failed to persist`,
          budgetExhausted: false,
        };
      }

      transition('ADVANCING_CURSOR');
      await this.deps.parsingState.advance(source.id, cursor, prefix);

      transition('DONE');
      return {
        status: handle.counts.itemsFailed > 0 ? 'partial' : 'success',
        error: null,
        budgetExhausted: false,
      };
    } catch (error) {
      transition('ERROR');
      log.warn({ error: describeError(error) }, 'Source sync failed');
      return {
        status: 'failed',
        error: describeError(error),
        budgetExhausted: error instanceof BudgetExhaustedError,
      };
    }
  }

  /**
   * Drop items already seen: behind the cursor, repeated within the batch, or
   * with a stored fingerprint. The survivors come back in persistence order.
   */
  private async filterNew(
    source: Source,
    items: ContentItem[],
    cursor: ParsingState | null,
    counts: RunCounts
  ): Promise<ContentItem[]> {
    const seen = new Set<string>();
    const fresh: ContentItem[] = [];

    for (const item of items) {
      if (seen.has(item.contentHash)) {
        counts.itemsDuplicate++;
        continue;
      }
      seen.add(item.contentHash);

      if (
        isAtOrBeforeCursor(item, cursor) ||
        (await this.deps.fingerprints.isDuplicate(item.contentHash, source.id))
      ) {
        counts.itemsDuplicate++;
        continue;
      }

      fresh.push(item);
    }

    return orderForPersistence(fresh);
  }

  /**
   * Insert items one by one. A recoverable storage error fails the item and ends
   * the prefix; an unrecoverable one fails the source.
   */
  private async persist(items: ContentItem[], counts: RunCounts, log: Logger): Promise<PersistResult> {
    const prefix: ContentItem[] = [];
    let contiguous = true;

    for (const item of items) {
      try {
        await this.deps.content.insertContentItem(item);
        counts.itemsInserted++;
      } catch (error) {
        if (error instanceof DuplicateKeyError) {
          counts.itemsDuplicate++;
        } else if (error instanceof StorageError && error.recoverable) {
          counts.itemsFailed++;
          contiguous = false;
          log.warn({ externalId: item.externalId, error: error.message }, 'Failed to persist item');
          continue;
        } else {
          throw error;
        }
      }

      if (contiguous) {
        prefix.push(item);
      }
    }

    return { prefix };
  }

  /**
   * Health bookkeeping is best-effort: a failure here never changes the run's status.
   * Budget exhaustion says nothing about the source, so it is not counted.
   */
  private async recordOutcome(source: Source, record: RunRecord, budgetExhausted: boolean): Promise<void> {
    if (budgetExhausted) {
      return;
    }

    try {
      await this.deps.sources.recordOutcome(source.id, record.status !== 'failed', {
        itemsInserted: ACTIVITY_RANKED_TYPES.has(source.type) ? record.itemsInserted : undefined,
      });
    } catch (error) {
      logger.error({ sourceId: source.id, error: describeError(error) }, 'Failed to record source outcome');
    }
  }
}
