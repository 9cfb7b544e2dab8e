/**
 * Run Logger
 *
 * One RunRecord per source per pass. `track` wraps the per-source block so the
 * record is finalized on every exit path, including unexpected exceptions.
 */

import type { RunCounts, RunRecord, RunStatus, Source, SourceType } from '../types/index.js';
import type { RunLogRepository } from '../types/storage.js';
import { describeError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface RunHandle {
  readonly sourceId: number;
  readonly sourceType: SourceType;
  readonly startedAt: Date;
  /** Updated in place while the run progresses */
  readonly counts: RunCounts;
  finished: boolean;
}

export interface RunOutcome {
  status: RunStatus;
  error?: string | null;
}

export function emptyCounts(): RunCounts {
  return { itemsFetched: 0, itemsInserted: 0, itemsDuplicate: 0, itemsFailed: 0 };
}

export class RunLogger {
  constructor(
    private readonly repository: RunLogRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  startRun(sourceId: number, sourceType: SourceType): RunHandle {
    return {
      sourceId,
      sourceType,
      startedAt: this.now(),
      counts: emptyCounts(),
      finished: false,
    };
  }

  async finishRun(
    handle: RunHandle,
    counts: RunCounts,
    status: RunStatus,
    error: string | null = null
  ): Promise<RunRecord> {
    if (handle.finished) {
      throw new Error(`Run for source ${handle.sourceId} already finished`);
    }
    handle.finished = true;

    const record: RunRecord = {
      sourceId: handle.sourceId,
      sourceType: handle.sourceType,
      startedAt: handle.startedAt,
      finishedAt: this.now(),
      ...counts,
      status,
      error,
    };

    await this.repository.appendRunRecord(record);
    return record;
  }

  /**
   * Run `body` and write its RunRecord exactly once. A thrown error becomes a
   * failed record; a record that cannot be stored is logged, not rethrown.
   */
  async track(source: Source, body: (handle: RunHandle) => Promise<RunOutcome>): Promise<RunRecord> {
    const handle = this.startRun(source.id, source.type);

    let outcome: RunOutcome;
    try {
      outcome = await body(handle);
    } catch (error) {
      outcome = { status: 'failed', error: describeError(error) };
    }

    const counts = { ...handle.counts };
    try {
      return await this.finishRun(handle, counts, outcome.status, outcome.error ?? null);
    } catch (error) {
      logger.error({ sourceId: source.id, error: describeError(error) }, 'Failed to store run record');
      return {
        sourceId: source.id,
        sourceType: source.type,
        startedAt: handle.startedAt,
        finishedAt: this.now(),
        ...counts,
        status: outcome.status,
        error: outcome.error ?? null,
      };
    }
  }

  getLastRunStatuses(): Promise<RunRecord[]> {
    return this.repository.getLastRunRecords();
  }
}
