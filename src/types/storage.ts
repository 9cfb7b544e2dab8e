/**
 * Persistence contracts consumed by the sync engine.
 *
 * The PostgreSQL implementation lives in src/db; tests use in-memory stand-ins.
 */

import type { ContentItem, ParsingState, RunRecord, Source, SourceType } from './index.js';

export interface SourceDefinition {
  name: string;
  url: string;
  type: SourceType;
  siteKey?: string | null;
  isActive?: boolean;
  priority?: number;
}

export interface SourceRepository {
  listActiveSources(type?: SourceType): Promise<Source[]>;
  getSourceById(id: number): Promise<Source | null>;
  /** Resolves false when the source does not exist */
  recordSourceSuccess(id: number, fetchedAt: Date): Promise<boolean>;
  /** Resolves false when the source does not exist */
  recordSourceFailure(id: number): Promise<boolean>;
  /** Adds `delta`, clamped to PRIORITY_RANGE and rounded to one decimal; null when the source does not exist */
  adjustSourcePriority(id: number, delta: number): Promise<number | null>;
  upsertSource(definition: SourceDefinition): Promise<Source>;
}

export interface ContentRepository {
  /** Rejects with DuplicateKeyError or StorageError */
  insertContentItem(item: ContentItem): Promise<void>;
  hasFingerprint(sourceId: number, contentHash: string): Promise<boolean>;
}

export interface ParsingStateRepository {
  getParsingState(sourceId: number): Promise<ParsingState | null>;
  upsertParsingState(state: ParsingState): Promise<void>;
}

export interface RunLogRepository {
  appendRunRecord(record: RunRecord): Promise<void>;
  /** Most recent record per source */
  getLastRunRecords(): Promise<RunRecord[]>;
}

export interface SyncStorage
  extends SourceRepository,
    ContentRepository,
    ParsingStateRepository,
    RunLogRepository {}
