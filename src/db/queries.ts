/**
 * Database Queries and Operations
 */

import { DatabaseError } from 'pg';
import { z } from 'zod';
import { execute, query, queryOne } from './index.js';
import type {
  ContentItem,
  MediaRef,
  ParsingState,
  RunRecord,
  RunStatus,
  Source,
  SourceType,
} from '../types/index.js';
import { PRIORITY_RANGE, SOURCE_TYPES } from '../types/index.js';
import type { SourceDefinition } from '../types/storage.js';
import { DuplicateKeyError, StorageError, describeError } from '../errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Error Translation
// ═══════════════════════════════════════════════════════════════════════════════

const UNIQUE_VIOLATION = '23505';

/**
 * Map a driver error onto the storage taxonomy. Connection loss and server
 * shutdown (classes 08 and 57P) are not recoverable within a run.
 */
export function translateError(error: unknown, context: string): DuplicateKeyError | StorageError {
  if (error instanceof DuplicateKeyError || error instanceof StorageError) {
    return error;
  }

  const message = `${context}: ${describeError(error)}`;

  if (error instanceof DatabaseError && error.code) {
    if (error.code === UNIQUE_VIOLATION) {
      return new DuplicateKeyError(message, { cause: error });
    }
    const fatal = error.code.startsWith('08') || error.code.startsWith('57P');
    return new StorageError(message, !fatal, { cause: error });
  }

  return new StorageError(message, false, { cause: error });
}

async function guarded<T>(context: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw translateError(error, context);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Source Operations
// ═══════════════════════════════════════════════════════════════════════════════

const SOURCE_COLUMNS = `
  id, name, url, source_type, site_key, is_active, priority,
  consecutive_failures, last_successful_fetch_at
`;

/**
 * Active sources, optionally of one type
 */
export function listActiveSources(type?: SourceType): Promise<Source[]> {
  return guarded('List active sources', async () => {
    const rows = type
      ? await query<SourceRow>(
          `SELECT ${SOURCE_COLUMNS} FROM sources WHERE is_active = TRUE AND source_type = $1 ORDER BY id`,
          [type]
        )
      : await query<SourceRow>(`SELECT ${SOURCE_COLUMNS} FROM sources WHERE is_active = TRUE ORDER BY id`);
    return rows.map(mapSourceRow);
  });
}

export function getSourceById(id: number): Promise<Source | null> {
  return guarded(`Get source ${id}`, async () => {
    const row = await queryOne<SourceRow>(`SELECT ${SOURCE_COLUMNS} FROM sources WHERE id = $1`, [id]);
    return row ? mapSourceRow(row) : null;
  });
}

/**
 * Reset the failure streak and stamp the fetch time
 */
export function recordSourceSuccess(id: number, fetchedAt: Date): Promise<boolean> {
  return guarded(`Record success for source ${id}`, async () => {
    const updated = await execute(
      `UPDATE sources
       SET consecutive_failures = 0, last_successful_fetch_at = $2, updated_at = NOW()
       WHERE id = $1`,
      [id, fetchedAt]
    );
    return updated > 0;
  });
}

export function recordSourceFailure(id: number): Promise<boolean> {
  return guarded(`Record failure for source ${id}`, async () => {
    const updated = await execute(
      `UPDATE sources
       SET consecutive_failures = consecutive_failures + 1, updated_at = NOW()
       WHERE id = $1`,
      [id]
    );
    return updated > 0;
  });
}

/**
 * Shift the scheduling priority, staying inside PRIORITY_RANGE
 */
export function adjustSourcePriority(id: number, delta: number): Promise<number | null> {
  return guarded(`Adjust priority of source ${id}`, async () => {
    const row = await queryOne<{ priority: number }>(
      `UPDATE sources
       SET priority = LEAST($3, GREATEST($2, ROUND((priority + $4)::numeric, 1)::double precision)),
           updated_at = NOW()
       WHERE id = $1
       RETURNING priority`,
      [id, PRIORITY_RANGE.min, PRIORITY_RANGE.max, delta]
    );
    return row?.priority ?? null;
  });
}

/**
 * Insert or update a source keyed by (name, url); health counters are left alone
 */
export function upsertSource(definition: SourceDefinition): Promise<Source> {
  return guarded(`Upsert source ${definition.name}`, async () => {
    const row = await queryOne<SourceRow>(
      `INSERT INTO sources (name, url, source_type, site_key, is_active, priority)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (name, url) DO UPDATE SET
         source_type = EXCLUDED.source_type,
         site_key = EXCLUDED.site_key,
         is_active = EXCLUDED.is_active,
         priority = EXCLUDED.priority,
         updated_at = NOW()
       RETURNING ${SOURCE_COLUMNS}`,
      [
        definition.name,
        definition.url,
        definition.type,
        definition.siteKey ?? null,
        definition.isActive ?? true,
        definition.priority ?? 5,
      ]
    );
    if (!row) {
      throw new StorageError(`Upsert of source ${definition.name} returned no row`);
    }
    return mapSourceRow(row);
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Content Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Insert one content item. A repeated (source, fingerprint) or
 * (source, external id) rejects with DuplicateKeyError.
 */
export function insertContentItem(item: ContentItem): Promise<void> {
  return guarded(`Insert item ${item.externalId}`, async () => {
    await execute(
      `INSERT INTO content_items
         (source_id, external_id, title, body, link, published_at, content_hash, media)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        item.sourceId,
        item.externalId,
        item.title,
        item.body,
        item.link,
        item.publishedAt,
        item.contentHash,
        JSON.stringify(item.media),
      ]
    );
  });
}

export function hasFingerprint(sourceId: number, contentHash: string): Promise<boolean> {
  return guarded(`Check fingerprint for source ${sourceId}`, async () => {
    const row = await queryOne<{ found: number }>(
      'SELECT 1 AS found FROM content_items WHERE source_id = $1 AND content_hash = $2',
      [sourceId, contentHash]
    );
    return row !== null;
  });
}

/**
 * Oldest items not yet picked up by enrichment
 */
export function listPendingEnrichment(limit: number = 50): Promise<ContentItem[]> {
  return guarded('List items pending enrichment', async () => {
    const rows = await query<ContentItemRow>(
      `SELECT source_id, external_id, title, body, link, published_at, content_hash, media
       FROM content_items
       WHERE enriched = FALSE
       ORDER BY created_at ASC
       LIMIT $1`,
      [limit]
    );
    return rows.map(mapContentItemRow);
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing State Operations
// ═══════════════════════════════════════════════════════════════════════════════

export function getParsingState(sourceId: number): Promise<ParsingState | null> {
  return guarded(`Get parsing state for source ${sourceId}`, async () => {
    const row = await queryOne<ParsingStateRow>(
      `SELECT source_id, last_parsed_at, last_item_id, last_item_published_at
       FROM parsing_state WHERE source_id = $1`,
      [sourceId]
    );
    return row ? mapParsingStateRow(row) : null;
  });
}

export function upsertParsingState(state: ParsingState): Promise<void> {
  return guarded(`Upsert parsing state for source ${state.sourceId}`, async () => {
    await execute(
      `INSERT INTO parsing_state (source_id, last_parsed_at, last_item_id, last_item_published_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (source_id) DO UPDATE SET
         last_parsed_at = EXCLUDED.last_parsed_at,
         last_item_id = EXCLUDED.last_item_id,
         last_item_published_at = EXCLUDED.last_item_published_at`,
      [state.sourceId, state.lastParsedAt, state.lastItemId, state.lastItemPublishedAt]
    );
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Log Operations
// ═══════════════════════════════════════════════════════════════════════════════

export function appendRunRecord(record: RunRecord): Promise<void> {
  return guarded(`Append run record for source ${record.sourceId}`, async () => {
    await execute(
      `INSERT INTO run_log
         (source_id, source_type, started_at, finished_at, items_fetched, items_inserted,
          items_duplicate, items_failed, status, error)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        record.sourceId,
        record.sourceType,
        record.startedAt,
        record.finishedAt,
        record.itemsFetched,
        record.itemsInserted,
        record.itemsDuplicate,
        record.itemsFailed,
        record.status,
        record.error,
      ]
    );
  });
}

/**
 * Latest run record of every source that has one
 */
export function getLastRunRecords(): Promise<RunRecord[]> {
  return guarded('Get last run records', async () => {
    const rows = await query<RunLogRow>(
      `SELECT DISTINCT ON (source_id)
         source_id, source_type, started_at, finished_at, items_fetched, items_inserted,
         items_duplicate, items_failed, status, error
       FROM run_log
       ORDER BY source_id, started_at DESC, id DESC`
    );
    return rows.map(mapRunLogRow);
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Statistics
// ═══════════════════════════════════════════════════════════════════════════════

export interface DbStats {
  activeSources: number;
  totalItems: number;
  pendingEnrichment: number;
  failingSources: number;
  lastRunAt: Date | null;
}

/**
 * Get database statistics
 */
export function getStats(): Promise<DbStats> {
  return guarded('Get stats', async () => {
    const row = await queryOne<StatsRow>(`
      SELECT
        (SELECT COUNT(*) FROM sources WHERE is_active = TRUE) AS active_sources,
        (SELECT COUNT(*) FROM content_items) AS total_items,
        (SELECT COUNT(*) FROM content_items WHERE enriched = FALSE) AS pending_enrichment,
        (SELECT COUNT(*) FROM sources WHERE is_active = TRUE AND consecutive_failures > 0) AS failing_sources,
        (SELECT MAX(finished_at) FROM run_log) AS last_run_at
    `);

    return {
      activeSources: Number(row?.active_sources ?? 0),
      totalItems: Number(row?.total_items ?? 0),
      pendingEnrichment: Number(row?.pending_enrichment ?? 0),
      failingSources: Number(row?.failing_sources ?? 0),
      lastRunAt: row?.last_run_at ?? null,
    };
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════════════════════════

// Row types for database results (TIMESTAMPTZ arrives as Date, COUNT as string)
interface SourceRow {
  id: number;
  name: string;
  url: string;
  source_type: string;
  site_key: string | null;
  is_active: boolean;
  priority: number;
  consecutive_failures: number;
  last_successful_fetch_at: Date | null;
}

interface ContentItemRow {
  source_id: number;
  external_id: string;
  title: string;
  body: string;
  link: string;
  published_at: Date | null;
  content_hash: string;
  media: unknown;
}

interface ParsingStateRow {
  source_id: number;
  last_parsed_at: Date;
  last_item_id: string | null;
  last_item_published_at: Date | null;
}

interface RunLogRow {
  source_id: number;
  source_type: string;
  started_at: Date;
  finished_at: Date;
  items_fetched: number;
  items_inserted: number;
  items_duplicate: number;
  items_failed: number;
  status: string;
  error: string | null;
}

interface StatsRow {
  active_sources: string;
  total_items: string;
  pending_enrichment: string;
  failing_sources: string;
  last_run_at: Date | null;
}

const mediaSchema = z.array(z.object({ url: z.string(), type: z.string().optional() }));

const RUN_STATUSES: readonly RunStatus[] = ['success', 'partial', 'failed'];

function toSourceType(value: string): SourceType {
  const match = SOURCE_TYPES.find((type) => type === value);
  if (!match) {
    throw new StorageError(`Unknown source type "${value}" in database`);
  }
  return match;
}

function toRunStatus(value: string): RunStatus {
  const match = RUN_STATUSES.find((status) => status === value);
  if (!match) {
    throw new StorageError(`Unknown run status "${value}" in database`);
  }
  return match;
}

// Mappers
export function mapSourceRow(row: SourceRow): Source {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    type: toSourceType(row.source_type),
    siteKey: row.site_key,
    isActive: row.is_active,
    priority: row.priority,
    consecutiveFailures: row.consecutive_failures,
    lastSuccessfulFetchAt: row.last_successful_fetch_at,
  };
}

function mapContentItemRow(row: ContentItemRow): ContentItem {
  const media = mediaSchema.safeParse(row.media);
  const refs: MediaRef[] = media.success ? media.data : [];

  return {
    sourceId: row.source_id,
    externalId: row.external_id,
    title: row.title,
    body: row.body,
    link: row.link,
    publishedAt: row.published_at,
    contentHash: row.content_hash,
    media: refs,
  };
}

function mapParsingStateRow(row: ParsingStateRow): ParsingState {
  return {
    sourceId: row.source_id,
    lastParsedAt: row.last_parsed_at,
    lastItemId: row.last_item_id,
    lastItemPublishedAt: row.last_item_published_at,
  };
}

function mapRunLogRow(row: RunLogRow): RunRecord {
  return {
    sourceId: row.source_id,
    sourceType: toSourceType(row.source_type),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    itemsFetched: row.items_fetched,
    itemsInserted: row.items_inserted,
    itemsDuplicate: row.items_duplicate,
    itemsFailed: row.items_failed,
    status: toRunStatus(row.status),
    error: row.error,
  };
}
