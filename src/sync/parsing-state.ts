/**
 * Parsing State Store
 *
 * Per-source cursor: the last durably persisted item and the content-side
 * clock. Read before a run, written only after the batch was persisted.
 */

import type { ContentItem, ParsingState } from '../types/index.js';
import type { ParsingStateRepository } from '../types/storage.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { logger } from '../utils/logger.js';

/**
 * Fast-path cursor check: the cursor item itself, or anything published strictly before it.
 * Items without a publish date always pass and are left to the fingerprint check.
 */
export function isAtOrBeforeCursor(item: ContentItem, cursor: ParsingState | null): boolean {
  if (!cursor) {
    return false;
  }
  if (cursor.lastItemId !== null && item.externalId === cursor.lastItemId) {
    return true;
  }
  if (cursor.lastItemPublishedAt && item.publishedAt) {
    return item.publishedAt.getTime() < cursor.lastItemPublishedAt.getTime();
  }
  return false;
}

/**
 * Persistence order: oldest first, undated items last, ties broken by identifier
 */
export function orderForPersistence(items: ContentItem[]): ContentItem[] {
  return [...items].sort((a, b) => {
    if (a.publishedAt && b.publishedAt) {
      const diff = a.publishedAt.getTime() - b.publishedAt.getTime();
      if (diff !== 0) return diff;
    } else if (a.publishedAt) {
      return -1;
    } else if (b.publishedAt) {
      return 1;
    }
    return a.externalId < b.externalId ? -1 : a.externalId > b.externalId ? 1 : 0;
  });
}

/**
 * Cursor after persisting `prefix`, the contiguous run of persisted items in
 * persistence order. The content clock never moves backwards.
 */
export function nextCursor(
  sourceId: number,
  previous: ParsingState | null,
  prefix: ContentItem[],
  parsedAt: Date
): ParsingState {
  const last = prefix[prefix.length - 1];
  if (!last) {
    return {
      sourceId,
      lastParsedAt: parsedAt,
      lastItemId: previous?.lastItemId ?? null,
      lastItemPublishedAt: previous?.lastItemPublishedAt ?? null,
    };
  }

  let latest = previous?.lastItemPublishedAt ?? null;
  for (const item of prefix) {
    if (item.publishedAt && (!latest || item.publishedAt > latest)) {
      latest = item.publishedAt;
    }
  }

  return {
    sourceId,
    lastParsedAt: parsedAt,
    lastItemId: last.externalId,
    lastItemPublishedAt: latest,
  };
}

export class ParsingStateStore {
  private readonly locks = new KeyedLock<number>();

  constructor(
    private readonly repository: ParsingStateRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  load(sourceId: number): Promise<ParsingState | null> {
    return this.repository.getParsingState(sourceId);
  }

  /**
   * Advance the cursor over the persisted prefix. Writes for one source are
   * serialized; other sources are not blocked.
   */
  advance(sourceId: number, previous: ParsingState | null, prefix: ContentItem[]): Promise<ParsingState> {
    return this.locks.run(sourceId, async () => {
      const state = nextCursor(sourceId, previous, prefix, this.now());
      await this.repository.upsertParsingState(state);

      logger.debug(
        {
          sourceId,
          lastItemId: state.lastItemId,
          lastItemPublishedAt: state.lastItemPublishedAt?.toISOString() ?? null,
          advancedOver: prefix.length,
        },
        'Parsing state advanced'
      );

      return state;
    });
  }
}
