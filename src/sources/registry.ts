/**
 * Source Registry
 *
 * Read access to configured sources in scheduling order, plus the per-run
 * outcome bookkeeping (consecutive failures, last successful fetch, and the
 * activity-driven priority of Facebook pages).
 */

import type { Source, SourceType } from '../types/index.js';
import type { SourceRepository } from '../types/storage.js';
import { ConfigurationError, NotFoundError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';

/** Source types whose priority follows how much they publish */
export const ACTIVITY_RANKED_TYPES: ReadonlySet<SourceType> = new Set<SourceType>(['facebook']);

export interface OutcomeOptions {
  at?: Date;
  /** Items stored by the run; when given, a successful run re-ranks the source */
  itemsInserted?: number;
}

/**
 * An active source climbs a full step, an idle one sinks slowly
 */
export function activityPriorityDelta(itemsInserted: number): number {
  return itemsInserted > 0 ? 1 : -0.1;
}

/**
 * Higher priority first, then healthier sources, then id for a stable order
 */
export function compareSources(a: Source, b: Source): number {
  return (
    b.priority - a.priority ||
    a.consecutiveFailures - b.consecutiveFailures ||
    a.id - b.id
  );
}

export class SourceRegistry {
  constructor(private readonly repository: SourceRepository) {}

  /**
   * Active sources in scheduling order.
   * An unreadable registry is a ConfigurationError, fatal to the whole pass.
   */
  async listActiveSources(typeFilter?: SourceType): Promise<Source[]> {
    let sources: Source[];
    try {
      sources = await this.repository.listActiveSources(typeFilter);
    } catch (error) {
      throw new ConfigurationError(`Source registry unreadable: ${describeError(error)}`, {
        cause: error,
      });
    }

    return sources
      .filter((source) => source.isActive && (!typeFilter || source.type === typeFilter))
      .sort(compareSources);
  }

  async getSource(sourceId: number): Promise<Source> {
    const source = await this.repository.getSourceById(sourceId);
    if (!source) {
      throw new NotFoundError(`Unknown source id ${sourceId}`);
    }
    return source;
  }

  /**
   * Success resets the failure count and stamps the fetch time; failure increments the count.
   * A failed run leaves the priority alone.
   */
  async recordOutcome(sourceId: number, success: boolean, options: OutcomeOptions = {}): Promise<void> {
    const found = success
      ? await this.repository.recordSourceSuccess(sourceId, options.at ?? new Date())
      : await this.repository.recordSourceFailure(sourceId);

    if (!found) {
      throw new NotFoundError(`Unknown source id ${sourceId}`);
    }

    let priority: number | null = null;
    if (success && options.itemsInserted !== undefined) {
      priority = await this.repository.adjustSourcePriority(sourceId, activityPriorityDelta(options.itemsInserted));
    }

    logger.debug({ sourceId, success, priority: priority ?? undefined }, 'Source outcome recorded');
  }
}
