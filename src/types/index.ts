/**
 * Core types for the Tunisia news source synchronizer
 */

export type SourceType = 'rss' | 'facebook';

export const SOURCE_TYPES: readonly SourceType[] = ['rss', 'facebook'];

export interface Source {
  id: number;
  name: string;
  /** Feed URL for RSS, page id for Facebook */
  url: string;
  type: SourceType;
  /** Selects a site-specific RSS adapter when one is registered */
  siteKey: string | null;
  isActive: boolean;
  /** 1 to 10, one decimal; Facebook pages drift with their activity */
  priority: number;
  consecutiveFailures: number;
  lastSuccessfulFetchAt: Date | null;
}

export const PRIORITY_RANGE = { min: 1, max: 10 } as const;

export interface ParsingState {
  sourceId: number;
  lastParsedAt: Date;
  lastItemId: string | null;
  lastItemPublishedAt: Date | null;
}

export interface MediaRef {
  url: string;
  type?: string;
}

export interface ContentItem {
  sourceId: number;
  externalId: string;
  title: string;
  body: string;
  link: string;
  publishedAt: Date | null;
  contentHash: string;
  media: MediaRef[];
}

export type RunStatus = 'success' | 'partial' | 'failed';

export interface RunCounts {
  itemsFetched: number;
  itemsInserted: number;
  itemsDuplicate: number;
  itemsFailed: number;
}

export interface RunRecord extends RunCounts {
  sourceId: number;
  sourceType: SourceType;
  startedAt: Date;
  finishedAt: Date;
  status: RunStatus;
  error: string | null;
}

export interface SourceRunSummary extends RunCounts {
  sourceId: number;
  sourceName: string;
  sourceType: SourceType;
  status: RunStatus;
  error: string | null;
  durationMs: number;
}

export interface PassSummary {
  sourcesAttempted: number;
  sourcesSucceeded: number;
  sourcesPartial: number;
  sourcesFailed: number;
  /** In-flight elsewhere, or not dispatched because the pass was cancelled */
  sourcesSkipped: number;
  itemsInserted: number;
  callsUsed: number;
  budgetExhausted: boolean;
  cancelled: boolean;
  results: SourceRunSummary[];
  durationMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface RateLimitConfig {
  minIntervalMs: number;
  concurrency: number;
}
