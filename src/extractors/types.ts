/**
 * Extractor Adapter contract
 *
 * An adapter turns one source into a lazy, finite, restartable sequence of
 * normalized content items. It never persists anything. Failures are reported as
 * TransientFetchError (retryable) or PermanentFetchError (not retryable).
 */

import type { ContentItem, MediaRef, ParsingState, Source } from '../types/index.js';

export interface FetchOptions {
  /** Aborted when the per-call timeout expires */
  signal?: AbortSignal;
}

export interface ExtractorAdapter {
  readonly name: string;

  /**
   * Optional pre-flight check, run before any network call.
   * Throws ConfigurationError when the source cannot be fetched by this adapter.
   */
  validate?(source: Source): void;

  /**
   * Items in any order. Iterating the result again performs a fresh fetch.
   */
  fetch(source: Source, cursor: ParsingState | null, options?: FetchOptions): AsyncIterable<ContentItem>;
}

/**
 * Raw fields an adapter extracts before fingerprinting
 */
export interface RawContentItem {
  externalId: string;
  title: string;
  body: string;
  link: string;
  publishedAt: Date | null;
  media: MediaRef[];
}
