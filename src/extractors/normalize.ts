/**
 * Helpers shared by extractor adapters
 */

import type { ContentItem } from '../types/index.js';
import type { RawContentItem } from './types.js';
import { PermanentFetchError, TransientFetchError } from '../errors.js';
import { fingerprint } from '../sync/fingerprint.js';

/**
 * Wrap a generator factory so every iteration starts a new fetch
 */
export function lazySequence<T>(factory: () => AsyncGenerator<T>): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]: () => factory(),
  };
}

export async function collectItems<T>(sequence: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of sequence) {
    items.push(item);
  }
  return items;
}

export function toContentItem(sourceId: number, raw: RawContentItem): ContentItem {
  return {
    sourceId,
    externalId: raw.externalId,
    title: raw.title,
    body: raw.body,
    link: raw.link,
    publishedAt: raw.publishedAt,
    contentHash: fingerprint(raw.title, raw.body, raw.link),
    media: raw.media,
  };
}

/**
 * Parse a feed or API date; null when absent or unparseable
 */
export function parseDate(value: string | undefined | null): Date | null {
  if (!value) {
    return null;
  }

  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * 408, 425, 429 and 5xx are worth retrying; every other failure status is final
 */
export function classifyHttpStatus(status: number, message: string): TransientFetchError | PermanentFetchError {
  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return new TransientFetchError(message, status);
  }
  return new PermanentFetchError(message, status);
}

/**
 * Network-level failures (DNS, reset, aborted) are transient; fetch errors already
 * classified pass through unchanged
 */
export function classifyNetworkError(error: unknown, url: string): TransientFetchError | PermanentFetchError {
  if (error instanceof TransientFetchError || error instanceof PermanentFetchError) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new TransientFetchError(`Request to ${url} failed: ${reason}`, undefined, { cause: error });
}
