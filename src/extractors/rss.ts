/**
 * RSS Feed Extractor
 *
 * Downloads a feed with the per-call abort signal, then hands the XML to
 * rss-parser. HTTP failures are classified by status; unparseable XML is permanent.
 */

import Parser from 'rss-parser';
import type { ContentItem, MediaRef, ParsingState, Source } from '../types/index.js';
import type { ExtractorAdapter, FetchOptions, RawContentItem } from './types.js';
import { PermanentFetchError } from '../errors.js';
import {
  classifyHttpStatus,
  classifyNetworkError,
  lazySequence,
  parseDate,
  toContentItem,
} from './normalize.js';
import { logger } from '../utils/logger.js';

type NoCustomFields = Record<never, never>;
type FeedOutput = Parser.Output<NoCustomFields>;
type FeedItem = FeedOutput['items'][number];

export interface RssExtractorOptions {
  name?: string;
  userAgent?: string;
  /** Item identifier: the article link (default) or the feed GUID, falling back to the link */
  idStrategy?: 'link' | 'guid';
  fetchImpl?: typeof fetch;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export class RssExtractor implements ExtractorAdapter {
  readonly name: string;
  private readonly parser = new Parser<NoCustomFields, NoCustomFields>();
  private readonly userAgent: string;
  private readonly idStrategy: 'link' | 'guid';
  private readonly fetchImpl: typeof fetch;

  constructor(options: RssExtractorOptions = {}) {
    this.name = options.name ?? 'rss';
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.idStrategy = options.idStrategy ?? 'link';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  fetch(source: Source, _cursor: ParsingState | null, options: FetchOptions = {}): AsyncIterable<ContentItem> {
    return lazySequence(() => this.iterate(source, options.signal));
  }

  private async *iterate(source: Source, signal: AbortSignal | undefined): AsyncGenerator<ContentItem> {
    const feed = await this.loadFeed(source.url, signal);

    logger.debug({ source: source.name, itemCount: feed.items.length }, 'RSS feed parsed');

    for (const item of feed.items) {
      const raw = this.toRawItem(item);
      if (raw) {
        yield toContentItem(source.id, raw);
      }
    }
  }

  private async loadFeed(url: string, signal: AbortSignal | undefined): Promise<FeedOutput> {
    let xml: string;

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/xml, text/xml, */*',
        },
        signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw classifyHttpStatus(response.status, `Feed ${url} responded with status ${response.status}`);
      }

      xml = await response.text();
    } catch (error) {
      throw classifyNetworkError(error, url);
    }

    try {
      return await this.parser.parseString(xml);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PermanentFetchError(`Malformed feed at ${url}: ${reason}`, undefined, { cause: error });
    }
  }

  private toRawItem(item: FeedItem): RawContentItem | null {
    const link = item.link?.trim();
    const title = item.title?.trim();

    if (!link || !title) {
      return null;
    }

    const guid = item.guid?.trim();
    const media: MediaRef[] = item.enclosure?.url
      ? [{ url: item.enclosure.url, type: item.enclosure.type }]
      : [];

    return {
      externalId: this.idStrategy === 'guid' && guid ? guid : link,
      title,
      body: (item.contentSnippet ?? item.content ?? item.summary ?? '').trim(),
      link,
      publishedAt: parseDate(item.isoDate ?? item.pubDate),
      media,
    };
  }
}
