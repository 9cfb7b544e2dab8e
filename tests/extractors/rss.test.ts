/**
 * Tests for the RSS Feed Extractor
 */

import { describe, it, expect } from 'vitest';
import { RssExtractor } from '../../src/extractors/rss.js';
import { collectItems } from '../../src/extractors/normalize.js';
import { PermanentFetchError, TransientFetchError } from '../../src/errors.js';
import type { Source } from '../../src/types/index.js';

const FEED_URL = 'https://news.example.tn/rss';

const FEED_XML = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Feed</title>
    <link>https://news.example.tn</link>
    <description>Test</description>
    <item>
      <title>Premiere nouvelle</title>
      <link>https://news.example.tn/a1</link>
      <guid>guid-a1</guid>
      <pubDate>Wed, 01 May 2024 10:00:00 GMT</pubDate>
      <description>Resume court</description>
      <enclosure url="https://news.example.tn/a1.jpg" type="image/jpeg" length="100"/>
    </item>
    <item>
      <title>Sans lien</title>
    </item>
    <item>
      <link>https://news.example.tn/sans-titre</link>
    </item>
  </channel>
</rss>`;

const source: Source = {
  id: 4,
  name: 'Test Feed',
  url: FEED_URL,
  type: 'rss',
  siteKey: null,
  isActive: true,
  priority: 5,
  consecutiveFailures: 0,
  lastSuccessfulFetchAt: null,
};

interface Captured {
  url: string;
  init: RequestInit | undefined;
}

function fakeFetch(respond: () => Response, calls: Captured[] = []): typeof fetch {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
}

describe('RssExtractor', () => {
  it('normalizes feed items and skips entries without a title or link', async () => {
    const extractor = new RssExtractor({ fetchImpl: fakeFetch(() => new Response(FEED_XML)) });

    const items = await collectItems(extractor.fetch(source, null));

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      sourceId: 4,
      externalId: 'https://news.example.tn/a1',
      title: 'Premiere nouvelle',
      body: 'Resume court',
      link: 'https://news.example.tn/a1',
      publishedAt: new Date('2024-05-01T10:00:00Z'),
      media: [{ url: 'https://news.example.tn/a1.jpg', type: 'image/jpeg' }],
    });
    expect(items[0]?.contentHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('identifies items by GUID when asked to', async () => {
    const extractor = new RssExtractor({ idStrategy: 'guid', fetchImpl: fakeFetch(() => new Response(FEED_XML)) });

    const items = await collectItems(extractor.fetch(source, null));

    expect(items[0]?.externalId).toBe('guid-a1');
  });

  it('sends the user agent and the abort signal', async () => {
    const calls: Captured[] = [];
    const controller = new AbortController();
    const extractor = new RssExtractor({
      userAgent: 'test-agent',
      fetchImpl: fakeFetch(() => new Response(FEED_XML), calls),
    });

    await collectItems(extractor.fetch(source, null, { signal: controller.signal }));

    expect(calls[0]?.url).toBe(FEED_URL);
    expect(calls[0]?.init?.headers).toMatchObject({ 'User-Agent': 'test-agent' });
    expect(calls[0]?.init?.signal).toBe(controller.signal);
  });

  it('fetches again on every iteration', async () => {
    const calls: Captured[] = [];
    const extractor = new RssExtractor({ fetchImpl: fakeFetch(() => new Response(FEED_XML), calls) });
    const sequence = extractor.fetch(source, null);

    await collectItems(sequence);
    await collectItems(sequence);

    expect(calls).toHaveLength(2);
  });

  it('treats server errors as transient', async () => {
    const extractor = new RssExtractor({ fetchImpl: fakeFetch(() => new Response('busy', { status: 503 })) });

    await expect(collectItems(extractor.fetch(source, null))).rejects.toThrow(
      new TransientFetchError(`Feed ${FEED_URL} responded with status 503`)
    );
  });

  it('treats a missing feed as permanent', async () => {
    const extractor = new RssExtractor({ fetchImpl: fakeFetch(() => new Response('nope', { status: 404 })) });

    await expect(collectItems(extractor.fetch(source, null))).rejects.toBeInstanceOf(PermanentFetchError);
  });

  it('releases the body of an error response', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      },
    });
    const extractor = new RssExtractor({ fetchImpl: fakeFetch(() => new Response(body, { status: 500 })) });

    await expect(collectItems(extractor.fetch(source, null))).rejects.toBeInstanceOf(TransientFetchError);
    expect(cancelled).toBe(true);
  });

  it('treats network failures as transient', async () => {
    const extractor = new RssExtractor({
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(collectItems(extractor.fetch(source, null))).rejects.toThrow(
      new TransientFetchError(`Request to ${FEED_URL} failed: fetch failed`)
    );
  });

  it('treats unparseable XML as permanent', async () => {
    const extractor = new RssExtractor({ fetchImpl: fakeFetch(() => new Response('<html><body>Maintenance</body>')) });

    const failure = collectItems(extractor.fetch(source, null));

    await expect(failure).rejects.toBeInstanceOf(PermanentFetchError);
    await expect(failure).rejects.toThrow(`Malformed feed at ${FEED_URL}`);
  });
});
