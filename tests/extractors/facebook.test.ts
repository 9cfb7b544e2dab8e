/**
 * Tests for the Facebook Page Extractor
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { FacebookExtractor, classifyGraphError, parseGraphDate } from '../../src/extractors/facebook.js';
import { collectItems } from '../../src/extractors/normalize.js';
import { ConfigurationError, PermanentFetchError, TransientFetchError } from '../../src/errors.js';
import { logger } from '../../src/utils/logger.js';
import type { ParsingState, Source } from '../../src/types/index.js';

const NOW = new Date('2024-05-15T00:00:00Z');

const page: Source = {
  id: 9,
  name: 'Présidence de la République',
  url: '271178572940207',
  type: 'facebook',
  siteKey: null,
  isActive: true,
  priority: 10,
  consecutiveFailures: 0,
  lastSuccessfulFetchAt: null,
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function extractorWith(respond: (url: string) => Response, urls: string[] = []): FacebookExtractor {
  return new FacebookExtractor({
    accessToken: 'test-token',
    now: () => NOW,
    fetchImpl: async (input) => {
      const url = String(input);
      urls.push(url);
      return respond(url);
    },
  });
}

describe('classifyGraphError', () => {
  it('treats throttling codes as transient', () => {
    const error = classifyGraphError(403, '(#4) Application request limit reached', 4);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error.message).toBe('Graph API error 4: (#4) Application request limit reached');
  });

  it('treats server errors as transient', () => {
    expect(classifyGraphError(500, 'An unknown error occurred', 190)).toBeInstanceOf(TransientFetchError);
  });

  it('treats auth and permission errors as permanent', () => {
    const error = classifyGraphError(400, 'Invalid OAuth access token.', 190);

    expect(error).toBeInstanceOf(PermanentFetchError);
    expect(error.status).toBe(400);
  });
});

describe('parseGraphDate', () => {
  it('accepts offsets without a colon', () => {
    expect(parseGraphDate('2024-05-01T10:00:00+0000')).toEqual(new Date('2024-05-01T10:00:00Z'));
    expect(parseGraphDate('2024-05-01T10:00:00+0100')).toEqual(new Date('2024-05-01T09:00:00Z'));
  });

  it('returns null when absent', () => {
    expect(parseGraphDate(undefined)).toBeNull();
  });
});

describe('FacebookExtractor', () => {
  describe('validate', () => {
    it('requires an access token', () => {
      const extractor = new FacebookExtractor({ accessToken: undefined });

      expect(() => extractor.validate(page)).toThrow(new ConfigurationError('FACEBOOK_ACCESS_TOKEN is not configured'));
    });

    it('requires a numeric page id', () => {
      const extractor = new FacebookExtractor({ accessToken: 'test-token' });

      expect(() => extractor.validate({ ...page, url: 'presidence.tn' })).toThrow(
        'Source Présidence de la République has no valid Facebook page id'
      );
    });
  });

  describe('sinceFor', () => {
    const extractor = new FacebookExtractor({ accessToken: 'test-token', hoursBack: 336, now: () => NOW });
    const windowStart = new Date('2024-05-01T00:00:00Z');

    function cursorAt(iso: string): ParsingState {
      return { sourceId: 9, lastParsedAt: NOW, lastItemId: 'x', lastItemPublishedAt: new Date(iso) };
    }

    it('starts at the window without a cursor', () => {
      expect(extractor.sinceFor(null)).toEqual(windowStart);
    });

    it('starts at the cursor when it is inside the window', () => {
      expect(extractor.sinceFor(cursorAt('2024-05-10T08:00:00Z'))).toEqual(new Date('2024-05-10T08:00:00Z'));
    });

    it('never reaches further back than the window', () => {
      expect(extractor.sinceFor(cursorAt('2024-04-01T00:00:00Z'))).toEqual(windowStart);
    });
  });

  describe('fetch', () => {
    it('requests page posts since the window start and normalizes them', async () => {
      const urls: string[] = [];
      const extractor = extractorWith(
        () =>
          json({
            data: [
              {
                id: '271178572940207_1',
                message: 'Communiqué officiel\nDétails du communiqué',
                created_time: '2024-05-10T08:00:00+0000',
                permalink_url: 'https://www.facebook.com/presidence/posts/1',
                full_picture: 'https://scontent.example/1.jpg',
              },
              { id: '271178572940207_2', story: 'La Présidence a mis à jour sa photo.' },
              { id: '271178572940207_3' },
            ],
          }),
        urls
      );

      const items = await collectItems(extractor.fetch(page, null));

      expect(urls).toHaveLength(1);
      const requested = new URL(urls[0] ?? '');
      expect(requested.pathname).toBe('/v18.0/271178572940207/posts');
      expect(requested.searchParams.get('since')).toBe('1714521600');
      expect(requested.searchParams.get('limit')).toBe('100');
      expect(requested.searchParams.get('access_token')).toBe('test-token');

      expect(items.map((i) => [i.externalId, i.title, i.link])).toEqual([
        ['271178572940207_1', 'Communiqué officiel', 'https://www.facebook.com/presidence/posts/1'],
        ['271178572940207_2', 'La Présidence a mis à jour sa photo.', 'https://www.facebook.com/271178572940207_2'],
        ['271178572940207_3', 'Facebook post 271178572940207_3', 'https://www.facebook.com/271178572940207_3'],
      ]);
      expect(items[0]).toMatchObject({
        sourceId: 9,
        body: 'Communiqué officiel\nDétails du communiqué',
        publishedAt: new Date('2024-05-10T08:00:00Z'),
        media: [{ url: 'https://scontent.example/1.jpg', type: 'image' }],
      });
      expect(items[2]?.publishedAt).toBeNull();
    });

    it('follows paging links', async () => {
      const urls: string[] = [];
      const extractor = extractorWith(
        (url) =>
          url.startsWith('https://graph.facebook.com/next-page')
            ? json({ data: [{ id: 'p_2', message: 'Second' }] })
            : json({ data: [{ id: 'p_1', message: 'First' }], paging: { next: 'https://graph.facebook.com/next-page?after=abc' } }),
        urls
      );

      const items = await collectItems(extractor.fetch(page, null));

      expect(items.map((i) => i.externalId)).toEqual(['p_1', 'p_2']);
      expect(urls).toHaveLength(2);
    });

    it('classifies Graph API error bodies', async () => {
      const extractor = extractorWith(() =>
        json({ error: { message: 'Invalid OAuth access token.', type: 'OAuthException', code: 190 } }, 400)
      );

      await expect(collectItems(extractor.fetch(page, null))).rejects.toThrow(
        new PermanentFetchError('Graph API error 190: Invalid OAuth access token.')
      );
    });

    it('retries rate limiting', async () => {
      const extractor = extractorWith(() =>
        json({ error: { message: 'Calls to this api have exceeded the rate limit.', code: 613 } }, 400)
      );

      await expect(collectItems(extractor.fetch(page, null))).rejects.toBeInstanceOf(TransientFetchError);
    });

    it('retries an HTML error page from a server error', async () => {
      const extractor = extractorWith(() => new Response('<html>Bad gateway</html>', { status: 502 }));

      const error = await collectItems(extractor.fetch(page, null)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientFetchError);
      expect(error).toMatchObject({ status: 502 });
    });

    it('does not retry an HTML error page for a missing page', async () => {
      const extractor = extractorWith(() => new Response('<html>Not Found</html>', { status: 404 }));

      const error = await collectItems(extractor.fetch(page, null)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PermanentFetchError);
      expect(error).toMatchObject({ status: 404 });
    });

    it('does not retry an HTML error page for revoked access', async () => {
      const extractor = extractorWith(() => new Response('<html>Forbidden</html>', { status: 403 }));

      await expect(collectItems(extractor.fetch(page, null))).rejects.toBeInstanceOf(PermanentFetchError);
    });

    it('retries a successful status with a non-JSON body', async () => {
      const extractor = extractorWith(() => new Response('<html>Maintenance</html>', { status: 200 }));

      await expect(collectItems(extractor.fetch(page, null))).rejects.toBeInstanceOf(TransientFetchError);
    });

    it('rejects an unexpected response shape', async () => {
      const extractor = extractorWith(() => json({ posts: [] }));

      await expect(collectItems(extractor.fetch(page, null))).rejects.toBeInstanceOf(PermanentFetchError);
    });

    describe('page cap', () => {
      afterEach(() => {
        vi.restoreAllMocks();
      });

      it('stops following paging links at the cap and warns', async () => {
        const warn = vi.spyOn(logger, 'warn');
        const urls: string[] = [];
        const extractor = new FacebookExtractor({
          accessToken: 'test-token',
          maxPages: 1,
          now: () => NOW,
          fetchImpl: async (input) => {
            urls.push(String(input));
            return json({ data: [{ id: 'p_1', message: 'First' }], paging: { next: 'https://graph.facebook.com/next-page' } });
          },
        });

        const items = await collectItems(extractor.fetch(page, null));

        expect(items.map((i) => i.externalId)).toEqual(['p_1']);
        expect(urls).toHaveLength(1);
        expect(warn).toHaveBeenCalledWith(
          { source: 'Présidence de la République', pageId: '271178572940207', maxPages: 1 },
          'Facebook page cap reached, older posts in the window were not fetched'
        );
      });

      it('does not warn when the last page has no next link', async () => {
        const warn = vi.spyOn(logger, 'warn');
        const extractor = extractorWith(() => json({ data: [{ id: 'p_1', message: 'First' }] }));

        await collectItems(extractor.fetch(page, null));

        expect(warn).not.toHaveBeenCalled();
      });
    });
  });
});
