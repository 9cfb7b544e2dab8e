/**
 * Facebook Page Extractor
 *
 * Reads page posts from the Graph API, one page of results at a time. Only the
 * essential post fields are requested to keep each call cheap.
 */

import { z } from 'zod';
import type { ContentItem, MediaRef, ParsingState, Source } from '../types/index.js';
import type { ExtractorAdapter, FetchOptions, RawContentItem } from './types.js';
import { ConfigurationError, PermanentFetchError, TransientFetchError } from '../errors.js';
import { classifyHttpStatus, classifyNetworkError, lazySequence, parseDate, toContentItem } from './normalize.js';
import { logger } from '../utils/logger.js';

export interface FacebookExtractorOptions {
  accessToken: string | undefined;
  apiVersion?: string;
  /** Oldest post considered, relative to now */
  hoursBack?: number;
  postsLimit?: number;
  /** Upper bound on `paging.next` requests per fetch */
  maxPages?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

const POST_FIELDS = ['id', 'message', 'story', 'created_time', 'permalink_url', 'full_picture'];

/** Graph API throttling and temporary-unavailability codes */
const TRANSIENT_GRAPH_CODES = new Set([1, 2, 4, 17, 32, 341, 613, 80001]);

const TITLE_MAX_LENGTH = 120;

const postSchema = z.object({
  id: z.string(),
  message: z.string().optional(),
  story: z.string().optional(),
  created_time: z.string().optional(),
  permalink_url: z.string().optional(),
  full_picture: z.string().optional(),
});

const postsResponseSchema = z.object({
  data: z.array(postSchema),
  paging: z
    .object({
      next: z.string().optional(),
    })
    .optional(),
});

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.number().optional(),
    type: z.string().optional(),
  }),
});

type GraphPost = z.infer<typeof postSchema>;
type PostsPage = z.infer<typeof postsResponseSchema>;

export class FacebookExtractor implements ExtractorAdapter {
  readonly name = 'facebook';
  private readonly apiVersion: string;
  private readonly hoursBack: number;
  private readonly postsLimit: number;
  private readonly maxPages: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: FacebookExtractorOptions) {
    this.apiVersion = options.apiVersion ?? 'v18.0';
    this.hoursBack = options.hoursBack ?? 336;
    this.postsLimit = options.postsLimit ?? 100;
    this.maxPages = options.maxPages ?? 5;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  fetch(source: Source, cursor: ParsingState | null, options: FetchOptions = {}): AsyncIterable<ContentItem> {
    return lazySequence(() => this.iterate(source, cursor, options.signal));
  }

  /**
   * Checks that need no network call; returns the access token to use
   */
  validate(source: Source): string {
    const accessToken = this.options.accessToken;
    if (!accessToken) {
      throw new ConfigurationError('FACEBOOK_ACCESS_TOKEN is not configured');
    }
    if (!/^\d+$/.test(source.url)) {
      throw new ConfigurationError(`Source ${source.name} has no valid Facebook page id`);
    }
    return accessToken;
  }

  /**
   * Lower bound for the `since` parameter: the cursor's content time, but never
   * further back than the configured window
   */
  sinceFor(cursor: ParsingState | null): Date {
    const windowStart = new Date(this.now().getTime() - this.hoursBack * 3600 * 1000);
    const cursorTime = cursor?.lastItemPublishedAt;
    return cursorTime && cursorTime > windowStart ? cursorTime : windowStart;
  }

  private async *iterate(
    source: Source,
    cursor: ParsingState | null,
    signal: AbortSignal | undefined
  ): AsyncGenerator<ContentItem> {
    const accessToken = this.validate(source);

    const params = new URLSearchParams({
      fields: POST_FIELDS.join(','),
      since: String(Math.floor(this.sinceFor(cursor).getTime() / 1000)),
      limit: String(this.postsLimit),
      access_token: accessToken,
    });

    let url: string | undefined =
      `https://graph.facebook.com/${this.apiVersion}/${source.url}/posts?${params.toString()}`;
    let pages = 0;

    while (url && pages < this.maxPages) {
      const page = await this.requestPage(url, signal);
      pages++;

      logger.debug({ source: source.name, posts: page.data.length, page: pages }, 'Facebook posts page fetched');

      for (const post of page.data) {
        yield toContentItem(source.id, this.toRawItem(post));
      }

      url = page.paging?.next;
    }

    if (url) {
      logger.warn(
        { source: source.name, pageId: source.url, maxPages: this.maxPages },
        'Facebook page cap reached, older posts in the window were not fetched'
      );
    }
  }

  private async requestPage(url: string, signal: AbortSignal | undefined): Promise<PostsPage> {
    const safeUrl = redactToken(url);
    const { status, body } = await this.download(url, safeUrl, signal);

    const graphError = graphErrorSchema.safeParse(body);
    if (graphError.success) {
      throw classifyGraphError(status, graphError.data.error.message, graphError.data.error.code);
    }

    if (status < 200 || status >= 300) {
      throw classifyHttpStatus(status, `Graph API responded with status ${status}`);
    }

    const parsed = postsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentFetchError(`Unexpected Graph API response shape for ${safeUrl}`);
    }

    return parsed.data;
  }

  private async download(
    url: string,
    safeUrl: string,
    signal: AbortSignal | undefined
  ): Promise<{ status: number; body: unknown }> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal });
    } catch (error) {
      throw classifyNetworkError(error, safeUrl);
    }

    try {
      const body: unknown = await response.json();
      return { status: response.status, body };
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw classifyNetworkError(error, safeUrl);
      }
      // An HTML error page carries no Graph error code; its status decides
      if (!response.ok) {
        throw classifyHttpStatus(response.status, `Graph API responded with status ${response.status} for ${safeUrl}`);
      }
      throw new TransientFetchError(`Graph API returned a non-JSON body for ${safeUrl}`, response.status, { cause: error });
    }
  }

  private toRawItem(post: GraphPost): RawContentItem {
    const text = (post.message ?? post.story ?? '').trim();
    const media: MediaRef[] = post.full_picture ? [{ url: post.full_picture, type: 'image' }] : [];

    return {
      externalId: post.id,
      title: deriveTitle(text, post.id),
      body: text,
      link: post.permalink_url ?? `https://www.facebook.com/${post.id}`,
      publishedAt: parseGraphDate(post.created_time),
      media,
    };
  }
}

export function classifyGraphError(
  status: number,
  message: string,
  code: number | undefined
): TransientFetchError | PermanentFetchError {
  const text = `Graph API error${code !== undefined ? ` ${code}` : ''}: ${message}`;

  if ((code !== undefined && TRANSIENT_GRAPH_CODES.has(code)) || /request limit reached/i.test(message)) {
    return new TransientFetchError(text, status);
  }
  if (status >= 500 || status === 429) {
    return new TransientFetchError(text, status);
  }
  return new PermanentFetchError(text, status);
}

/**
 * Graph timestamps use a `+0000` offset, which is not ISO 8601
 */
export function parseGraphDate(value: string | undefined): Date | null {
  return parseDate(value?.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
}

function deriveTitle(text: string, postId: string): string {
  const firstLine = text.split('\n', 1)[0]?.trim() ?? '';
  if (!firstLine) {
    return `Facebook post ${postId}`;
  }
  return firstLine.length > TITLE_MAX_LENGTH ? `${firstLine.slice(0, TITLE_MAX_LENGTH - 1)}…` : firstLine;
}

function redactToken(url: string): string {
  return url.replace(/access_token=[^&]+/, 'access_token=***');
}
