/**
 * Extractors Module
 */

import { config } from '../config/index.js';
import { ExtractorRegistry } from './registry.js';
import { RssExtractor } from './rss.js';
import { FacebookExtractor } from './facebook.js';

export function createExtractorRegistry(): ExtractorRegistry {
  const registry = new ExtractorRegistry()
    .register('rss', new RssExtractor({ userAgent: config.fetch.userAgent }))
    .register(
      'facebook',
      new FacebookExtractor({
        accessToken: config.facebook.accessToken,
        apiVersion: config.facebook.apiVersion,
        hoursBack: config.facebook.hoursBack,
        postsLimit: config.facebook.postsLimit,
      })
    );

  // Sources with siteKey "guid" are tracked by feed GUID rather than by article link
  registry.register(
    'rss',
    new RssExtractor({ name: 'rss-guid', userAgent: config.fetch.userAgent, idStrategy: 'guid' }),
    'guid'
  );

  return registry;
}

export { ExtractorRegistry } from './registry.js';
export { RssExtractor, type RssExtractorOptions } from './rss.js';
export { FacebookExtractor, classifyGraphError, parseGraphDate, type FacebookExtractorOptions } from './facebook.js';
export { collectItems, lazySequence, toContentItem, parseDate, classifyHttpStatus } from './normalize.js';
export type { ExtractorAdapter, FetchOptions, RawContentItem } from './types.js';
