/**
 * Extractor Registry
 *
 * Maps a source to its adapter: an explicit site key first, then the feed's
 * domain (for RSS), then the default adapter of the source type.
 */

import type { Source, SourceType } from '../types/index.js';
import type { ExtractorAdapter } from './types.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../utils/logger.js';

export class ExtractorRegistry {
  private readonly defaults = new Map<SourceType, ExtractorAdapter>();
  private readonly sites = new Map<string, ExtractorAdapter>();

  /**
   * Register the default adapter for a type, or a site-specific one when `siteKey` is given.
   * RSS site keys may be a domain (e.g. `babnet.net`) to match feeds without an explicit key.
   */
  register(type: SourceType, adapter: ExtractorAdapter, siteKey?: string): this {
    if (siteKey) {
      this.sites.set(siteKeyFor(type, siteKey), adapter);
    } else {
      this.defaults.set(type, adapter);
    }
    logger.debug({ type, siteKey, adapter: adapter.name }, 'Extractor registered');
    return this;
  }

  resolve(source: Source): ExtractorAdapter {
    if (source.siteKey) {
      const explicit = this.sites.get(siteKeyFor(source.type, source.siteKey));
      if (explicit) {
        return explicit;
      }
      logger.warn({ source: source.name, siteKey: source.siteKey }, 'No extractor for site key, using default');
    }

    if (source.type === 'rss') {
      const byDomain = this.resolveByDomain(source.url);
      if (byDomain) {
        return byDomain;
      }
    }

    const fallback = this.defaults.get(source.type);
    if (!fallback) {
      throw new ConfigurationError(`No extractor registered for source type "${source.type}"`);
    }
    return fallback;
  }

  private resolveByDomain(url: string): ExtractorAdapter | undefined {
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase().replace(/^www\./, '');
    } catch {
      return undefined;
    }

    // Walk up the subdomains: news.example.tn, then example.tn
    const labels = host.split('.');
    for (let i = 0; i < labels.length - 1; i++) {
      const adapter = this.sites.get(siteKeyFor('rss', labels.slice(i).join('.')));
      if (adapter) {
        return adapter;
      }
    }
    return undefined;
  }
}

function siteKeyFor(type: SourceType, siteKey: string): string {
  return `${type}:${siteKey.toLowerCase()}`;
}
