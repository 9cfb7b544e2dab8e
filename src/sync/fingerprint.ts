/**
 * Content fingerprinting
 *
 * A fingerprint is the SHA-256 of the normalized (title, body, link) triple. It is
 * the dedup key for a source, independent of cursor position.
 */

import crypto from 'crypto';
import type { ContentRepository } from '../types/storage.js';

// Normalized text never contains a newline, so it cannot be confused with a field boundary
const SEPARATOR = '\n';

/**
 * Lowercase, NFKC, whitespace collapsed
 */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export function normalizeLink(link: string): string {
  const trimmed = link.trim().toLowerCase();
  const hashIndex = trimmed.indexOf('#');
  return hashIndex === -1 ? trimmed : trimmed.slice(0, hashIndex);
}

export function fingerprint(title: string, body: string, link: string): string {
  const input = [normalizeText(title), normalizeText(body), normalizeLink(link)].join(SEPARATOR);
  return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Read-only check against the fingerprints already persisted for a source
 */
export class FingerprintIndex {
  constructor(private readonly content: Pick<ContentRepository, 'hasFingerprint'>) {}

  isDuplicate(contentHash: string, sourceId: number): Promise<boolean> {
    return this.content.hasFingerprint(sourceId, contentHash);
  }
}
