import { createHash } from 'crypto';
import type { ListingRecord } from './types.js';

/**
 * Produce a stable SHA-256 hex hash of the input string.
 */
export function hashString(str: string): string {
  return createHash('sha256').update(str).digest('hex');
}

/**
 * Drop query string, fragment and trailing slash so tracking parameters
 * don't change the identity of a listing.
 */
export function canonicalizeUrl(url: string): string {
  try {
    const u = new URL(url);
    u.hash = '';
    u.search = '';
    const pathname = u.pathname.replace(/\/+$/, '');
    return `${u.protocol}//${u.host.toLowerCase()}${pathname}`;
  } catch {
    return url.trim();
  }
}

/**
 * Dedup key for a listing. Depends only on the source and its id (or, with no
 * id, the canonical url), never on price or title text.
 */
export function identityKey(listing: Pick<ListingRecord, 'source' | 'externalId' | 'url'>): string {
  const externalId = listing.externalId?.trim();
  if (externalId) {
    return `${listing.source}:${externalId}`;
  }
  return `${listing.source}:url:${hashString(`${listing.source}\n${canonicalizeUrl(listing.url)}`)}`;
}
