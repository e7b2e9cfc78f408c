import type { SITE_IDS } from '../config.js';

export type SiteId = (typeof SITE_IDS)[number];

export const SITE_LABELS: Record<SiteId, string> = {
  craigslist: 'Craigslist',
  apartments: 'Apartments.com',
  hotpads: 'HotPads',
  zillow: 'Zillow',
};

/** Bedroom count could not be read from the listing text. */
export const UNKNOWN_BEDROOMS = 'unknown' as const;

export type Bedrooms = number | typeof UNKNOWN_BEDROOMS;

export interface ListingRecord {
  source: SiteId;
  /** Id on the source site; null when the page exposes no stable id */
  externalId: string | null;
  title: string;
  /** Whole dollars per month */
  price: number;
  bedrooms: Bedrooms;
  location: string;
  url: string;
  /** First image is the one embedded inline in the digest */
  imageUrls: string[];
  description?: string;
}

export type RunResult =
  | { ok: true; listings: ListingRecord[] }
  | { ok: false; reason: string };

export function success(listings: ListingRecord[]): RunResult {
  return { ok: true, listings };
}

export function failure(reason: string): RunResult {
  return { ok: false, reason };
}
