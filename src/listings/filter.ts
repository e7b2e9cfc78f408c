import type { SearchConfig } from '../config.js';
import { UNKNOWN_BEDROOMS, type ListingRecord, type SiteId } from './types.js';

export interface FilterCriteria {
  towns: string[];
  priceMin: number;
  priceMax: number;
  bedrooms: number;
  /**
   * Sources whose search query already restricts unit type, so a listing
   * with an unreadable bedroom count can be trusted.
   */
  trustedBedroomSources: SiteId[];
}

export type ListingFilter = (listings: readonly ListingRecord[]) => ListingRecord[];

export function criteriaFromConfig(search: SearchConfig, trustedBedroomSources: SiteId[] = ['craigslist']): FilterCriteria {
  return {
    towns: search.towns,
    priceMin: search.priceMin,
    priceMax: search.priceMax,
    bedrooms: search.bedrooms,
    trustedBedroomSources,
  };
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lowercase, collapse whitespace and strip a trailing state / zip suffix
 * ("Troy, NY 12180" -> "troy").
 */
export function normalizeLocation(location: string): string {
  return location
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/,?\s*\b(ny|new york)\b\.?(\s+\d{5}(-\d{4})?)?\s*$/, '')
    .replace(/[,\s]+$/, '')
    .trim();
}

export function matchesTown(location: string, towns: readonly string[]): boolean {
  const normalized = normalizeLocation(location);
  if (!normalized) return false;
  return towns.some((town) => {
    const t = town.trim().toLowerCase();
    if (!t) return false;
    return normalized === t || new RegExp(`\\b${escapeRegex(t)}\\b`).test(normalized);
  });
}

export function matchesBedrooms(listing: ListingRecord, criteria: FilterCriteria): boolean {
  if (listing.bedrooms === UNKNOWN_BEDROOMS) {
    return criteria.trustedBedroomSources.includes(listing.source);
  }
  return listing.bedrooms === criteria.bedrooms;
}

export function matchesPrice(price: number, criteria: FilterCriteria): boolean {
  return Number.isInteger(price) && price >= criteria.priceMin && price <= criteria.priceMax;
}

export function createListingFilter(criteria: FilterCriteria): ListingFilter {
  return (listings) =>
    listings.filter(
      (listing) =>
        matchesBedrooms(listing, criteria) &&
        matchesPrice(listing.price, criteria) &&
        matchesTown(listing.location, criteria.towns)
    );
}
