import { describe, it, expect } from 'vitest';
import { createListingFilter, matchesTown, normalizeLocation, type FilterCriteria } from './filter.js';
import type { ListingRecord } from './types.js';

const criteria: FilterCriteria = {
  towns: ['Troy', 'Albany', 'Schenectady'],
  priceMin: 1000,
  priceMax: 1150,
  bedrooms: 1,
  trustedBedroomSources: ['craigslist'],
};

function listing(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    source: 'apartments',
    externalId: 'a1',
    title: 'Sunny 1BR',
    price: 1050,
    bedrooms: 1,
    location: 'Troy, NY',
    url: 'https://www.apartments.com/sunny/a1/',
    imageUrls: [],
    ...overrides,
  };
}

describe('createListingFilter', () => {
  const filter = createListingFilter(criteria);

  it('includes the inclusive price bounds', () => {
    const input = [listing({ externalId: 'lo', price: 1000 }), listing({ externalId: 'hi', price: 1150 })];
    expect(filter(input).map((l) => l.externalId)).toEqual(['lo', 'hi']);
  });

  it('excludes prices just outside the bounds', () => {
    expect(filter([listing({ price: 999 }), listing({ price: 1151 })])).toEqual([]);
  });

  it('always excludes two bedrooms', () => {
    expect(filter([listing({ bedrooms: 2 })])).toEqual([]);
    expect(filter([listing({ source: 'craigslist', bedrooms: 2 })])).toEqual([]);
  });

  it('excludes unknown bedrooms from an ambiguous source', () => {
    expect(filter([listing({ source: 'zillow', bedrooms: 'unknown' })])).toEqual([]);
  });

  it('includes unknown bedrooms from a source that only lists matching units', () => {
    const trusted = listing({ source: 'craigslist', bedrooms: 'unknown' });
    expect(filter([trusted])).toEqual([trusted]);
  });

  it('excludes other towns', () => {
    expect(filter([listing({ location: 'Latham, NY' })])).toEqual([]);
  });

  it('keeps input order and is repeatable', () => {
    const input = [
      listing({ externalId: 'b', location: 'Albany' }),
      listing({ externalId: 'x', price: 2000 }),
      listing({ externalId: 'a', location: 'SCHENECTADY, NY 12305' }),
    ];
    const first = filter(input);
    expect(first.map((l) => l.externalId)).toEqual(['b', 'a']);
    expect(filter(input)).toEqual(first);
    expect(input).toHaveLength(3);
  });
});

describe('town matching', () => {
  it('normalizes case and a state suffix', () => {
    expect(normalizeLocation('Troy, NY')).toBe('troy');
    expect(normalizeLocation('Albany, NY 12203')).toBe('albany');
    expect(normalizeLocation('Schenectady, New York')).toBe('schenectady');
  });

  it('matches a town inside a street address', () => {
    expect(matchesTown('12 River St, Troy, NY 12180', ['Troy'])).toBe(true);
  });

  it('does not match a town as part of another word', () => {
    expect(matchesTown('Troyville', ['Troy'])).toBe(false);
    expect(matchesTown('', ['Troy'])).toBe(false);
  });
});
