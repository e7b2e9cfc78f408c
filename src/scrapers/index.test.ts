import { describe, it, expect } from 'vitest';
import { parseConfig } from '../config.js';
import { createAdapters } from './index.js';

describe('createAdapters', () => {
  it('builds one adapter per configured site, in order', () => {
    const config = parseConfig({ sites: ['zillow', 'craigslist'] });
    expect(createAdapters(config).map((a) => a.site)).toEqual(['zillow', 'craigslist']);
  });

  it('passes the injected getter through to each adapter', async () => {
    const requested: string[] = [];
    const config = parseConfig({ sites: ['hotpads'], search: { towns: ['Troy'] } });
    const [adapter] = createAdapters(config, async (url) => {
      requested.push(url);
      return '<p>No listings found</p>';
    });

    expect(await adapter.fetchListings()).toEqual({ ok: true, listings: [] });
    expect(requested).toEqual(['https://hotpads.com/troy-ny/apartments-for-rent?beds=1&price=1000-1150']);
  });
});
