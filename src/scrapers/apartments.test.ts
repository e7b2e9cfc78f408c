import { describe, it, expect } from 'vitest';
import { parseConfig } from '../config.js';
import { ApartmentsComAdapter } from './apartments.js';

const PAGE_URL = 'https://www.apartments.com/troy-ny/1-bedrooms-1000-to-1150/';

const PAGE = `<html><body><ul>
  <li class="mortar-wrapper">
    <article class="placard" data-listingid="k3d9x2" data-url="https://www.apartments.com/river-lofts-troy-ny/k3d9x2/">
      <div class="property-title">River Lofts</div>
      <div class="property-address">2 River St, Troy, NY 12180</div>
      <div class="property-pricing">$1,095</div>
      <div class="property-beds">1 Bed</div>
      <img data-src="https://images1.apartments.com/i2/river-1.jpg" src="data:image/gif;base64,R0lGOD"/>
      <img src="/i2/river-2.jpg"/>
    </article>
  </li>
  <li class="mortar-wrapper">
    <article class="placard" data-url="https://www.apartments.com/the-mill-troy-ny/m1ll42/">
      <div class="property-title">The Mill</div>
      <div class="property-pricing">Call for Rent</div>
    </article>
  </li>
  <li class="mortar-wrapper">
    <article class="placard">
      <div class="property-title"><a href="/hill-house-troy-ny/h1ll07/">Hill House</a></div>
      <div class="property-pricing">$1,000 - $1,150</div>
      <div class="property-beds">Studio - 2 Beds</div>
      <div class="property-text">Walk to campus</div>
    </article>
  </li>
</ul></body></html>`;

const search = parseConfig({ search: { towns: ['Troy'] } }).search;

describe('ApartmentsComAdapter', () => {
  it('parses placards into listings', async () => {
    const requested: string[] = [];
    const adapter = new ApartmentsComAdapter({
      search,
      http: async (url) => {
        requested.push(url);
        return PAGE;
      },
    });

    const result = await adapter.fetchListings();

    expect(requested).toEqual([PAGE_URL]);
    expect(result).toEqual({
      ok: true,
      listings: [
        {
          source: 'apartments',
          externalId: 'k3d9x2',
          title: 'River Lofts',
          price: 1095,
          bedrooms: 1,
          location: '2 River St, Troy, NY 12180',
          url: 'https://www.apartments.com/river-lofts-troy-ny/k3d9x2/',
          imageUrls: ['https://images1.apartments.com/i2/river-1.jpg', 'https://www.apartments.com/i2/river-2.jpg'],
        },
        {
          source: 'apartments',
          externalId: 'h1ll07',
          title: 'Hill House',
          price: 1000,
          bedrooms: 'unknown',
          location: 'Troy',
          url: 'https://www.apartments.com/hill-house-troy-ny/h1ll07/',
          imageUrls: [],
          description: 'Walk to campus',
        },
      ],
    });
  });

  it('treats a no-results page as an empty success', async () => {
    const adapter = new ApartmentsComAdapter({
      search,
      http: async () => '<html><body><h2>No results found</h2></body></html>',
    });
    expect(await adapter.fetchListings()).toEqual({ ok: true, listings: [] });
  });

  it('fails when the page has neither cards nor a no-results notice', async () => {
    const adapter = new ApartmentsComAdapter({
      search,
      http: async () => '<html><body><div id="app"></div></body></html>',
    });
    expect(await adapter.fetchListings()).toEqual({
      ok: false,
      reason: 'parse: no placard cards found; markup may have changed',
    });
  });
});
