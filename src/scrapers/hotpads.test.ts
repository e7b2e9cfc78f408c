import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { parseConfig } from '../config.js';
import { createListingFilter, criteriaFromConfig } from '../listings/filter.js';
import { HotPadsAdapter } from './hotpads.js';

const search = parseConfig({ search: { towns: ['Albany'] } }).search;

const PAGE = `<html><body><ul>
  <li class="SearchResult">
    <a href="/45-state-st-albany-ny-12207-1q2w3e/pad">45 State St</a>
    <div class="price">$1,125</div>
    <div class="beds">1 bd</div>
    <div class="address">45 State St, Albany, NY</div>
    <img src="https://photos.hotpads.com/45-state.jpg"/>
  </li>
  <li class="SearchResult" data-listing-id="hp-778">
    <a href="https://hotpads.com/some-building/building">Some Building</a>
    <div class="price">$1,010+</div>
    <div class="beds">1 bd</div>
  </li>
</ul></body></html>`;

describe('HotPadsAdapter', () => {
  it('requests the town search with bedroom and price filters', async () => {
    const requested: string[] = [];
    await new HotPadsAdapter({
      search,
      http: async (url) => {
        requested.push(url);
        return PAGE;
      },
    }).fetchListings();

    expect(requested).toEqual(['https://hotpads.com/albany-ny/apartments-for-rent?beds=1&price=1000-1150']);
  });

  it('parses result cards', async () => {
    const result = await new HotPadsAdapter({ search, http: async () => PAGE }).fetchListings();

    expect(result).toEqual({
      ok: true,
      listings: [
        {
          source: 'hotpads',
          externalId: '1q2w3e',
          title: '45 State St',
          price: 1125,
          bedrooms: 1,
          location: '45 State St, Albany, NY',
          url: 'https://hotpads.com/45-state-st-albany-ny-12207-1q2w3e/pad',
          imageUrls: ['https://photos.hotpads.com/45-state.jpg'],
        },
        {
          source: 'hotpads',
          externalId: 'hp-778',
          title: 'Some Building',
          price: 1010,
          bedrooms: 1,
          location: 'Albany',
          url: 'https://hotpads.com/some-building/building',
          imageUrls: [],
        },
      ],
    });
  });

  it('reads the bedroom count from minified card markup', async () => {
    const minified =
      '<html><body><ul><li class="SearchResult"><a href="/9-lark-st-albany-ny-12210-zz9/pad">9 Lark St</a>' +
      '<div class="price">$1,060</div><div class="bedsBaths"><span>1 bd</span><span>1 ba</span></div>' +
      '</li></ul></body></html>';

    const result = await new HotPadsAdapter({ search, http: async () => minified }).fetchListings();
    if (!result.ok) throw new Error(result.reason);

    expect(result.listings).toHaveLength(1);
    expect(result.listings[0]).toMatchObject({ externalId: 'zz9', price: 1060, bedrooms: 1, location: 'Albany' });
    expect(createListingFilter(criteriaFromConfig(search))(result.listings)).toHaveLength(1);
  });

  it('reports an HTTP 403 as blocked', async () => {
    const adapter = new HotPadsAdapter({
      search,
      http: async () => {
        throw new AxiosError('Request failed with status code 403', 'ERR_BAD_REQUEST', undefined, undefined, {
          data: '',
          status: 403,
          statusText: 'Forbidden',
          headers: {},
          config: { headers: new AxiosHeaders() },
        });
      },
    });
    expect(await adapter.fetchListings()).toEqual({ ok: false, reason: 'blocked' });
  });
});
