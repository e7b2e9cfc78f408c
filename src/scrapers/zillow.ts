import { absoluteUrl, normalizeText, parseBedrooms, parseMoney } from '../listings/parse.js';
import type { ListingRecord } from '../listings/types.js';
import { BaseSiteAdapter, ScrapeError, townSlug, type SearchPage } from './base.js';
import { collectImages, loadHtml, pickAttr, pickText } from './html.js';

const ORIGIN = 'https://www.zillow.com';

/**
 * Zillow renders results client-side. A server response without result cards
 * means the content was walled off, which is reported as blocked rather than
 * as an empty search.
 */
export class ZillowAdapter extends BaseSiteAdapter {
  readonly site = 'zillow' as const;

  protected buildSearchPages(): SearchPage[] {
    return this.search.towns.map((town) => ({
      url: `${ORIGIN}/${townSlug(town, this.search.state)}/rentals/`,
      town,
    }));
  }

  protected parsePage(html: string, page: SearchPage): ListingRecord[] {
    const $ = loadHtml(html);
    const cards = $('article[data-test="property-card"], .list-card, .photo-card').slice(0, this.maxCardsPerPage);

    if (cards.length === 0) {
      throw new ScrapeError('blocked', 'no server-rendered result cards');
    }

    const listings: ListingRecord[] = [];

    cards.each((_, el) => {
      const card = $(el);
      const url = absoluteUrl(pickAttr(card, 'a.list-card-link, a[data-test="property-card-link"], a[href]', 'href'), ORIGIN);
      if (!url) return;

      const price = parseMoney(pickText(card, '[data-test="property-card-price"], .list-card-price, .zsg-photo-card-price'));
      if (price === null) return;

      const address = pickText(card, 'address, .list-card-addr');
      const details = pickText(card, '.list-card-details, [data-test="property-card-details"], ul') || '';
      const title = address || normalizeText(card.text()).slice(0, 100);

      listings.push({
        source: this.site,
        externalId: card.attr('data-zpid') || url.match(/\/(\d+)_zpid/)?.[1] || null,
        title,
        price,
        bedrooms: parseBedrooms(details || title),
        location: address || page.town,
        url,
        imageUrls: collectImages($, card, ORIGIN),
      });
    });

    return listings;
  }
}
