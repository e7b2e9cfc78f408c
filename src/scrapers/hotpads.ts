import { absoluteUrl, normalizeText, parseBedrooms, parseMoney, truncate } from '../listings/parse.js';
import type { ListingRecord } from '../listings/types.js';
import { BaseSiteAdapter, ScrapeError, townSlug, type SearchPage } from './base.js';
import { collectImages, loadHtml, pickAttr, pickText } from './html.js';

const ORIGIN = 'https://hotpads.com';
const NO_RESULTS = /no (listings|results|rentals) (found|match)/i;

/**
 * HotPads search results. Card urls end in `/<slug>/pad`; the slug's
 * trailing token is the listing id when no data attribute carries one.
 */
export class HotPadsAdapter extends BaseSiteAdapter {
  readonly site = 'hotpads' as const;

  protected buildSearchPages(): SearchPage[] {
    const { bedrooms, priceMin, priceMax, state } = this.search;
    return this.search.towns.map((town) => {
      const params = new URLSearchParams({ beds: String(bedrooms), price: `${priceMin}-${priceMax}` });
      return { url: `${ORIGIN}/${townSlug(town, state)}/apartments-for-rent?${params.toString()}`, town };
    });
  }

  protected parsePage(html: string, page: SearchPage): ListingRecord[] {
    const $ = loadHtml(html);
    const cards = $('li.SearchResult, .ListingCard, .HomeCard, .listing').slice(0, this.maxCardsPerPage);

    if (cards.length === 0) {
      if (NO_RESULTS.test(html)) return [];
      throw new ScrapeError('parse', 'no result cards found; markup may have changed');
    }

    const listings: ListingRecord[] = [];

    cards.each((_, el) => {
      const card = $(el);
      const url = absoluteUrl(pickAttr(card, 'a[href]', 'href'), ORIGIN);
      if (!url) return;

      const price = parseMoney(pickText(card, '.price, .displayPrice, .ListingCard-price'));
      if (price === null) return;

      const title = pickText(card, '.ListingCard-title, .title, a') || normalizeText(card.text()).slice(0, 80);
      const bedsText = pickText(card, '.beds, .ListingCard-beds, .bedsBaths') || title;
      const description = pickText(card, '.propertyDescription, .description');

      listings.push({
        source: this.site,
        externalId: card.attr('data-listing-id') || url.match(/-([a-z0-9]+)\/pad\/?$/i)?.[1] || null,
        title,
        price,
        bedrooms: parseBedrooms(bedsText),
        location: pickText(card, '.address, .ListingCard-address') || page.town,
        url,
        imageUrls: collectImages($, card, ORIGIN),
        ...(description ? { description: truncate(description, 350) } : {}),
      });
    });

    return listings;
  }
}
