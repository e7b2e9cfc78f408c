import { absoluteUrl, lastPathSegment, normalizeText, parseBedrooms, parseMoney, truncate } from '../listings/parse.js';
import type { ListingRecord } from '../listings/types.js';
import { BaseSiteAdapter, ScrapeError, townSlug, type SearchPage } from './base.js';
import { collectImages, loadHtml, pickAttr, pickText } from './html.js';

const ORIGIN = 'https://www.apartments.com';
const NO_RESULTS = /no results found|no exact matches|0 (apartments|rentals) available/i;

export class ApartmentsComAdapter extends BaseSiteAdapter {
  readonly site = 'apartments' as const;

  protected buildSearchPages(): SearchPage[] {
    const { bedrooms, priceMin, priceMax, state } = this.search;
    return this.search.towns.map((town) => ({
      url: `${ORIGIN}/${townSlug(town, state)}/${bedrooms}-bedrooms-${priceMin}-to-${priceMax}/`,
      town,
    }));
  }

  protected parsePage(html: string, page: SearchPage): ListingRecord[] {
    const $ = loadHtml(html);
    const cards = $('article.placard, li.mortar-wrapper article, .placard').slice(0, this.maxCardsPerPage);

    if (cards.length === 0) {
      if (NO_RESULTS.test(html)) return [];
      throw new ScrapeError('parse', 'no placard cards found; markup may have changed');
    }

    const listings: ListingRecord[] = [];

    cards.each((_, el) => {
      const card = $(el);

      const href = card.attr('data-url')
        || pickAttr(card, 'a.property-link', 'href')
        || pickAttr(card, '.property-title a, .placardTitle a', 'href');
      const url = absoluteUrl(href, ORIGIN);
      if (!url) return;

      const price = parseMoney(pickText(card, '.property-pricing, .price-range, .property-rents, .rent'));
      if (price === null) return;

      const title = pickText(card, '.property-title, .placardTitle, .js-placardTitle')
        || normalizeText(card.text()).slice(0, 80);
      const bedsText = pickText(card, '.property-beds, .bed-range, .beds') || title;
      const description = pickText(card, '.property-text, .description');

      listings.push({
        source: this.site,
        externalId: card.attr('data-listingid') || lastPathSegment(url),
        title,
        price,
        bedrooms: parseBedrooms(bedsText),
        location: pickText(card, '.property-address, .location') || page.town,
        url,
        imageUrls: collectImages($, card, ORIGIN),
        ...(description ? { description: truncate(description, 350) } : {}),
      });
    });

    return listings;
  }
}
