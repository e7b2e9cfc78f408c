import { normalizeText, parseBedrooms, parseMoney, truncate } from '../listings/parse.js';
import { UNKNOWN_BEDROOMS, type ListingRecord } from '../listings/types.js';
import { BaseSiteAdapter, ScrapeError, type SearchPage } from './base.js';
import { loadXml } from './html.js';

const DOLLAR_AMOUNT = /\$\s*\d[\d,]*/;

/**
 * Craigslist apartment search, read through the RSS flavour of the search
 * page. Price and bedroom bounds go into the query, so Craigslist is the one
 * source whose results are already restricted to the wanted unit type.
 */
export class CraigslistAdapter extends BaseSiteAdapter {
  readonly site = 'craigslist' as const;

  protected buildSearchPages(): SearchPage[] {
    return this.search.towns.map((town) => {
      const region = town.toLowerCase().replace(/[^a-z]/g, '');
      const params = new URLSearchParams({
        min_price: String(this.search.priceMin),
        max_price: String(this.search.priceMax),
        min_bedrooms: String(this.search.bedrooms),
        max_bedrooms: String(this.search.bedrooms),
        format: 'rss',
      });
      return { url: `https://${region}.craigslist.org/search/apa?${params.toString()}`, town };
    });
  }

  protected parsePage(xml: string, page: SearchPage): ListingRecord[] {
    if (!/<(rss|rdf:RDF|channel)\b/i.test(xml)) {
      throw new ScrapeError('parse', 'response is not an RSS feed');
    }

    const $ = loadXml(xml);
    const listings: ListingRecord[] = [];

    $('item').slice(0, this.maxCardsPerPage).each((_, el) => {
      const item = $(el);
      const title = normalizeText(item.children('title').text());
      const link = normalizeText(item.children('link').text()) || item.attr('rdf:about') || '';
      const description = normalizeText(item.children('description').text());
      if (!title || !link) return;

      const priceText = title.match(DOLLAR_AMOUNT)?.[0] ?? description.match(DOLLAR_AMOUNT)?.[0];
      const price = parseMoney(priceText);
      if (price === null) return;

      let bedrooms = parseBedrooms(title);
      if (bedrooms === UNKNOWN_BEDROOMS) bedrooms = parseBedrooms(description);

      const image = item
        .children()
        .filter((_, child) => child.tagName.toLowerCase() === 'enc:enclosure')
        .first()
        .attr('resource');

      listings.push({
        source: this.site,
        externalId: link.match(/\/(\d+)\.html/)?.[1] ?? null,
        title,
        price,
        bedrooms,
        location: title.match(/\(([^()]+)\)\s*$/)?.[1]?.trim() || page.town,
        url: link,
        imageUrls: image ? [image] : [],
        ...(description ? { description: truncate(description, 350) } : {}),
      });
    });

    return listings;
  }
}
