/**
 * Small cheerio helpers shared by the site adapters.
 */
import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { absoluteUrl, normalizeText } from '../listings/parse.js';

export type { CheerioAPI };
export type Card = Cheerio<Element>;

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

export function loadXml(xml: string): CheerioAPI {
  return cheerio.load(xml, { xml: true });
}

/**
 * Trimmed, whitespace-collapsed text of the first match. Null if missing or empty.
 */
export function pickText(card: Card, selector: string): string | null {
  const text = normalizeText(card.find(selector).first().text());
  return text.length > 0 ? text : null;
}

export function pickAttr(card: Card, selector: string, attr: string): string | null {
  const val = card.find(selector).first().attr(attr);
  return val && val.trim().length > 0 ? val.trim() : null;
}

/**
 * Ordered, de-duplicated absolute image URLs inside a card. Lazy-loaded
 * `data-src` wins over `src`; data: URIs are skipped.
 */
export function collectImages($: CheerioAPI, card: Card, base: string): string[] {
  const urls: string[] = [];
  card.find('img').each((_, el) => {
    const img = $(el);
    const raw = img.attr('data-src') || img.attr('src') || img.attr('srcset')?.split(/\s+/)[0];
    if (!raw || raw.startsWith('data:')) return;
    const abs = absoluteUrl(raw, base);
    if (abs && !urls.includes(abs)) urls.push(abs);
  });
  return urls;
}
