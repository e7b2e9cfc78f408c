import { UNKNOWN_BEDROOMS, type Bedrooms } from './types.js';

export function normalizeText(text: string | null | undefined): string {
  return (text || '').replace(/\s+/g, ' ').trim();
}

/**
 * Parse a rent string like "$1,050", "1050/mo" or "$1,000 - $1,150" into whole
 * dollars. Ranges resolve to their lower bound. Returns null if unparseable.
 */
export function parseMoney(str: string | null | undefined): number | null {
  if (!str) return null;
  // Prefer a dollar-marked amount so "1 Bed $1,050" reads as 1050
  const match = str.match(/\$\s*(\d[\d,]*)/) || str.match(/(\d[\d,]*)/);
  if (!match) return null;
  const amount = parseInt(match[1].replace(/,/g, ''), 10);
  return Number.isNaN(amount) ? null : amount;
}

const WORD_COUNTS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
};

/**
 * Read a bedroom count from free text ("1 bd", "2br", "One Bedroom",
 * "Studio"). Text naming more than one distinct count is ambiguous.
 *
 * Card text from minified markup runs facts together ("1 bd1 ba650 sqft"),
 * so counts are not anchored on word boundaries.
 */
export function parseBedrooms(text: string | null | undefined): Bedrooms {
  const t = (text || '').toLowerCase();
  if (!t) return UNKNOWN_BEDROOMS;

  const counts = new Set<number>();
  const range = /(?<![\d,.])(\d+)\s*[-–]\s*(\d+)\s*(?:bd|br|bds|brs|bed|beds|bedroom|bedrooms)(?![a-z])/g;
  for (const m of t.matchAll(range)) {
    counts.add(parseInt(m[1], 10));
    counts.add(parseInt(m[2], 10));
  }
  const numeric = /(?<![\d,.])(\d+)\s*-?\s*(?:bd|br|bds|brs|bed|beds|bedroom|bedrooms)(?![a-z])\.?/g;
  for (const m of t.matchAll(numeric)) {
    counts.add(parseInt(m[1], 10));
  }
  const words = /\b(one|two|three|four)[\s-]+(?:bed|beds|bedroom|bedrooms)(?![a-z])/g;
  for (const m of t.matchAll(words)) {
    counts.add(WORD_COUNTS[m[1]]);
  }
  if (/\bstudio\b/.test(t)) counts.add(0);

  if (counts.size !== 1) return UNKNOWN_BEDROOMS;
  const [count] = counts;
  return count;
}

export function absoluteUrl(href: string | null | undefined, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href.trim(), base).toString();
  } catch {
    return null;
  }
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function lastPathSegment(url: string): string | null {
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    return segments.length > 0 ? segments[segments.length - 1] : null;
  } catch {
    return null;
  }
}
