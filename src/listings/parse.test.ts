import { describe, it, expect } from 'vitest';
import { absoluteUrl, lastPathSegment, normalizeText, parseBedrooms, parseMoney } from './parse.js';

describe('parseMoney', () => {
  it('strips currency symbols and commas', () => {
    expect(parseMoney('$1,050')).toBe(1050);
    expect(parseMoney('$1,050/mo')).toBe(1050);
    expect(parseMoney('1100')).toBe(1100);
  });

  it('takes the lower bound of a range', () => {
    expect(parseMoney('$1,000 - $1,150')).toBe(1000);
  });

  it('prefers a dollar amount over other numbers', () => {
    expect(parseMoney('1 Bed $1,075')).toBe(1075);
  });

  it('returns null for text without a number', () => {
    expect(parseMoney('Call for rent')).toBeNull();
    expect(parseMoney('')).toBeNull();
    expect(parseMoney(null)).toBeNull();
  });
});

describe('parseBedrooms', () => {
  it.each([
    ['1 bd', 1],
    ['1br - 650ft2', 1],
    ['One Bedroom apartment', 1],
    ['2 Beds', 2],
    ['Studio', 0],
  ])('reads %s', (text, expected) => {
    expect(parseBedrooms(text)).toBe(expected);
  });

  it('reads counts run together with neighbouring facts', () => {
    expect(parseBedrooms('1 bd1 ba650 sqft')).toBe(1);
    expect(parseBedrooms('2bds1ba')).toBe(2);
    expect(parseBedrooms('One Bedroom1 Bath')).toBe(1);
  });

  it('returns unknown for text without a count', () => {
    expect(parseBedrooms('Sunny apartment near campus')).toBe('unknown');
    expect(parseBedrooms(undefined)).toBe('unknown');
  });

  it('returns unknown when counts conflict', () => {
    expect(parseBedrooms('1-2 Beds')).toBe('unknown');
    expect(parseBedrooms('Studio - 2 Beds')).toBe('unknown');
  });
});

describe('url helpers', () => {
  it('resolves relative urls against a base', () => {
    expect(absoluteUrl('/a/b', 'https://hotpads.com')).toBe('https://hotpads.com/a/b');
    expect(absoluteUrl(null, 'https://hotpads.com')).toBeNull();
  });

  it('returns the last path segment', () => {
    expect(lastPathSegment('https://www.apartments.com/the-summit-troy-ny/k3d9x2/')).toBe('k3d9x2');
    expect(lastPathSegment('https://www.apartments.com/')).toBeNull();
  });

  it('collapses whitespace', () => {
    expect(normalizeText('  a \n  b ')).toBe('a b');
  });
});
